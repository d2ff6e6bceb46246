/**
 * Tests for the ts-morph package resolver against the fixture workspace.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ts } from 'ts-morph';
import {
  DEFAULT_EXCLUDE,
  TsMorphResolver,
  severityOf,
} from '../../../../src/core/resolver/ts-morph-resolver.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';
import { ALPHA, BETA, GAMMA, INNER, fixturePackage } from './fixtures.js';

const alpha = fixturePackage(ALPHA, { nestedRoots: [INNER] });

describe('TsMorphResolver', () => {
  it('should list package sources, leaving out nested packages', async () => {
    const resolved = await new TsMorphResolver().resolvePackage(alpha);
    try {
      expect(resolved.units.map((unit) => unit.path)).toEqual(['src/notes.ts', 'src/shapes.ts']);
      expect(resolved.diagnostics).toEqual([]);
    } finally {
      resolved.dispose();
    }
  });

  it('should build a unit with its package-qualified source and text', async () => {
    const resolved = await new TsMorphResolver().resolvePackage(alpha);
    try {
      const unit = resolved.units[1].load();

      expect(unit.source).toBe('alpha/src/shapes.ts');
      expect(unit.text.startsWith('export class Point {')).toBe(true);
      const tree = unit.buildTree();
      expect(tree.kind).toBe('sourceUnit');
      expect(tree.end).toBe(unit.text.length);
      expect(unit.diagnostics).toEqual([]);
    } finally {
      resolved.dispose();
    }
  });

  it('should report compiler errors and todo comments of a unit', async () => {
    const resolved = await new TsMorphResolver().resolvePackage(alpha);
    try {
      const unit = resolved.units[0].load();

      expect(unit.diagnostics).toEqual([
        {
          severity: 'error',
          code: 'TS2322',
          message: "Type 'string' is not assignable to type 'number'.",
          location: { source: 'alpha/src/notes.ts', offset: 23, line: 2, column: 7 },
        },
        {
          severity: 'todo',
          code: 'TODO',
          message: 'tidy up',
          location: { source: 'alpha/src/notes.ts', offset: 0, line: 1, column: 1 },
        },
      ]);
    } finally {
      resolved.dispose();
    }
  });

  it('should apply extra exclude globs', async () => {
    const resolved = await new TsMorphResolver({ exclude: ['**/notes.ts'] }).resolvePackage(alpha);
    try {
      expect(resolved.units.map((unit) => unit.path)).toEqual(['src/shapes.ts']);
    } finally {
      resolved.dispose();
    }
  });

  it('should restrict sources to the include globs', async () => {
    const resolved = await new TsMorphResolver({ include: ['**/*.js'] }).resolvePackage(fixturePackage(BETA));
    try {
      expect(resolved.units.map((unit) => unit.path)).toEqual(['lib/main.js']);
    } finally {
      resolved.dispose();
    }
  });

  it('should reject a directory without a manifest', async () => {
    const promise = new TsMorphResolver().resolvePackage(fixturePackage(GAMMA));

    await expect(promise).rejects.toBeInstanceOf(ConfigError);
    await expect(promise).rejects.toMatchObject({ code: ErrorCodes.MANIFEST_MISSING });
  });

  it('should exclude declaration files and build output by default', () => {
    expect(DEFAULT_EXCLUDE).toContain('**/*.d.ts');
    expect(DEFAULT_EXCLUDE).toContain('**/node_modules/**');
  });
});

describe('TsMorphResolver with a tsconfig.json', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `surveyor-resolver-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'package.json'), JSON.stringify({ name: 'p', version: '1.0.0' }));
    for (const name of ['a', 'b', 'c']) {
      await writeFile(join(testDir, `${name}.ts`), `export const ${name} = 1;\n`);
    }
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function resolveWith(compilerOptions: Record<string, unknown>) {
    await writeFile(join(testDir, 'tsconfig.json'), JSON.stringify({ compilerOptions }));
    return new TsMorphResolver().resolvePackage(fixturePackage(testDir, { name: 'p' }));
  }

  it('should report an unknown compiler option once, at package level', async () => {
    const resolved = await resolveWith({ target: 'ES2022', module: 'commonjs', fooBar: true });
    try {
      expect(resolved.diagnostics.map((d) => `${d.severity} ${d.code} ${d.location.source}`)).toEqual([
        'error TS5023 p',
      ]);
      expect(resolved.units.map((unit) => unit.load().diagnostics)).toEqual([[], [], []]);
    } finally {
      resolved.dispose();
    }
  });

  it('should report conflicting compiler options once, at package level', async () => {
    const resolved = await resolveWith({ target: 'ES2022', module: 'commonjs', moduleResolution: 'node16' });
    try {
      expect(resolved.diagnostics.filter((d) => d.code === 'TS5110')).toHaveLength(1);
      expect(resolved.units.map((unit) => unit.load().diagnostics)).toEqual([[], [], []]);
    } finally {
      resolved.dispose();
    }
  });
});

describe('severityOf', () => {
  it('should map compiler categories onto severities', () => {
    expect(severityOf(ts.DiagnosticCategory.Error)).toBe('error');
    expect(severityOf(ts.DiagnosticCategory.Warning)).toBe('warning');
    expect(severityOf(ts.DiagnosticCategory.Suggestion)).toBe('hint');
    expect(severityOf(ts.DiagnosticCategory.Message)).toBe('info');
  });
});
