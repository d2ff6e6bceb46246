/**
 * PackageResolver backed by the TypeScript compiler through ts-morph.
 *
 * One Project per package. All of the package's files are added up front so
 * symbols resolve across files; each unit's tree and diagnostics are built
 * only when its source is loaded.
 */
import * as path from 'node:path';
import { Project, ts, type ProjectOptions, type SourceFile } from 'ts-morph';
import { ErrorCodes, ResolveError, errorMessage } from '../../utils/errors.js';
import { fileExists, globFiles } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { Diagnostic, DiagnosticSeverity } from '../diagnostics/types.js';
import type { SurveyPackage } from '../discovery/packages.js';
import { readManifest } from './manifest.js';
import { SymbolTable } from './symbols.js';
import { TreeBuilder } from './tree-builder.js';
import type { PackageResolver, PackageUnit, ResolvedPackage, UnitSource } from './types.js';

export const TSCONFIG_FILE = 'tsconfig.json';

export const DEFAULT_INCLUDE = ['**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}'];

export const DEFAULT_EXCLUDE = ['**/node_modules/**', '**/dist/**', '**/build/**', '**/*.d.ts'];

export interface TsMorphResolverOptions {
  include?: string[];
  exclude?: string[];
}

const TODO_PATTERN = /\/\/\s*TODO\b:?\s*(.*)$/gm;

export class TsMorphResolver implements PackageResolver {
  private readonly include: string[];
  private readonly exclude: string[];

  constructor(options: TsMorphResolverOptions = {}) {
    this.include = options.include && options.include.length > 0 ? options.include : DEFAULT_INCLUDE;
    this.exclude = [...DEFAULT_EXCLUDE, ...(options.exclude ?? [])];
  }

  async resolvePackage(pkg: SurveyPackage): Promise<ResolvedPackage> {
    await readManifest(pkg.root);

    const project = await this.createProject(pkg);
    const files = await this.listFiles(pkg);
    logger.debug(`${pkg.name}: ${files.length} source files`);

    try {
      for (const file of files) {
        project.addSourceFileAtPath(file);
      }
    } catch (error) {
      throw new ResolveError(
        ErrorCodes.RESOLVE_FAILED,
        `Failed to load sources of ${pkg.name}: ${errorMessage(error)}`,
        { package: pkg.name, root: pkg.root }
      );
    }

    const program = project.getProgram().compilerObject;
    const builder = new TreeBuilder(new SymbolTable(project.getTypeChecker().compilerObject));
    const diagnostics = uniqueDiagnostics([
      ...project.getConfigFileParsingDiagnostics().map((diagnostic) => diagnostic.compilerObject),
      ...program.getConfigFileParsingDiagnostics(),
      ...program.getOptionsDiagnostics(),
      ...program.getGlobalDiagnostics(),
    ]).map((diagnostic) => toDiagnostic(diagnostic, pkg.name));

    const units: UnitSource[] = files.map((file) => {
      const relative = toPosix(path.relative(pkg.root, file));
      return {
        path: relative,
        load: (): PackageUnit => {
          const sourceFile = project.getSourceFileOrThrow(file);
          const source = `${pkg.name}/${relative}`;
          return {
            package: pkg,
            path: relative,
            source,
            text: sourceFile.getFullText(),
            buildTree: () => builder.build(sourceFile),
            diagnostics: [
              ...program.getSyntacticDiagnostics(sourceFile.compilerNode),
              ...program.getSemanticDiagnostics(sourceFile.compilerNode),
            ]
              .map((diagnostic) => toDiagnostic(diagnostic, source))
              .concat(todoDiagnostics(sourceFile, source)),
          };
        },
      };
    });

    return {
      package: pkg,
      diagnostics,
      units,
      dispose: () => {
        for (const sourceFile of project.getSourceFiles()) {
          project.removeSourceFile(sourceFile);
        }
      },
    };
  }

  private async createProject(pkg: SurveyPackage): Promise<Project> {
    const tsConfigFilePath = path.join(pkg.root, TSCONFIG_FILE);
    if (!(await fileExists(tsConfigFilePath))) {
      return new Project(defaultProjectOptions());
    }

    try {
      return new Project({ tsConfigFilePath, skipAddingFilesFromTsConfig: true });
    } catch (error) {
      throw new ResolveError(
        ErrorCodes.TSCONFIG_INVALID,
        `Invalid ${TSCONFIG_FILE} in ${pkg.name}: ${errorMessage(error)}`,
        { package: pkg.name, path: tsConfigFilePath }
      );
    }
  }

  private async listFiles(pkg: SurveyPackage): Promise<string[]> {
    const nestedIgnores = pkg.nestedRoots.map(
      (nestedRoot) => `${toPosix(path.relative(pkg.root, nestedRoot))}/**`
    );
    const files = await globFiles(this.include, {
      cwd: pkg.root,
      ignore: [...this.exclude, ...nestedIgnores],
      absolute: true,
    });
    return files.map((file) => path.resolve(file)).sort();
  }
}

/**
 * Compiler options for a package without a tsconfig.json.
 */
export function defaultProjectOptions(): ProjectOptions {
  return {
    compilerOptions: {
      allowJs: true,
      checkJs: false,
      skipLibCheck: true,
      noEmit: true,
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.NodeNext,
      moduleResolution: ts.ModuleResolutionKind.NodeNext,
      jsx: ts.JsxEmit.Preserve,
    },
  };
}

export function severityOf(category: ts.DiagnosticCategory): DiagnosticSeverity {
  switch (category) {
    case ts.DiagnosticCategory.Error:
      return 'error';
    case ts.DiagnosticCategory.Warning:
      return 'warning';
    case ts.DiagnosticCategory.Suggestion:
      return 'hint';
    case ts.DiagnosticCategory.Message:
      return 'info';
  }
}

function toDiagnostic(diagnostic: ts.Diagnostic, source: string): Diagnostic {
  const offset = diagnostic.start ?? 0;
  const position = diagnostic.file
    ? ts.getLineAndCharacterOfPosition(diagnostic.file, offset)
    : { line: -1, character: -1 };
  return {
    severity: severityOf(diagnostic.category),
    code: `TS${diagnostic.code}`,
    message: ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n'),
    location: { source, offset, line: position.line + 1, column: position.character + 1 },
  };
}

/**
 * Program-wide diagnostics can surface through more than one channel; keep
 * each once.
 */
function uniqueDiagnostics(diagnostics: readonly ts.Diagnostic[]): ts.Diagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter((diagnostic) => {
    const key = [
      diagnostic.file?.fileName ?? '',
      diagnostic.start ?? -1,
      diagnostic.code,
      ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n'),
    ].join('\0');
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * One `todo` diagnostic per `// TODO` comment.
 */
export function todoDiagnostics(sourceFile: SourceFile, source: string): Diagnostic[] {
  const text = sourceFile.getFullText();
  const diagnostics: Diagnostic[] = [];
  for (const match of text.matchAll(TODO_PATTERN)) {
    const offset = match.index ?? 0;
    const { line, column } = sourceFile.getLineAndColumnAtPos(offset);
    diagnostics.push({
      severity: 'todo',
      code: 'TODO',
      message: match[1].trim() || 'TODO',
      location: { source, offset, line, column },
    });
  }
  return diagnostics;
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
