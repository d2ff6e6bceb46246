/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { formatZodError, loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

// Mock file-system for async load functions
vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({
  limit: z.number().default(0),
  detectors: z.array(z.string()).default([]),
});

describe('parseYaml', () => {
  it('should parse mappings and sequences', () => {
    expect(parseYaml('limit: 3\ndetectors:\n  - tearoff\n')).toEqual({ limit: 3, detectors: ['tearoff'] });
  });

  it('should return null for empty content', () => {
    expect(parseYaml('')).toBeNull();
  });

  it('should throw ConfigError for invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(ConfigError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults to empty content', () => {
    expect(parseYamlWithSchema('', Schema)).toEqual({ limit: 0, detectors: [] });
  });

  it('should reject values that fail validation', () => {
    try {
      parseYamlWithSchema('limit: many', Schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe(ErrorCodes.CONFIG_INVALID);
        expect(error.message).toMatch(/^YAML validation failed: limit: /);
      }
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('limit: 5');

    await expect(loadYamlWithSchema('/work/surveyor.config.yaml', Schema)).resolves.toEqual({
      limit: 5,
      detectors: [],
    });
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('limit: many');

    await expect(loadYamlWithSchema('/work/surveyor.config.yaml', Schema)).rejects.toThrow(
      /\(file: \/work\/surveyor\.config\.yaml\)$/
    );
  });

  it('should wrap read failures', async () => {
    mockReadFile.mockRejectedValue(new Error('EACCES'));

    await expect(loadYamlWithSchema('/work/surveyor.config.yaml', Schema)).rejects.toThrow(
      'Failed to load YAML file: /work/surveyor.config.yaml'
    );
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ limit: z.number() }).safeParse({ limit: 'x' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toMatch(/^limit: /);
    }
  });
});
