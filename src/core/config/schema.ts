/**
 * Schema for `surveyor.config.yaml`.
 */
import { z } from 'zod';
import { DETECTOR_IDS } from '../detectors/types.js';
import { DEFAULT_HIDDEN_SEVERITIES, DIAGNOSTIC_SEVERITIES } from '../diagnostics/types.js';
import { DEFAULT_EXAMPLE_LIMIT } from '../evidence/aggregator.js';
import { INSTALL_MODES } from '../packages/installer.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const CountSchema = z.number().int().min(0);

export const DetectorIdSchema = z.enum(DETECTOR_IDS);

export const DiagnosticSeveritySchema = z.enum(DIAGNOSTIC_SEVERITIES);

export const InstallModeSchema = z.enum(INSTALL_MODES);

/** Diagnostic advisor settings. */
export const DiagnosticsConfigSchema = z.object({
  /** Severities never shown. */
  hidden: z.array(DiagnosticSeveritySchema).default([...DEFAULT_HIDDEN_SEVERITIES]),
  /** Stop scheduling packages once this many were seen. */
  cap: CountSchema.optional(),
});

/** Dependency installation settings. */
export const InstallConfigSchema = z.object({
  mode: InstallModeSchema.default('skip'),
  /** Abort the run when an installation fails. */
  required: z.boolean().default(false),
});

export const SurveyConfigSchema = z.object({
  /** Maximum packages analyzed; 0 is unlimited. */
  limit: CountSchema.default(0),
  /** Maximum examples per category; 0 keeps every example. */
  examples: CountSchema.default(DEFAULT_EXAMPLE_LIMIT),
  /** Source globs, relative to each package root. */
  include: z.array(z.string()).default([]),
  /** Extra globs excluded from every package. */
  exclude: z.array(z.string()).default([]),
  detectors: z.array(DetectorIdSchema).min(1).default([...DETECTOR_IDS]),
  /** Analyze packages nested inside package roots. */
  nested: z.boolean().default(true),
  diagnostics: withDefaults(DiagnosticsConfigSchema),
  install: withDefaults(InstallConfigSchema),
});

export type SurveyConfig = z.infer<typeof SurveyConfigSchema>;
export type DiagnosticsConfig = z.infer<typeof DiagnosticsConfigSchema>;
export type InstallConfig = z.infer<typeof InstallConfigSchema>;
