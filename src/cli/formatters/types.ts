/**
 * Reporter type definitions.
 */

/**
 * Options for reporters.
 */
export interface ReporterOptions {
  /** Use colors in output */
  colors: boolean;
  /** Receives each output line on flush (default: console.log) */
  print: (line: string) => void;
}
