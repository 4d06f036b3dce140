export interface FileFailure {
  /** Path relative to the source root. */
  path: string;
  phase: 'read' | 'write';
  error: string;
  message: string;
}

export type FileOutcome =
  | { status: 'processed'; path: string; replacements: number }
  | { status: 'failed'; failure: FileFailure };

export interface RunResult {
  /** Every regular file found under the source root. */
  scanned: number;
  /** Files matched by an ignore pattern; never read. */
  skipped: number;
  /** Files written to the output root. */
  processed: number;
  failed: number;
  failures: FileFailure[];
  skippedPaths: string[];
  /** Total matches replaced across all processed files. */
  replacements: number;
  durationMs: number;
}
