export interface FileEntry {
  /** Path relative to the source root, always `/`-separated. */
  path: string;
  absolutePath: string;
}

export interface SkippedEntry {
  path: string;
  /** The ignore pattern that matched. */
  pattern: string;
}

export interface WalkOptions {
  /** Absolute directories that are never descended into. */
  excludeDirectories?: string[];
}

export interface WalkResult {
  files: FileEntry[];
  skipped: SkippedEntry[];
}
