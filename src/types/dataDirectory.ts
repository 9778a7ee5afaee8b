export interface DataDirectoryEntry {
  /** Relative to the data directory; "" is the data directory itself. */
  directory: string;
  files: string[];
}

/**
 * File listing of a run's data directory. Cloud backends build this themselves
 * so that file discovery never touches the local filesystem.
 */
export interface DataDirectoryStruct {
  dataDir: string;
  entries: DataDirectoryEntry[];
}
