export const DirectoryStatus = {
  New: "NEW",
  Partial: "PARTIAL",
  Complete: "COMPLETE",
  Error: "ERROR",
  Invalid: "INVALID"
} as const;

export type DirectoryStatus = (typeof DirectoryStatus)[keyof typeof DirectoryStatus];

/** Statuses that may be written to a marker. NEW is the absence of one, INVALID is derived. */
export type PersistedStatus = "PARTIAL" | "COMPLETE" | "ERROR";

const PERSISTED: readonly PersistedStatus[] = ["PARTIAL", "COMPLETE", "ERROR"];

export function isPersistedStatus(value: string): value is PersistedStatus {
  return PERSISTED.some((status) => status === value);
}

export interface RunDirectoryStatus {
  directory: string;
  requiredFilesPresent: boolean;
  missingFiles: string[];
  status: DirectoryStatus;
}
