/**
 * Stages of one upload attempt, in order:
 *   START -> STATUS_WRITTEN -> PARSED -> OFFLINE_VALID -> CONNECTED
 *         -> ONLINE_VALID -> UPLOADED -> DONE
 * Any stage may end in FAILED instead of advancing.
 */
export const UploadState = {
  Start: "START",
  StatusWritten: "STATUS_WRITTEN",
  Parsed: "PARSED",
  OfflineValid: "OFFLINE_VALID",
  Connected: "CONNECTED",
  OnlineValid: "ONLINE_VALID",
  Uploaded: "UPLOADED",
  Done: "DONE",
  Failed: "FAILED"
} as const;

export type UploadState = (typeof UploadState)[keyof typeof UploadState];

const ORDER: readonly UploadState[] = [
  UploadState.Start,
  UploadState.StatusWritten,
  UploadState.Parsed,
  UploadState.OfflineValid,
  UploadState.Connected,
  UploadState.OnlineValid,
  UploadState.Uploaded,
  UploadState.Done
];

/** The state that follows `state`, or null for DONE and FAILED. */
export function nextState(state: UploadState): UploadState | null {
  const index = ORDER.indexOf(state);
  if (index < 0 || index === ORDER.length - 1) return null;
  return ORDER[index + 1];
}
