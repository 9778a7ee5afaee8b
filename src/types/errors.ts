import type { ValidationResult } from "./validation";

interface ErrorBase<K extends string> {
  kind: K;
  message: string;
  /** Directory, sheet line, sample or project the error is about. */
  entity: string | null;
}

export type DirectoryError = ErrorBase<"DirectoryError">;

export interface SampleSheetError extends ErrorBase<"SampleSheetError"> {
  line: number | null;
  lineText: string | null;
}

export type SequenceFileError = ErrorBase<"SequenceFileError">;

/** The remote service answered, and said no. */
export type RemoteRejection = ErrorBase<"RemoteRejection">;

export interface ValidationError extends ErrorBase<"ValidationError"> {
  result: ValidationResult;
}

export interface ConnectionError extends ErrorBase<"ConnectionError"> {
  status: number | null;
}

export type ValidationIssue = DirectoryError | SampleSheetError | SequenceFileError | RemoteRejection;

export type UploaderError = ValidationIssue | ValidationError | ConnectionError;

export function directoryError(message: string, directory: string): DirectoryError {
  return { kind: "DirectoryError", message, entity: directory };
}

export function sampleSheetError(
  message: string,
  sheetPath: string,
  line: number | null = null,
  lineText: string | null = null
): SampleSheetError {
  return {
    kind: "SampleSheetError",
    message,
    entity: line === null ? sheetPath : `${sheetPath}:${line}`,
    line,
    lineText
  };
}

export function sequenceFileError(message: string, sample: string | null): SequenceFileError {
  return { kind: "SequenceFileError", message, entity: sample };
}

export function remoteRejection(message: string, entity: string | null): RemoteRejection {
  return { kind: "RemoteRejection", message, entity };
}

export function validationError(message: string, result: ValidationResult): ValidationError {
  return { kind: "ValidationError", message, entity: null, result };
}

export function connectionError(
  message: string,
  status: number | null = null,
  entity: string | null = null
): ConnectionError {
  return { kind: "ConnectionError", message, entity, status };
}

export function describeError(error: UploaderError): string {
  const where = error.entity ? ` [${error.entity}]` : "";
  return `${error.kind}: ${error.message}${where}`;
}

export function messageOf(thrown: unknown): string {
  if (thrown instanceof Error) return thrown.message;
  return String(thrown);
}
