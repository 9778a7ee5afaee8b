import type { ValidationIssue } from "./errors";

export interface ValidationResult {
  readonly errors: readonly ValidationIssue[];
}

export function validationResult(errors: readonly ValidationIssue[] = []): ValidationResult {
  return Object.freeze({ errors: Object.freeze([...errors]) });
}

export function isValid(result: ValidationResult): boolean {
  return result.errors.length === 0;
}

export function errorCount(result: ValidationResult): number {
  return result.errors.length;
}

export function concatResults(...results: ValidationResult[]): ValidationResult {
  return validationResult(results.flatMap((result) => result.errors));
}
