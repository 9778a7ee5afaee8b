import { buildSequencingRun } from "../model/buildSequencingRun";
import { readSampleSheet } from "../parsers/sampleSheet";
import { ParseSamplesOptions, RunParser } from "../parsers/types";
import { DataDirectoryStruct } from "../types/dataDirectory";
import {
  DirectoryError,
  ValidationError,
  ValidationIssue,
  validationError
} from "../types/errors";
import { Sample, SampleSheetMetadata, SequencingRun } from "../types/sequencingRun";
import {
  ValidationResult,
  concatResults,
  isValid,
  validationResult
} from "../types/validation";
import { Result, err, ok } from "../utils/result";
import { validateSampleSheet, validateSamples } from "../validation/sampleSheetValidator";

export interface ParsedRun {
  sheetPath: string;
  metadata: SampleSheetMetadata | null;
  samples: Sample[];
  /** Problems found while parsing; checked by validateOffline. */
  result: ValidationResult;
}

export interface SheetParseOptions {
  dataDir?: string;
  dataStruct?: DataDirectoryStruct;
}

/**
 * Parses a sample sheet and resolves its sequence files. Structural problems
 * in the sheet stop here; metadata and per-sample problems are collected in
 * `result` so they can be reported together.
 */
export async function parseSampleSheetFile(
  parser: RunParser,
  sheetPath: string,
  options: SheetParseOptions = {}
): Promise<Result<ParsedRun, ValidationError>> {
  const sheet = await readSampleSheet(sheetPath);
  if (!sheet.ok) {
    return err(validationError("Errors occurred while reading the sample sheet", validationResult([sheet.error])));
  }

  const structure = validateSampleSheet(sheet.value, parser.sheetRules);
  if (!isValid(structure)) {
    return err(validationError("Errors occurred while getting sample sheet", structure));
  }

  const metadataIssues: ValidationIssue[] = [];
  const metadata = parser.parseMetadata(sheet.value);
  if (!metadata.ok) {
    metadataIssues.push(metadata.error);
  }

  const sampleOptions: ParseSamplesOptions = {
    dataDir: options.dataDir,
    dataStruct: options.dataStruct,
    layoutType: metadata.ok ? metadata.value.layoutType : undefined
  };
  const parsed = await parser.parseSamples(sheet.value, sampleOptions);

  return ok({
    sheetPath,
    metadata: metadata.ok ? metadata.value : null,
    samples: parsed.samples,
    result: concatResults(validationResult(metadataIssues), parsed.result)
  });
}

export async function parseRunDirectory(
  parser: RunParser,
  directory: string,
  options: SheetParseOptions = {}
): Promise<Result<ParsedRun, DirectoryError | ValidationError>> {
  const sheetPath = await parser.locateSheet(directory);
  if (!sheetPath.ok) return sheetPath;
  return parseSampleSheetFile(parser, sheetPath.value, options);
}

export function validateOffline(parsed: ParsedRun): Result<SequencingRun, ValidationError> {
  const result = concatResults(parsed.result, validateSamples(parsed.samples));
  if (!isValid(result) || !parsed.metadata) {
    return err(validationError("Errors occurred while parsing the run", result));
  }

  const built = buildSequencingRun(parsed.samples, parsed.metadata);
  if (!built.ok) {
    return err(
      validationError(
        "Errors occurred while building sequence run from sample sheet",
        validationResult([built.error])
      )
    );
  }
  return ok(built.value);
}

/** Parse and validate in one step, for callers that only want the run model. */
export async function getSequencingRun(
  parser: RunParser,
  sheetPath: string,
  options: SheetParseOptions = {}
): Promise<Result<SequencingRun, ValidationError>> {
  const parsed = await parseSampleSheetFile(parser, sheetPath, options);
  if (!parsed.ok) return parsed;
  return validateOffline(parsed.value);
}
