import type { DataDirectoryStruct } from "../types/dataDirectory";
import type { DirectoryError, SampleSheetError } from "../types/errors";
import type { LayoutType, Sample, SampleSheetMetadata } from "../types/sequencingRun";
import type { ValidationResult } from "../types/validation";
import type { Result } from "../utils/result";
import type { SampleSheet } from "./sampleSheet";

export const PARSER_NAMES = ["nextseq", "miseq", "directory"] as const;

export type ParserName = (typeof PARSER_NAMES)[number];

/** What the structural validator checks for a platform's sheet. */
export interface SheetRules {
  requiredSections: string[];
  requiredColumns: string[];
  sampleColumn: string;
  projectColumn: string;
}

export interface ParseSamplesOptions {
  /** Overrides the data directory derived from the sheet location. */
  dataDir?: string;
  /** Pre-built listing; when given the filesystem is not read. */
  dataStruct?: DataDirectoryStruct;
  layoutType?: LayoutType;
}

export interface ParsedSamples {
  samples: Sample[];
  result: ValidationResult;
}

export interface RunParser {
  readonly name: ParserName;
  readonly sheetRules: SheetRules;
  requiredFiles(): readonly string[];
  /** Where sequence files live, relative to the sample sheet. */
  relativeDataDirectory(): string;
  locateSheet(directory: string): Promise<Result<string, DirectoryError>>;
  parseMetadata(sheet: SampleSheet): Result<SampleSheetMetadata, SampleSheetError>;
  parseSamples(sheet: SampleSheet, options?: ParseSamplesOptions): Promise<ParsedSamples>;
  readDataDirectory(dataDir: string): Promise<Result<DataDirectoryStruct, DirectoryError>>;
}
