import path from "path";
import { DataDirectoryStruct } from "../types/dataDirectory";
import {
  DirectoryError,
  SampleSheetError,
  ValidationIssue,
  sampleSheetError,
  sequenceFileError
} from "../types/errors";
import { Sample, SampleSheetMetadata, SequenceFile } from "../types/sequencingRun";
import { validationResult } from "../types/validation";
import { Result, err, ok } from "../utils/result";
import { dataListing, entryFiles, locateSampleSheet, readDataDirectoryStruct } from "./common";
import { SAMPLE_SHEET_FILE_NAME, SampleSheet, cellValue, dataTable } from "./sampleSheet";
import { ParseSamplesOptions, ParsedSamples, ParserName, RunParser, SheetRules } from "./types";

/**
 * Runs assembled by hand: the sheet names every sequence file explicitly and
 * the files sit beside it.
 *
 *   [Data]
 *   Sample_Name,Project_ID,File_Forward,File_Reverse,Description
 */
export class DirectoryParser implements RunParser {
  readonly name: ParserName = "directory";
  readonly sheetRules: SheetRules = {
    requiredSections: ["Data"],
    requiredColumns: ["Sample_Name", "Project_ID", "File_Forward"],
    sampleColumn: "Sample_Name",
    projectColumn: "Project_ID"
  };

  requiredFiles(): readonly string[] {
    return [SAMPLE_SHEET_FILE_NAME];
  }

  relativeDataDirectory(): string {
    return "";
  }

  locateSheet(directory: string): Promise<Result<string, DirectoryError>> {
    return locateSampleSheet(directory, SAMPLE_SHEET_FILE_NAME, this.name);
  }

  readDataDirectory(dataDir: string): Promise<Result<DataDirectoryStruct, DirectoryError>> {
    return readDataDirectoryStruct(dataDir, false);
  }

  parseMetadata(sheet: SampleSheet): Result<SampleSheetMetadata, SampleSheetError> {
    const table = dataTable(sheet);
    if (!table) {
      return err(sampleSheetError("Sample sheet has no [Data] table", sheet.path));
    }
    const paired = table.rows.some((row) => cellValue(table, row, "File_Reverse") !== "");

    return ok({
      runId: path.basename(path.dirname(sheet.path)),
      platform: this.name,
      layoutType: paired ? "PAIRED_END" : "SINGLE_END",
      readLengths: [],
      experimentName: null,
      investigatorName: null,
      date: null,
      workflow: null,
      application: null,
      assay: null,
      chemistry: null,
      description: null
    });
  }

  async parseSamples(sheet: SampleSheet, options: ParseSamplesOptions = {}): Promise<ParsedSamples> {
    const table = dataTable(sheet);
    if (!table) {
      return {
        samples: [],
        result: validationResult([sampleSheetError("Sample sheet has no [Data] table", sheet.path)])
      };
    }
    const listing = await dataListing(this, sheet, options);
    if (!listing.ok) {
      return { samples: [], result: validationResult([listing.error]) };
    }
    const struct = listing.value;
    const available = new Set(entryFiles(struct, "") ?? []);

    const samples: Sample[] = [];
    const issues: ValidationIssue[] = [];

    table.rows.forEach((row, index) => {
      const name = cellValue(table, row, this.sheetRules.sampleColumn);
      const projectId = cellValue(table, row, this.sheetRules.projectColumn);
      if (!name || !projectId) return;

      const forward = cellValue(table, row, "File_Forward");
      const reverse = cellValue(table, row, "File_Reverse");
      const problem = this.checkFiles(name, forward, reverse, available, options);
      if (problem) {
        issues.push(problem);
        return;
      }

      const files: SequenceFile[] = [{ path: path.join(struct.dataDir, forward), direction: "forward" }];
      if (reverse) {
        files.push({ path: path.join(struct.dataDir, reverse), direction: "reverse" });
      }
      samples.push({
        name,
        projectId,
        description: cellValue(table, row, "Description"),
        sampleNumber: index + 1,
        files
      });
    });

    return { samples, result: validationResult(issues) };
  }

  private checkFiles(
    name: string,
    forward: string,
    reverse: string,
    available: Set<string>,
    options: ParseSamplesOptions
  ): ValidationIssue | null {
    if (!forward) {
      return sequenceFileError(`Sample '${name}' has no forward file`, name);
    }
    if (!available.has(forward)) {
      return sequenceFileError(`File '${forward}' for sample '${name}' was not found`, name);
    }
    if (!reverse) {
      return options.layoutType === "PAIRED_END"
        ? sequenceFileError(`Sample '${name}' is missing a read pair: no reverse file`, name)
        : null;
    }
    if (reverse === forward) {
      return sequenceFileError(
        `Sample '${name}' names '${forward}' as both forward and reverse file`,
        name
      );
    }
    if (!available.has(reverse)) {
      return sequenceFileError(`File '${reverse}' for sample '${name}' was not found`, name);
    }
    return null;
  }
}

export const directoryParser = new DirectoryParser();
