import path from "path";
import { DataDirectoryStruct } from "../types/dataDirectory";
import {
  DirectoryError,
  SampleSheetError,
  ValidationIssue,
  sampleSheetError,
  sequenceFileError
} from "../types/errors";
import { LayoutType, Sample, SampleSheetMetadata, SequenceFile } from "../types/sequencingRun";
import { validationResult } from "../types/validation";
import { escapeRegExp, emptyToNull } from "../utils/text";
import { Result, err, ok } from "../utils/result";
import { dataListing, entryFiles, locateSampleSheet, normalizeSheetDate, readDataDirectoryStruct } from "./common";
import { SAMPLE_SHEET_FILE_NAME, SampleSheet, SheetRow, cellValue, dataTable } from "./sampleSheet";
import { ParseSamplesOptions, ParsedSamples, ParserName, RunParser, SheetRules } from "./types";

export interface IlluminaParserOptions {
  name: ParserName;
  /** Sentinel the instrument writes once the run has finished. */
  completionFileName: string;
  /** Sequence files sit in one sub-directory per Sample_Project. */
  projectSubdirectories: boolean;
}

const HEADER_FIELDS = {
  "experiment name": "experimentName",
  "investigator name": "investigatorName",
  workflow: "workflow",
  application: "application",
  assay: "assay",
  chemistry: "chemistry",
  description: "description"
} as const;

type HeaderField = (typeof HEADER_FIELDS)[keyof typeof HEADER_FIELDS];

function headerField(key: string): HeaderField | null {
  const lower = key.toLowerCase();
  for (const [name, field] of Object.entries(HEADER_FIELDS)) {
    if (name === lower) return field;
  }
  return null;
}

interface FastqMatch {
  file: string;
  sampleIndex: string;
  lane: string;
  read: "1" | "2";
}

function matchFastqFiles(sampleName: string, files: string[]): FastqMatch[] {
  const pattern = new RegExp(
    `^${escapeRegExp(sampleName)}_S(\\d+)_L(\\d{3})_R([12])_\\d{3}\\.fastq(?:\\.gz)?$`
  );
  const matches: FastqMatch[] = [];
  for (const file of files) {
    const match = pattern.exec(file);
    if (!match) continue;
    matches.push({ file, sampleIndex: match[1], lane: match[2], read: match[3] === "1" ? "1" : "2" });
  }
  return matches.sort((a, b) => a.lane.localeCompare(b.lane) || a.file.localeCompare(b.file));
}

export class IlluminaParser implements RunParser {
  readonly name: ParserName;
  readonly sheetRules: SheetRules = {
    requiredSections: ["Header", "Reads", "Data"],
    requiredColumns: ["Sample_ID", "Sample_Name", "Sample_Project"],
    sampleColumn: "Sample_Name",
    projectColumn: "Sample_Project"
  };
  private completionFileName: string;
  private projectSubdirectories: boolean;

  constructor(options: IlluminaParserOptions) {
    this.name = options.name;
    this.completionFileName = options.completionFileName;
    this.projectSubdirectories = options.projectSubdirectories;
  }

  requiredFiles(): readonly string[] {
    return [SAMPLE_SHEET_FILE_NAME, this.completionFileName];
  }

  relativeDataDirectory(): string {
    return path.join("Data", "Intensities", "BaseCalls");
  }

  locateSheet(directory: string): Promise<Result<string, DirectoryError>> {
    return locateSampleSheet(directory, SAMPLE_SHEET_FILE_NAME, this.name);
  }

  readDataDirectory(dataDir: string): Promise<Result<DataDirectoryStruct, DirectoryError>> {
    return readDataDirectoryStruct(dataDir, this.projectSubdirectories);
  }

  parseMetadata(sheet: SampleSheet): Result<SampleSheetMetadata, SampleSheetError> {
    const headerRows = sheet.sections.get("Header");
    if (!headerRows) {
      return err(sampleSheetError("Sample sheet has no [Header] section", sheet.path));
    }

    const fields: Partial<Record<HeaderField, string>> = {};
    let date: string | null = null;

    for (const row of headerRows) {
      const [key = "", value = ""] = row.cells;
      if (!key) {
        return err(
          sampleSheetError("Header row has a value but no key", sheet.path, row.line, row.text)
        );
      }

      if (key.toLowerCase() === "date") {
        if (!value) continue;
        date = normalizeSheetDate(value);
        if (!date) {
          return err(
            sampleSheetError(`Could not parse date '${value}'`, sheet.path, row.line, row.text)
          );
        }
        continue;
      }

      const field = headerField(key);
      if (field && value) {
        fields[field] = value;
      }
    }

    if (!fields.workflow) {
      return err(sampleSheetError("Missing required header key 'Workflow'", sheet.path));
    }

    const readLengths: number[] = [];
    for (const row of sheet.sections.get("Reads") ?? []) {
      const text = row.cells[0] ?? "";
      const length = Number(text);
      if (!/^\d+$/.test(text) || length <= 0) {
        return err(
          sampleSheetError(`Read length '${text}' is not a positive integer`, sheet.path, row.line, row.text)
        );
      }
      readLengths.push(length);
    }
    if (readLengths.length === 0) {
      return err(sampleSheetError("Sample sheet has no read lengths in [Reads]", sheet.path));
    }

    return ok({
      runId: path.basename(path.dirname(sheet.path)),
      platform: this.name,
      layoutType: readLengths.length > 1 ? "PAIRED_END" : "SINGLE_END",
      readLengths,
      experimentName: emptyToNull(fields.experimentName),
      investigatorName: emptyToNull(fields.investigatorName),
      date,
      workflow: emptyToNull(fields.workflow),
      application: emptyToNull(fields.application),
      assay: emptyToNull(fields.assay),
      chemistry: emptyToNull(fields.chemistry),
      description: emptyToNull(fields.description)
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

    const samples: Sample[] = [];
    const issues: ValidationIssue[] = [];

    table.rows.forEach((row, index) => {
      const name = cellValue(table, row, this.sheetRules.sampleColumn);
      const projectId = cellValue(table, row, this.sheetRules.projectColumn);
      if (!name || !projectId) return;

      const resolved = this.resolveFiles(struct, name, projectId, row, options.layoutType);
      if (!resolved.ok) {
        issues.push(resolved.error);
        return;
      }
      samples.push({
        name,
        projectId,
        description: cellValue(table, row, "Description"),
        sampleNumber: index + 1,
        files: resolved.value
      });
    });

    return { samples, result: validationResult(issues) };
  }

  private resolveFiles(
    struct: DataDirectoryStruct,
    name: string,
    projectId: string,
    row: SheetRow,
    layoutType: LayoutType | undefined
  ): Result<SequenceFile[], ValidationIssue> {
    const directory = this.projectSubdirectories ? projectId : "";
    const files = entryFiles(struct, directory);
    const where = path.join(struct.dataDir, directory);
    if (files === null) {
      return err(sequenceFileError(`No data directory ${where} for sample '${name}' (line ${row.line})`, name));
    }

    const matches = matchFastqFiles(name, files);
    if (matches.length === 0) {
      return err(sequenceFileError(`No sequence files found in ${where} for sample '${name}'`, name));
    }

    const indexes = new Set(matches.map((match) => match.sampleIndex));
    if (indexes.size > 1) {
      return err(
        sequenceFileError(
          `Sequence files for sample '${name}' are ambiguous: found sample numbers ${[...indexes]
            .map((value) => `S${value}`)
            .join(", ")}`,
          name
        )
      );
    }

    const paired = layoutType === "PAIRED_END" || matches.some((match) => match.read === "2");
    if (paired) {
      // Each lane must carry its own mates; pairs are uploaded by position within a lane.
      for (const lane of new Set(matches.map((match) => match.lane))) {
        const inLane = matches.filter((match) => match.lane === lane);
        const forwardCount = inLane.filter((match) => match.read === "1").length;
        const reverseCount = inLane.length - forwardCount;
        if (forwardCount !== reverseCount) {
          return err(
            sequenceFileError(
              `Sample '${name}' is missing a read pair in lane L${lane}: ${forwardCount} forward and ${reverseCount} reverse file(s)`,
              name
            )
          );
        }
      }
    }

    const forward = matches.filter((match) => match.read === "1");
    const reverse = matches.filter((match) => match.read === "2");
    const toFile = (match: FastqMatch): SequenceFile => ({
      path: path.join(where, match.file),
      direction: match.read === "1" ? "forward" : "reverse"
    });
    return ok([...forward.map(toFile), ...reverse.map(toFile)]);
  }
}

export const nextseqParser = new IlluminaParser({
  name: "nextseq",
  completionFileName: "RTAComplete.txt",
  projectSubdirectories: true
});

export const miseqParser = new IlluminaParser({
  name: "miseq",
  completionFileName: "CompletedJobInfo.xml",
  projectSubdirectories: false
});
