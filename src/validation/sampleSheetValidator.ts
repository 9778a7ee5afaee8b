import { SampleSheet, cellValue, dataTable } from "../parsers/sampleSheet";
import { SheetRules } from "../parsers/types";
import { ValidationIssue, sampleSheetError, sequenceFileError } from "../types/errors";
import { Sample } from "../types/sequencingRun";
import { ValidationResult, validationResult } from "../types/validation";

/**
 * Structural checks on a sheet. Every row is checked; nothing stops at the
 * first problem. Sample names must be unique within a project, and the first
 * occurrence of a repeated name is never the one reported.
 */
export function validateSampleSheet(sheet: SampleSheet, rules: SheetRules): ValidationResult {
  const issues: ValidationIssue[] = [];

  for (const section of rules.requiredSections) {
    if (!sheet.sections.has(section)) {
      issues.push(sampleSheetError(`Missing required section [${section}]`, sheet.path));
    }
  }

  const table = dataTable(sheet);
  if (!table) {
    if (sheet.sections.has("Data")) {
      issues.push(sampleSheetError("[Data] section has no column header row", sheet.path));
    }
    return validationResult(issues);
  }

  const missingColumns = rules.requiredColumns.filter(
    (column) => !table.columns.has(column.toLowerCase())
  );
  for (const column of missingColumns) {
    issues.push(
      sampleSheetError(
        `[Data] header is missing required column '${column}'`,
        sheet.path,
        table.header.line,
        table.header.text
      )
    );
  }
  if (missingColumns.length > 0) {
    return validationResult(issues);
  }

  if (table.rows.length === 0) {
    issues.push(sampleSheetError("[Data] section lists no samples", sheet.path));
  }

  const seen = new Set<string>();
  for (const row of table.rows) {
    const name = cellValue(table, row, rules.sampleColumn);
    const project = cellValue(table, row, rules.projectColumn);

    if (!name) {
      issues.push(
        sampleSheetError(`Row has no ${rules.sampleColumn}`, sheet.path, row.line, row.text)
      );
    }
    if (!project) {
      issues.push(
        sampleSheetError(`Row has no ${rules.projectColumn}`, sheet.path, row.line, row.text)
      );
    }
    if (!name || !project) continue;

    const key = `${project}\u0000${name}`;
    if (seen.has(key)) {
      issues.push(
        sampleSheetError(
          `Duplicate sample name '${name}' in project '${project}'`,
          sheet.path,
          row.line,
          row.text
        )
      );
      continue;
    }
    seen.add(key);
  }

  return validationResult(issues);
}

export function validateSamples(samples: readonly Sample[]): ValidationResult {
  const issues: ValidationIssue[] = samples
    .filter((sample) => sample.files.length === 0)
    .map((sample) =>
      sequenceFileError(
        `Sample '${sample.name}' in project '${sample.projectId}' has no sequence files`,
        sample.name
      )
    );
  return validationResult(issues);
}
