import path from "path";
import { DataDirectoryEntry, DataDirectoryStruct } from "../types/dataDirectory";
import { DirectoryError, directoryError, messageOf } from "../types/errors";
import { isWritableDirectory, listDirectories, listFiles } from "../utils/fs";
import { Result, err, ok } from "../utils/result";
import type { SampleSheet } from "./sampleSheet";
import type { ParseSamplesOptions, RunParser } from "./types";

export async function locateSampleSheet(
  directory: string,
  sheetFileName: string,
  platform: string
): Promise<Result<string, DirectoryError>> {
  if (!(await isWritableDirectory(directory))) {
    return err(
      directoryError(
        "The directory is not accessible, can not parse samples from this directory",
        directory
      )
    );
  }

  let files: string[];
  try {
    files = await listFiles(directory);
  } catch (error) {
    return err(directoryError(`Could not list directory: ${messageOf(error)}`, directory));
  }
  if (!files.includes(sheetFileName)) {
    return err(
      directoryError(
        `The directory has no sample sheet file in the ${platform} format with the name ${sheetFileName}`,
        directory
      )
    );
  }
  return ok(path.join(directory, sheetFileName));
}

/**
 * Lists the data directory once. With `withSubdirectories`, each immediate
 * sub-directory (one per project on some instruments) gets its own entry.
 */
export async function readDataDirectoryStruct(
  dataDir: string,
  withSubdirectories: boolean
): Promise<Result<DataDirectoryStruct, DirectoryError>> {
  try {
    const entries: DataDirectoryEntry[] = [{ directory: "", files: await listFiles(dataDir) }];
    if (withSubdirectories) {
      for (const child of await listDirectories(dataDir)) {
        entries.push({ directory: child, files: await listFiles(path.join(dataDir, child)) });
      }
    }
    return ok({ dataDir, entries });
  } catch (error) {
    return err(
      directoryError(`Could not read data directory: ${messageOf(error)}`, dataDir)
    );
  }
}

/** The supplied listing if there is one, otherwise the data directory read from disk. */
export function dataListing(
  parser: Pick<RunParser, "relativeDataDirectory" | "readDataDirectory">,
  sheet: SampleSheet,
  options: ParseSamplesOptions
): Promise<Result<DataDirectoryStruct, DirectoryError>> {
  if (options.dataStruct) return Promise.resolve(ok(options.dataStruct));
  const dataDir =
    options.dataDir ?? path.join(path.dirname(sheet.path), parser.relativeDataDirectory());
  return parser.readDataDirectory(dataDir);
}

export function entryFiles(struct: DataDirectoryStruct, directory: string): string[] | null {
  const entry = struct.entries.find((candidate) => candidate.directory === directory);
  return entry ? entry.files : null;
}

const SLASH_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Accepts M/D/YYYY (as instruments write it) or YYYY-MM-DD; returns YYYY-MM-DD. */
export function normalizeSheetDate(text: string): string | null {
  let year: number;
  let month: number;
  let day: number;

  const slash = SLASH_DATE.exec(text);
  const iso = ISO_DATE.exec(text);
  if (slash) {
    month = Number(slash[1]);
    day = Number(slash[2]);
    year = Number(slash[3]);
  } else if (iso) {
    year = Number(iso[1]);
    month = Number(iso[2]);
    day = Number(iso[3]);
  } else {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}
