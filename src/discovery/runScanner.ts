import path from "path";
import { RunParser } from "../parsers/types";
import { readDirectoryStatus } from "../progress/statusStore";
import { DirectoryStatus, RunDirectoryStatus } from "../types/directoryStatus";
import { DirectoryError, directoryError, messageOf } from "../types/errors";
import { listDirectories, listFiles } from "../utils/fs";
import { Result, err, ok } from "../utils/result";

/**
 * Classifies one directory. Missing required files make it INVALID, which is
 * reported here but never written to the marker.
 */
export async function findSingleRun(
  directory: string,
  parser: RunParser
): Promise<RunDirectoryStatus> {
  let files: string[];
  try {
    files = await listFiles(directory);
  } catch {
    files = [];
  }

  const missingFiles = parser.requiredFiles().filter((name) => !files.includes(name));
  const requiredFilesPresent = missingFiles.length === 0;
  const status = requiredFilesPresent
    ? await readDirectoryStatus(directory)
    : DirectoryStatus.Invalid;

  return { directory, requiredFilesPresent, missingFiles, status };
}

export async function findRuns(
  root: string,
  parser: RunParser
): Promise<Result<RunDirectoryStatus[], DirectoryError>> {
  let children: string[];
  try {
    children = await listDirectories(root);
  } catch (error) {
    return err(directoryError(`Could not read directory while looking for runs: ${messageOf(error)}`, root));
  }

  const runs: RunDirectoryStatus[] = [];
  for (const child of children) {
    runs.push(await findSingleRun(path.join(root, child), parser));
  }
  return ok(runs);
}

export async function findFirstNewRun(
  root: string,
  parser: RunParser
): Promise<Result<RunDirectoryStatus | null, DirectoryError>> {
  const runs = await findRuns(root, parser);
  if (!runs.ok) return runs;
  const first = runs.value.find(
    (run) => run.requiredFilesPresent && run.status === DirectoryStatus.New
  );
  return ok(first ?? null);
}
