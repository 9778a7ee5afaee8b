import { promises as fs } from "fs";
import path from "path";
import { DirectoryStatus, PersistedStatus, isPersistedStatus } from "../types/directoryStatus";
import { DirectoryError, directoryError, messageOf } from "../types/errors";
import { isNotFound, isWritableDirectory, writeFileAtomic } from "../utils/fs";
import { Result, err, ok } from "../utils/result";

export const STATUS_FILE_NAME = ".uploader_status";

export function statusFilePath(directory: string): string {
  return path.join(directory, STATUS_FILE_NAME);
}

export async function writeDirectoryStatus(
  directory: string,
  status: PersistedStatus
): Promise<Result<void, DirectoryError>> {
  if (!(await isWritableDirectory(directory))) {
    return err(
      directoryError(`Directory is not writable, cannot record status ${status}`, directory)
    );
  }
  try {
    await writeFileAtomic(statusFilePath(directory), `${status}\n`);
    return ok(undefined);
  } catch (error) {
    return err(
      directoryError(`Could not write status ${status}: ${messageOf(error)}`, directory)
    );
  }
}

/**
 * NEW when no marker exists. A marker that cannot be read, or holds anything
 * other than a persisted token, reads as ERROR.
 */
export async function readDirectoryStatus(directory: string): Promise<DirectoryStatus> {
  let content: string;
  try {
    content = await fs.readFile(statusFilePath(directory), "utf8");
  } catch (error) {
    return isNotFound(error) ? DirectoryStatus.New : DirectoryStatus.Error;
  }
  const token = content.trim();
  return isPersistedStatus(token) ? token : DirectoryStatus.Error;
}

export async function clearDirectoryStatus(
  directory: string
): Promise<Result<void, DirectoryError>> {
  try {
    await fs.rm(statusFilePath(directory), { force: true });
    return ok(undefined);
  } catch (error) {
    return err(directoryError(`Could not clear status: ${messageOf(error)}`, directory));
  }
}
