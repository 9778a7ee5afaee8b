import { findFirstNewRun, findSingleRun } from "../discovery/runScanner";
import type { Logger } from "../logging/logger";
import { writeDirectoryStatus } from "../progress/statusStore";
import { DataDirectoryStruct } from "../types/dataDirectory";
import { DirectoryStatus, PersistedStatus } from "../types/directoryStatus";
import {
  DirectoryError,
  UploaderError,
  ValidationError,
  describeError,
  directoryError,
  validationError
} from "../types/errors";
import { SequencingRun } from "../types/sequencingRun";
import { errorCount, isValid } from "../types/validation";
import { Result, ok } from "../utils/result";
import { UploaderContext } from "./context";
import { parseRunDirectory, validateOffline } from "./parsingHandler";
import { UploadState, nextState } from "./uploadState";

export interface UploadOptions {
  /** Upload even when the directory is already marked COMPLETE. */
  force?: boolean;
  /** Listing of the data directory, for backends where it cannot be read from disk. */
  dataStruct?: DataDirectoryStruct;
  onState?: (state: UploadState) => void;
}

export interface UploadFailure {
  /** The state the attempt could not reach. */
  stage: UploadState;
  error: UploaderError;
  /** ERROR when the failure was recorded on the directory, null when the marker was left alone. */
  statusWritten: PersistedStatus | null;
}

export interface UploadOutcome {
  directory: string;
  exitCode: 0 | 1;
  finalState: UploadState;
  failure: UploadFailure | null;
  /** A status write that failed after the outcome was already decided. */
  statusWriteError: DirectoryError | null;
  skipped: boolean;
}

export function logUploaderError(logger: Logger, error: UploaderError): void {
  if (error.kind === "ValidationError") {
    logger.error(
      { kind: error.kind, errorCount: errorCount(error.result), errors: error.result.errors },
      `${error.message}. Encountered ${errorCount(error.result)} error(s)`
    );
    return;
  }
  logger.error({ kind: error.kind, entity: error.entity }, describeError(error));
}

/**
 * Runs one upload attempt against one directory. Never throws for domain
 * errors: every path ends in an outcome with an exit code. Retrying is left
 * to whoever calls this again.
 */
export async function uploadRunDirectory(
  ctx: UploaderContext,
  directory: string,
  options: UploadOptions = {}
): Promise<UploadOutcome> {
  const log = ctx.logger.child({ component: "orchestrator", directory });
  let state: UploadState = UploadState.Start;

  const advance = (): void => {
    const next = nextState(state);
    if (!next) throw new Error(`No state follows ${state}`);
    state = next;
    log.debug({ state }, "Upload state changed");
    options.onState?.(state);
  };

  const outcome = (fields: Partial<UploadOutcome>): UploadOutcome => ({
    directory,
    exitCode: 0,
    finalState: state,
    failure: null,
    statusWriteError: null,
    skipped: false,
    ...fields
  });

  const fail = async (error: UploaderError, recordError: boolean): Promise<UploadOutcome> => {
    const stage = nextState(state) ?? state;
    logUploaderError(log, error);
    log.info("Samples not uploaded!");

    let statusWritten: PersistedStatus | null = null;
    let statusWriteError: DirectoryError | null = null;
    if (recordError) {
      const written = await writeDirectoryStatus(directory, DirectoryStatus.Error);
      if (written.ok) {
        statusWritten = DirectoryStatus.Error;
      } else {
        statusWriteError = written.error;
        log.error({ entity: written.error.entity }, `Error on exit while writing status: ${written.error.message}`);
      }
    }

    state = UploadState.Failed;
    options.onState?.(state);
    return outcome({ exitCode: 1, failure: { stage, error, statusWritten }, statusWriteError });
  };

  options.onState?.(state);

  const classified = await findSingleRun(directory, ctx.parser);
  if (!classified.requiredFilesPresent) {
    return fail(
      directoryError(`Directory is missing required file(s): ${classified.missingFiles.join(", ")}`, directory),
      false
    );
  }
  if (classified.status === DirectoryStatus.Complete && !options.force) {
    log.info("Directory is already marked COMPLETE, skipping upload");
    return outcome({ skipped: true });
  }

  const started = await writeDirectoryStatus(directory, DirectoryStatus.Partial);
  if (!started.ok) {
    return fail(started.error, false);
  }
  advance();

  const parsed = await parseRunDirectory(ctx.parser, directory, { dataStruct: options.dataStruct });
  if (!parsed.ok) {
    return fail(parsed.error, true);
  }
  advance();

  const run = validateOffline(parsed.value);
  if (!run.ok) {
    return fail(run.error, true);
  }
  advance();
  log.info(
    { projects: run.value.projects.length, samples: countSamples(run.value) },
    "Run parsed and validated offline"
  );

  log.info("*** Connecting to remote service ***");
  const session = await ctx.api.connect(ctx.apiConfig);
  if (!session.ok) {
    return fail(session.error, false);
  }
  advance();
  log.info("*** Connected ***");

  log.info("*** Verifying run (online validation) ***");
  const verdict = await session.value.validateForUpload(run.value);
  if (!verdict.ok) {
    return fail(verdict.error, false);
  }
  if (!isValid(verdict.value)) {
    return fail(validationError("Sequencing run can not be uploaded", verdict.value), true);
  }
  advance();
  log.info("*** Run verified ***");

  log.info("*** Starting upload ***");
  const uploaded = await session.value.upload(run.value);
  if (!uploaded.ok) {
    return fail(uploaded.error, false);
  }
  advance();
  log.info("*** Upload complete ***");

  const completed = await writeDirectoryStatus(directory, DirectoryStatus.Complete);
  advance();
  if (!completed.ok) {
    log.error(
      { entity: completed.error.entity },
      `Samples were uploaded, but the status file may be incorrect: ${completed.error.message}`
    );
    return outcome({ statusWriteError: completed.error });
  }

  log.info("Samples in directory have finished uploading!");
  return outcome({});
}

/** Uploads the first NEW directory under `root`; `null` when there is none. */
export async function uploadFirstNewRun(
  ctx: UploaderContext,
  root: string,
  options: UploadOptions = {}
): Promise<Result<UploadOutcome | null, DirectoryError>> {
  ctx.logger.info({ root }, "Finding first new run");
  const first = await findFirstNewRun(root, ctx.parser);
  if (!first.ok) {
    logUploaderError(ctx.logger, first.error);
    return first;
  }
  if (!first.value) {
    ctx.logger.info({ root }, "Could not find any new runs");
    return ok(null);
  }
  ctx.logger.info({ directory: first.value.directory }, "New run found, starting upload");
  return ok(await uploadRunDirectory(ctx, first.value.directory, options));
}

/** Offline parse and validation only: no status writes, no network. */
export async function validateRunDirectory(
  ctx: Pick<UploaderContext, "parser" | "logger">,
  directory: string,
  options: Pick<UploadOptions, "dataStruct"> = {}
): Promise<Result<SequencingRun, DirectoryError | ValidationError>> {
  const parsed = await parseRunDirectory(ctx.parser, directory, options);
  if (!parsed.ok) {
    logUploaderError(ctx.logger.child({ component: "orchestrator", directory }), parsed.error);
    return parsed;
  }
  const run = validateOffline(parsed.value);
  if (!run.ok) {
    logUploaderError(ctx.logger.child({ component: "orchestrator", directory }), run.error);
  }
  return run;
}

function countSamples(run: SequencingRun): number {
  return run.projects.reduce((total, project) => total + project.samples.length, 0);
}
