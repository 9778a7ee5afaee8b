import path from "path";
import pkg from "../../package.json";
import { Logger } from "../logging/logger";
import { UploadOutcome, uploadFirstNewRun, uploadRunDirectory } from "../upload/orchestrator";
import { createCommandContext } from "./context";

export interface UploadCommandOptions {
  configPath: string;
  directory: string;
  force?: boolean;
}

export interface UploadFirstCommandOptions {
  configPath: string;
  root: string;
}

function logStartBlock(logger: Logger, logFile: string | undefined): void {
  logger.info("==================================================");
  logger.info("---------------STARTING UPLOAD RUN----------------");
  logger.info(`Uploader Version ${pkg.version}`);
  if (logFile) logger.info(`Logging to file in: ${logFile}`);
  logger.info("==================================================");
}

function logEndBlock(logger: Logger): void {
  logger.info("==================================================");
  logger.info("----------------ENDING UPLOAD RUN-----------------");
  logger.info("==================================================");
}

function report(outcome: UploadOutcome): void {
  if (outcome.skipped) {
    console.log(`${outcome.directory}: already uploaded, skipped`);
  } else if (outcome.failure) {
    console.error(
      `${outcome.directory}: failed before ${outcome.failure.stage} (${outcome.failure.error.kind}: ${outcome.failure.error.message})`
    );
  } else {
    console.log(`${outcome.directory}: upload complete`);
  }
  if (outcome.statusWriteError) {
    console.error(`${outcome.directory}: status file may be incorrect (${outcome.statusWriteError.message})`);
  }
}

export async function runUploadCommand(options: UploadCommandOptions): Promise<number> {
  const { config, ctx } = await createCommandContext(options.configPath);
  logStartBlock(ctx.logger, config.logging.file);
  const outcome = await uploadRunDirectory(ctx, path.resolve(options.directory), {
    force: options.force
  });
  logEndBlock(ctx.logger);
  report(outcome);
  return outcome.exitCode;
}

export async function runUploadFirstCommand(options: UploadFirstCommandOptions): Promise<number> {
  const { config, ctx } = await createCommandContext(options.configPath);
  logStartBlock(ctx.logger, config.logging.file);
  const result = await uploadFirstNewRun(ctx, path.resolve(options.root));
  logEndBlock(ctx.logger);

  if (!result.ok) {
    console.error(result.error.message);
    return 1;
  }
  if (!result.value) {
    console.log(`No new runs found in ${options.root}`);
    return 0;
  }
  report(result.value);
  return result.value.exitCode;
}
