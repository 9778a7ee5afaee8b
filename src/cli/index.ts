#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runUploadCommand, runUploadFirstCommand } from "../commands/upload";
import { runScanCommand } from "../commands/scan";
import { runStatusCommand } from "../commands/status";
import { runValidate } from "../commands/validate";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.UPLOADER_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("run-uploader")
  .description("Validate sequencing run directories and upload them to the sample-management service")
  .version(pkg.version);

program
  .option(
    "--env-file <path>",
    "Path to .env file (overrides UPLOADER_ENV_FILE/DOTENV_CONFIG_PATH)",
    envPath
  )
  .option("--config <path>", "Path to uploader configuration JSON", "config/uploader.json");

function configPath(): string {
  return program.opts<{ config: string }>().config;
}

program
  .command("upload")
  .description("Validate and upload a single run directory")
  .requiredOption("--directory <path>", "Run directory to upload")
  .option("--force", "Upload even if the directory is marked COMPLETE", false)
  .action(async (opts: { directory: string; force: boolean }) => {
    process.exitCode = await runUploadCommand({
      configPath: configPath(),
      directory: opts.directory,
      force: opts.force
    });
  });

program
  .command("upload-first")
  .description("Upload the first new run found under a directory of runs")
  .requiredOption("--root <path>", "Directory containing run directories")
  .action(async (opts: { root: string }) => {
    process.exitCode = await runUploadFirstCommand({ configPath: configPath(), root: opts.root });
  });

program
  .command("scan")
  .description("List run directories and their upload status")
  .requiredOption("--root <path>", "Directory containing run directories")
  .action(async (opts: { root: string }) => {
    process.exitCode = await runScanCommand({ configPath: configPath(), root: opts.root });
  });

program
  .command("validate")
  .description("Parse and validate a run directory without uploading")
  .requiredOption("--directory <path>", "Run directory to validate")
  .action(async (opts: { directory: string }) => {
    process.exitCode = await runValidate({ configPath: configPath(), directory: opts.directory });
  });

program
  .command("status")
  .description("Show (or reset) the upload status of a run directory")
  .requiredOption("--directory <path>", "Run directory")
  .option("--reset", "Remove the status marker so the directory reads as NEW", false)
  .action(async (opts: { directory: string; reset: boolean }) => {
    process.exitCode = await runStatusCommand({
      configPath: configPath(),
      directory: opts.directory,
      reset: opts.reset
    });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
