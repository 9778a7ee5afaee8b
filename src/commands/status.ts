import path from "path";
import { findSingleRun } from "../discovery/runScanner";
import { clearDirectoryStatus } from "../progress/statusStore";
import { createCommandContext } from "./context";

export interface StatusCommandOptions {
  configPath: string;
  directory: string;
  reset?: boolean;
}

export async function runStatusCommand(options: StatusCommandOptions): Promise<number> {
  const directory = path.resolve(options.directory);
  const { ctx } = await createCommandContext(options.configPath);

  if (options.reset) {
    const cleared = await clearDirectoryStatus(directory);
    if (!cleared.ok) {
      console.error(cleared.error.message);
      return 1;
    }
    ctx.logger.info({ directory }, "Status marker cleared");
  }

  const run = await findSingleRun(directory, ctx.parser);
  const missing = run.missingFiles.length ? ` (missing: ${run.missingFiles.join(", ")})` : "";
  console.log(`${run.status}${missing}`);
  return 0;
}
