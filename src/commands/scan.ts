import path from "path";
import { findRuns } from "../discovery/runScanner";
import { createCommandContext } from "./context";

export interface ScanCommandOptions {
  configPath: string;
  root: string;
}

export async function runScanCommand(options: ScanCommandOptions): Promise<number> {
  const { ctx } = await createCommandContext(options.configPath);
  const runs = await findRuns(path.resolve(options.root), ctx.parser);
  if (!runs.ok) {
    console.error(runs.error.message);
    return 1;
  }
  if (runs.value.length === 0) {
    console.log(`No run directories in ${options.root}`);
    return 0;
  }
  for (const run of runs.value) {
    const missing = run.missingFiles.length ? ` (missing: ${run.missingFiles.join(", ")})` : "";
    console.log(`${run.status.padEnd(8)} ${run.directory}${missing}`);
  }
  return 0;
}
