import path from "path";
import { describeError } from "../types/errors";
import { validateRunDirectory } from "../upload/orchestrator";
import { createCommandContext } from "./context";

export interface ValidateOptions {
  configPath: string;
  directory: string;
}

export async function runValidate(options: ValidateOptions): Promise<number> {
  const { ctx } = await createCommandContext(options.configPath);
  const run = await validateRunDirectory(ctx, path.resolve(options.directory));
  if (!run.ok) {
    const issues = run.error.kind === "ValidationError" ? run.error.result.errors : [run.error];
    console.error(`${run.error.message}:`);
    for (const issue of issues) {
      console.error(`  - ${describeError(issue)}`);
    }
    return 1;
  }

  for (const project of run.value.projects) {
    console.log(`Project ${project.id}: ${project.samples.map((sample) => sample.name).join(", ")}`);
  }
  console.log(`Run ${run.value.metadata.runId} is valid (${run.value.metadata.layoutType})`);
  return 0;
}
