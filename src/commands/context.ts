import path from "path";
import { RestUploadApi } from "../api/restClient";
import { loadUploaderConfig, UploaderConfig } from "../config/uploaderConfig";
import { createLogger } from "../logging/logger";
import { getParser } from "../parsers/registry";
import { UploaderContext } from "../upload/context";

export interface CommandContext {
  config: UploaderConfig;
  ctx: UploaderContext;
}

export async function createCommandContext(configPath: string): Promise<CommandContext> {
  const config = await loadUploaderConfig(path.resolve(configPath));
  const ctx: UploaderContext = {
    parser: getParser(config.parser),
    api: new RestUploadApi(),
    apiConfig: config.api,
    logger: createLogger(config.logging)
  };
  return { config, ctx };
}
