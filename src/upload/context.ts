import type { ApiConfig, RemoteApi } from "../api/types";
import type { Logger } from "../logging/logger";
import type { RunParser } from "../parsers/types";

/** Everything a stage needs, passed explicitly instead of held in module state. */
export interface UploaderContext {
  parser: RunParser;
  api: RemoteApi;
  apiConfig: ApiConfig;
  logger: Logger;
}
