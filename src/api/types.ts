import type { ConnectionError } from "../types/errors";
import type { SequencingRun } from "../types/sequencingRun";
import type { ValidationResult } from "../types/validation";
import type { Result } from "../utils/result";

export interface ApiConfig {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
}

/**
 * A connected session. A ConnectionError means the service could not be
 * reached or refused the session; a structural "no" comes back as a
 * ValidationResult with RemoteRejection entries.
 */
export interface RemoteSession {
  validateForUpload(run: SequencingRun): Promise<Result<ValidationResult, ConnectionError>>;
  upload(run: SequencingRun): Promise<Result<void, ConnectionError>>;
}

export interface RemoteApi {
  connect(config: ApiConfig): Promise<Result<RemoteSession, ConnectionError>>;
}
