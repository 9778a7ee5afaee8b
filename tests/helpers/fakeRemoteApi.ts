import { ApiConfig, RemoteApi, RemoteSession } from "../../src/api/types";
import { ConnectionError, connectionError, remoteRejection } from "../../src/types/errors";
import { SequencingRun } from "../../src/types/sequencingRun";
import { ValidationResult, validationResult } from "../../src/types/validation";
import { Result, err, ok } from "../../src/utils/result";

export interface FakeBehaviour {
  failConnect?: boolean;
  failValidate?: boolean;
  failUpload?: boolean;
  /** Projects the service reports as missing. */
  missingProjects?: string[];
  onUpload?: (run: SequencingRun) => Promise<void>;
}

export const testApiConfig: ApiConfig = {
  baseUrl: "http://localhost:9999/samples",
  clientId: "uploader",
  clientSecret: "test-secret",
  username: "tester",
  password: "test-password"
};

export class FakeRemoteApi implements RemoteApi {
  connectCalls = 0;
  validateCalls = 0;
  uploadCalls = 0;
  uploadedRuns: SequencingRun[] = [];

  constructor(private readonly behaviour: FakeBehaviour = {}) {}

  async connect(_config: ApiConfig): Promise<Result<RemoteSession, ConnectionError>> {
    this.connectCalls += 1;
    if (this.behaviour.failConnect) {
      return err(connectionError("Connection refused", null, testApiConfig.baseUrl));
    }
    return ok(this.session());
  }

  private session(): RemoteSession {
    return {
      validateForUpload: async (run: SequencingRun): Promise<Result<ValidationResult, ConnectionError>> => {
        this.validateCalls += 1;
        if (this.behaviour.failValidate) {
          return err(connectionError("Lost connection during validation"));
        }
        const missing = this.behaviour.missingProjects ?? [];
        return ok(
          validationResult(
            run.projects
              .filter((project) => missing.includes(project.id))
              .map((project) => remoteRejection(`Project '${project.id}' does not exist`, project.id))
          )
        );
      },
      upload: async (run: SequencingRun): Promise<Result<void, ConnectionError>> => {
        this.uploadCalls += 1;
        if (this.behaviour.onUpload) {
          await this.behaviour.onUpload(run);
        }
        if (this.behaviour.failUpload) {
          return err(connectionError("Lost connection during upload", 503));
        }
        this.uploadedRuns.push(run);
        return ok(undefined);
      }
    };
  }
}
