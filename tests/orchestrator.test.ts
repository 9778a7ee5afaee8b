import { promises as fs } from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { silentLogger } from "../src/logging/logger";
import { getParser } from "../src/parsers/registry";
import { ParserName } from "../src/parsers/types";
import { STATUS_FILE_NAME, readDirectoryStatus, writeDirectoryStatus } from "../src/progress/statusStore";
import { UploaderContext } from "../src/upload/context";
import { uploadFirstNewRun, uploadRunDirectory, validateRunDirectory } from "../src/upload/orchestrator";
import { UploadState } from "../src/upload/uploadState";
import { FakeBehaviour, FakeRemoteApi, testApiConfig } from "./helpers/fakeRemoteApi";
import { DEFAULT_FILES, createRunDirectory, makeTempRoot, removeTempRoots } from "./helpers/runDirectory";

function contextFor(platform: ParserName, behaviour: FakeBehaviour = {}) {
  const api = new FakeRemoteApi(behaviour);
  const ctx: UploaderContext = {
    parser: getParser(platform),
    api,
    apiConfig: testApiConfig,
    logger: silentLogger()
  };
  return { api, ctx };
}

afterEach(removeTempRoots);

describe("upload orchestrator", () => {
  it("uploads a valid run and marks it COMPLETE", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "nextseq");
    const { api, ctx } = contextFor("nextseq");
    const states: UploadState[] = [];

    const outcome = await uploadRunDirectory(ctx, dir, { onState: (state) => states.push(state) });

    expect(outcome).toEqual({
      directory: dir,
      exitCode: 0,
      finalState: "DONE",
      failure: null,
      statusWriteError: null,
      skipped: false
    });
    expect(states).toEqual([
      "START",
      "STATUS_WRITTEN",
      "PARSED",
      "OFFLINE_VALID",
      "CONNECTED",
      "ONLINE_VALID",
      "UPLOADED",
      "DONE"
    ]);
    expect(await readDirectoryStatus(dir)).toBe("COMPLETE");
    expect(api.uploadCalls).toBe(1);
    const run = api.uploadedRuns[0];
    expect(run.metadata.runId).toBe("run1");
    expect(run.projects.map((project) => [project.id, project.samples.map((s) => s.name)])).toEqual([
      ["75", ["alpha", "beta"]],
      ["76", ["gamma"]]
    ]);
  });

  it("never touches a directory that is missing its completion file", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "nextseq", { withoutCompletionFile: true });
    const { api, ctx } = contextFor("nextseq");

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.failure?.stage).toBe("STATUS_WRITTEN");
    expect(outcome.failure?.error.message).toBe("Directory is missing required file(s): RTAComplete.txt");
    expect(outcome.failure?.statusWritten).toBeNull();
    expect(await fs.readdir(dir)).not.toContain(STATUS_FILE_NAME);
    expect(api.connectCalls).toBe(0);
    expect(api.uploadCalls).toBe(0);
  });

  it("marks the directory ERROR when a sample file is missing", async () => {
    const root = await makeTempRoot();
    const files = DEFAULT_FILES.nextseq.filter((file) => !file.includes("gamma_S3_L001_R2"));
    const dir = await createRunDirectory(root, "run1", "nextseq", { files });
    const { api, ctx } = contextFor("nextseq");

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.finalState).toBe("FAILED");
    expect(outcome.failure?.stage).toBe("OFFLINE_VALID");
    expect(outcome.failure?.statusWritten).toBe("ERROR");
    const error = outcome.failure?.error;
    expect(error?.kind).toBe("ValidationError");
    if (error?.kind !== "ValidationError") return;
    expect(error.result.errors.map((issue) => [issue.kind, issue.entity])).toEqual([["SequenceFileError", "gamma"]]);
    expect(await readDirectoryStatus(dir)).toBe("ERROR");
    expect(api.connectCalls).toBe(0);
  });

  it("reports every parsing problem at once", async () => {
    const root = await makeTempRoot();
    const sheet = [
      "[Header]",
      "Workflow,GenerateFASTQ",
      "[Reads]",
      "151",
      "[Data]",
      "Sample_ID,Sample_Name,Sample_Project",
      "1,alpha,75",
      "2,alpha,75",
      "3,beta,75",
      "4,beta,75"
    ].join("\n");
    const dir = await createRunDirectory(root, "run1", "nextseq", { sheet });
    const { ctx } = contextFor("nextseq");

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.failure?.stage).toBe("PARSED");
    const error = outcome.failure?.error;
    if (error?.kind !== "ValidationError") throw new Error("expected a ValidationError");
    expect(error.result.errors.map((issue) => issue.message)).toEqual([
      "Duplicate sample name 'alpha' in project '75'",
      "Duplicate sample name 'beta' in project '75'"
    ]);
    expect(await readDirectoryStatus(dir)).toBe("ERROR");
  });

  it("leaves the status PARTIAL when the connection fails", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "nextseq");
    const { api, ctx } = contextFor("nextseq", { failConnect: true });

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.failure?.stage).toBe("CONNECTED");
    expect(outcome.failure?.error.kind).toBe("ConnectionError");
    expect(outcome.failure?.statusWritten).toBeNull();
    expect(await readDirectoryStatus(dir)).toBe("PARTIAL");
    expect(api.uploadCalls).toBe(0);
  });

  it("leaves the status PARTIAL when the connection drops during online validation", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "miseq");
    const { ctx } = contextFor("miseq", { failValidate: true });

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.failure?.stage).toBe("ONLINE_VALID");
    expect(await readDirectoryStatus(dir)).toBe("PARTIAL");
  });

  it("marks the directory ERROR when the service rejects the run", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "nextseq");
    const { api, ctx } = contextFor("nextseq", { missingProjects: ["76"] });

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.failure?.stage).toBe("ONLINE_VALID");
    expect(outcome.failure?.statusWritten).toBe("ERROR");
    const error = outcome.failure?.error;
    if (error?.kind !== "ValidationError") throw new Error("expected a ValidationError");
    expect(error.result.errors).toEqual([
      { kind: "RemoteRejection", message: "Project '76' does not exist", entity: "76" }
    ]);
    expect(await readDirectoryStatus(dir)).toBe("ERROR");
    expect(api.uploadCalls).toBe(0);
  });

  it("leaves the status PARTIAL when the upload is interrupted, so a retry starts over", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "directory");
    const failing = contextFor("directory", { failUpload: true });

    const first = await uploadRunDirectory(failing.ctx, dir);

    expect(first.exitCode).toBe(1);
    expect(first.failure?.stage).toBe("UPLOADED");
    expect(await readDirectoryStatus(dir)).toBe("PARTIAL");

    const retry = contextFor("directory");
    const second = await uploadRunDirectory(retry.ctx, dir);

    expect(second.exitCode).toBe(0);
    expect(retry.api.uploadCalls).toBe(1);
    expect(await readDirectoryStatus(dir)).toBe("COMPLETE");
  });

  it("does not upload a COMPLETE directory again unless forced", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "nextseq");
    const { api, ctx } = contextFor("nextseq");

    await uploadRunDirectory(ctx, dir);
    const again = await uploadRunDirectory(ctx, dir);

    expect(again.skipped).toBe(true);
    expect(again.exitCode).toBe(0);
    expect(api.uploadCalls).toBe(1);

    const forced = await uploadRunDirectory(ctx, dir, { force: true });
    expect(forced.finalState).toBe("DONE");
    expect(api.uploadCalls).toBe(2);
  });

  it("stops before parsing when the PARTIAL marker cannot be written", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "nextseq");
    await fs.mkdir(path.join(dir, STATUS_FILE_NAME));
    const { api, ctx } = contextFor("nextseq");

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.failure?.stage).toBe("STATUS_WRITTEN");
    expect(outcome.failure?.error.kind).toBe("DirectoryError");
    expect(outcome.failure?.statusWritten).toBeNull();
    expect((await fs.stat(path.join(dir, STATUS_FILE_NAME))).isDirectory()).toBe(true);
    expect(api.connectCalls).toBe(0);
  });

  it("still succeeds when the final COMPLETE write fails, but says so", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "nextseq");
    const { ctx } = contextFor("nextseq", {
      onUpload: async () => {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    const outcome = await uploadRunDirectory(ctx, dir);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.finalState).toBe("DONE");
    expect(outcome.failure).toBeNull();
    expect(outcome.statusWriteError?.kind).toBe("DirectoryError");
  });

  it("uploads only the first new run under a root", async () => {
    const root = await makeTempRoot();
    const done = await createRunDirectory(root, "a", "nextseq");
    await writeDirectoryStatus(done, "COMPLETE");
    await createRunDirectory(root, "b", "nextseq", { withoutCompletionFile: true });
    const fresh = await createRunDirectory(root, "c", "nextseq");
    const later = await createRunDirectory(root, "d", "nextseq");
    const { api, ctx } = contextFor("nextseq");

    const result = await uploadFirstNewRun(ctx, root);

    expect(result.ok ? result.value?.directory : null).toBe(fresh);
    expect(api.uploadCalls).toBe(1);
    expect(await readDirectoryStatus(later)).toBe("NEW");
  });

  it("reports nothing to do when no run is new", async () => {
    const root = await makeTempRoot();
    const { api, ctx } = contextFor("nextseq");

    expect(await uploadFirstNewRun(ctx, root)).toEqual({ ok: true, value: null });
    expect(api.connectCalls).toBe(0);
  });

  it("validates offline without writing a status", async () => {
    const root = await makeTempRoot();
    const dir = await createRunDirectory(root, "run1", "miseq");
    const { ctx } = contextFor("miseq");

    const run = await validateRunDirectory(ctx, dir);

    expect(run.ok ? run.value.metadata.experimentName : null).toBe("Small Run");
    expect(await readDirectoryStatus(dir)).toBe("NEW");
  });
});
