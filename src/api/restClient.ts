import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import {
  ConnectionError,
  ValidationIssue,
  connectionError,
  messageOf,
  remoteRejection
} from "../types/errors";
import { Project, Sample, SequenceFile, SequencingRun } from "../types/sequencingRun";
import { ValidationResult, validationResult } from "../types/validation";
import { Result, err, ok } from "../utils/result";
import {
  CreatedSampleResponseSchema,
  ProjectResponseSchema,
  SampleListResponseSchema,
  TokenResponseSchema
} from "./schemas";
import { ApiConfig, RemoteApi, RemoteSession } from "./types";

function isConnectivityStatus(status: number): boolean {
  return status === 401 || status === 403 || status >= 500;
}

async function send(url: string, init: RequestInit): Promise<Result<Response, ConnectionError>> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    return err(connectionError(`Request to ${url} failed: ${messageOf(error)}`, null, url));
  }
  if (isConnectivityStatus(response.status)) {
    const text = await response.text().catch(() => "");
    return err(
      connectionError(
        `Request to ${url} failed (${response.status}): ${text}`.trim(),
        response.status,
        url
      )
    );
  }
  return ok(response);
}

async function readBody<T>(
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  url: string
): Promise<Result<T, ConnectionError>> {
  let json: unknown;
  try {
    json = await response.json();
  } catch (error) {
    return err(connectionError(`Response from ${url} is not JSON: ${messageOf(error)}`, response.status, url));
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return err(connectionError(`Unexpected response shape from ${url}: ${issues}`, response.status, url));
  }
  return ok(parsed.data);
}

function pairFiles(files: SequenceFile[]): [SequenceFile, SequenceFile][] {
  const forward = files.filter((file) => file.direction === "forward");
  const reverse = files.filter((file) => file.direction === "reverse");
  return forward.map((file, index): [SequenceFile, SequenceFile] => [file, reverse[index]]);
}

export class RestSession implements RemoteSession {
  constructor(
    private readonly baseUrl: string,
    private readonly accessToken: string
  ) {}

  async validateForUpload(run: SequencingRun): Promise<Result<ValidationResult, ConnectionError>> {
    const issues: ValidationIssue[] = [];
    for (const project of run.projects) {
      const url = this.url(`/api/projects/${encodeURIComponent(project.id)}`);
      const sent = await send(url, { headers: this.headers() });
      if (!sent.ok) return sent;

      const response = sent.value;
      if (response.status === 404) {
        issues.push(remoteRejection(`Project '${project.id}' does not exist`, project.id));
        continue;
      }
      if (!response.ok) {
        issues.push(
          remoteRejection(`Project '${project.id}' cannot be used (status ${response.status})`, project.id)
        );
        continue;
      }
      const body = await readBody(response, ProjectResponseSchema, url);
      if (!body.ok) return body;
    }
    return ok(validationResult(issues));
  }

  async upload(run: SequencingRun): Promise<Result<void, ConnectionError>> {
    for (const project of run.projects) {
      const existing = await this.listSamples(project);
      if (!existing.ok) return existing;

      for (const sample of project.samples) {
        const sampleId = existing.value.get(sample.name) ?? null;
        const resolved = sampleId ? ok(sampleId) : await this.createSample(project, sample);
        if (!resolved.ok) return resolved;

        const uploaded = await this.uploadFiles(resolved.value, sample, run);
        if (!uploaded.ok) return uploaded;
      }
    }
    return ok(undefined);
  }

  private async listSamples(project: Project): Promise<Result<Map<string, string>, ConnectionError>> {
    const url = this.url(`/api/projects/${encodeURIComponent(project.id)}/samples`);
    const sent = await send(url, { headers: this.headers() });
    if (!sent.ok) return sent;
    if (!sent.value.ok) {
      return err(connectionError(`Listing samples failed (${sent.value.status})`, sent.value.status, url));
    }
    const body = await readBody(sent.value, SampleListResponseSchema, url);
    if (!body.ok) return body;
    return ok(new Map(body.value.resource.resources.map((entry) => [entry.sampleName, entry.identifier])));
  }

  private async createSample(project: Project, sample: Sample): Promise<Result<string, ConnectionError>> {
    const url = this.url(`/api/projects/${encodeURIComponent(project.id)}/samples`);
    const sent = await send(url, {
      method: "POST",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify({ sampleName: sample.name, description: sample.description })
    });
    if (!sent.ok) return sent;
    if (!sent.value.ok) {
      return err(
        connectionError(`Creating sample '${sample.name}' failed (${sent.value.status})`, sent.value.status, url)
      );
    }
    const body = await readBody(sent.value, CreatedSampleResponseSchema, url);
    if (!body.ok) return body;
    return ok(body.value.resource.identifier);
  }

  private async uploadFiles(
    sampleId: string,
    sample: Sample,
    run: SequencingRun
  ): Promise<Result<void, ConnectionError>> {
    const paired = sample.files.some((file) => file.direction === "reverse");
    const groups: SequenceFile[][] = paired
      ? pairFiles(sample.files)
      : sample.files.map((file) => [file]);
    const endpoint = paired ? "pairs" : "sequenceFiles";
    const url = this.url(`/api/samples/${encodeURIComponent(sampleId)}/${endpoint}`);

    for (const group of groups) {
      const form = new FormData();
      for (const [index, file] of group.entries()) {
        let content: Buffer;
        try {
          content = await fs.readFile(file.path);
        } catch (error) {
          return err(connectionError(`Could not read ${file.path}: ${messageOf(error)}`, null, sample.name));
        }
        form.append(paired ? `file${index + 1}` : "file", new Blob([content]), path.basename(file.path));
      }
      form.append("parameters", JSON.stringify({ ...run.metadata, sampleName: sample.name }));

      const sent = await send(url, { method: "POST", headers: this.headers(), body: form });
      if (!sent.ok) return sent;
      if (!sent.value.ok) {
        return err(
          connectionError(`Upload for sample '${sample.name}' failed (${sent.value.status})`, sent.value.status, url)
        );
      }
    }
    return ok(undefined);
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}`, Accept: "application/json" };
  }

  private url(pathname: string): string {
    return `${this.baseUrl}${pathname}`;
  }
}

export class RestUploadApi implements RemoteApi {
  async connect(config: ApiConfig): Promise<Result<RemoteSession, ConnectionError>> {
    const baseUrl = config.baseUrl.replace(/\/+$/, "");
    const url = `${baseUrl}/oauth/token`;
    const sent = await send(url, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
      body: new URLSearchParams({
        grant_type: "password",
        client_id: config.clientId,
        client_secret: config.clientSecret,
        username: config.username,
        password: config.password
      })
    });
    if (!sent.ok) return sent;
    if (!sent.value.ok) {
      return err(connectionError(`Authentication failed (${sent.value.status})`, sent.value.status, url));
    }
    const body = await readBody(sent.value, TokenResponseSchema, url);
    if (!body.ok) return body;
    return ok(new RestSession(baseUrl, body.value.access_token));
  }
}
