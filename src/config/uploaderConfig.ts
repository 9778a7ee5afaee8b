import { z } from "zod";
import { LOG_LEVELS } from "../logging/logger";
import { PARSER_NAMES } from "../parsers/types";
import { pathExists, readJson } from "../utils/fs";

const ApiConfigSchema = z.object({
  baseUrl: z.string().url(),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  username: z.string().min(1),
  password: z.string().min(1)
});

export const UploaderConfigSchema = z.object({
  parser: z.enum(PARSER_NAMES).default("nextseq"),
  api: ApiConfigSchema,
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
      file: z.string().min(1).optional()
    })
    .default({})
});

export type UploaderConfig = z.infer<typeof UploaderConfigSchema>;

type Env = Record<string, string | undefined>;

const ENV_OVERRIDES: { env: string; path: [string] | [string, string] }[] = [
  { env: "UPLOADER_PARSER", path: ["parser"] },
  { env: "UPLOADER_BASE_URL", path: ["api", "baseUrl"] },
  { env: "UPLOADER_CLIENT_ID", path: ["api", "clientId"] },
  { env: "UPLOADER_CLIENT_SECRET", path: ["api", "clientSecret"] },
  { env: "UPLOADER_USERNAME", path: ["api", "username"] },
  { env: "UPLOADER_PASSWORD", path: ["api", "password"] },
  { env: "LOG_LEVEL", path: ["logging", "level"] },
  { env: "UPLOADER_LOG_FILE", path: ["logging", "file"] }
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Layers environment variables over the file contents; the schema checks the result. */
export function applyEnvOverrides(raw: unknown, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};
  for (const override of ENV_OVERRIDES) {
    const value = env[override.env];
    if (!value) continue;
    const [head, tail] = override.path;
    if (tail === undefined) {
      merged[head] = value;
      continue;
    }
    const section = merged[head];
    merged[head] = { ...(isRecord(section) ? section : {}), [tail]: value };
  }
  return merged;
}

export function parseUploaderConfig(raw: unknown, env: Env = {}): UploaderConfig {
  const parsed = UploaderConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
    );
    throw new Error(`Invalid uploader configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/** A missing file is fine as long as the environment supplies everything. */
export async function loadUploaderConfig(
  configPath: string,
  env: Env = process.env
): Promise<UploaderConfig> {
  const raw = (await pathExists(configPath)) ? await readJson<unknown>(configPath) : {};
  return parseUploaderConfig(raw, env);
}
