import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { TrackingClient, type TrackingClientOptions } from "../client/trackingClient.js";

export const DEFAULT_TRACKING_URI = "http://localhost:5000";

export const TOOL_NAMES = [
  "tracking_get_experiment",
  "tracking_get_experiment_by_name",
  "tracking_create_experiment",
  "tracking_create_run",
  "tracking_update_run",
  "tracking_delete_run",
  "tracking_get_run"
] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

const zConfigFile = z.object({
  version: z.literal(1),
  tracking: z
    .object({
      base_url: z.string().optional(),
      timeout_ms: z.number().int().positive().optional()
    })
    .default({}),
  tool_allowlist: z.array(z.string()).default([...TOOL_NAMES])
});

export interface TrackingConfig {
  version: 1;
  tracking: {
    baseUrl: string;
    timeoutMs: number | null;
  };
  toolAllowlist: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/** `${VAR}` or `$VAR` resolves from the environment; null when unset or blank. */
export function expandEnvToken(value: string, env: Env = process.env): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}

function parseTimeout(raw: string): number {
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new ConfigError(`MLFLOW_HTTP_REQUEST_TIMEOUT_MS must be a positive integer (got ${raw})`);
  }
  return n;
}

export function resolveConfig(raw: unknown, env: Env = process.env, source = "config"): TrackingConfig {
  const parsed = zConfigFile.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid tracking config at ${source}: ${parsed.error.message}`);
  }
  const file = parsed.data;

  const envUri = env.MLFLOW_TRACKING_URI?.trim();
  const fileUri = file.tracking.base_url ? expandEnvToken(file.tracking.base_url, env) : null;
  const baseUrl = envUri || fileUri || DEFAULT_TRACKING_URI;
  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigError(`invalid tracking base_url: ${baseUrl}`);
  }

  const envTimeout = env.MLFLOW_HTTP_REQUEST_TIMEOUT_MS?.trim();
  const timeoutMs = envTimeout ? parseTimeout(envTimeout) : file.tracking.timeout_ms ?? null;

  return {
    version: 1,
    tracking: { baseUrl, timeoutMs },
    toolAllowlist: file.tool_allowlist
  };
}

export async function loadConfigFromFile(filePath: string, env: Env = process.env): Promise<TrackingConfig> {
  const text = await fs.readFile(filePath, "utf8");
  return resolveConfig(YAML.parse(text) as unknown, env, filePath);
}

export function createTrackingClient(
  config: TrackingConfig,
  overrides: Omit<Partial<TrackingClientOptions>, "baseUrl" | "timeoutMs"> = {}
): TrackingClient {
  return new TrackingClient({
    ...overrides,
    baseUrl: config.tracking.baseUrl,
    timeoutMs: config.tracking.timeoutMs ?? undefined
  });
}
