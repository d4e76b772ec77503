import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "./errors.js";
import { defaultLogsDir } from "./paths.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const BackendKindSchema = z.enum(["local", "process", "docker"]);
export type BackendKind = z.infer<typeof BackendKindSchema>;

const BackendSchema = z.object({
  type: BackendKindSchema.default("local"),
});

const CallSchema = z.object({
  // Unset means callers wait until the response arrives or the work is killed.
  timeout_ms: z.number().int().positive().optional(),
});

const StateSchema = z.object({
  max_buffered_deltas: z.number().int().positive().default(64),
  publish_snapshots: z.boolean().default(true),
});

const ProcessSchema = z.object({
  worker_script: z.string().min(1).optional(),
  node_options: z.array(z.string()).default([]),
  kill_timeout_ms: z.number().int().positive().default(5_000),
});

const DockerResourcesSchema = z.object({
  memory_mb: z.number().int().positive().optional(),
  cpu_quota: z.number().int().positive().optional(),
  cpu_period: z.number().int().positive().optional(),
  pids_limit: z.number().int().positive().optional(),
});

const DockerSchema = z.object({
  image: z.string().min(1).default("workmesh-worker:latest"),
  worker_script: z.string().min(1).default("/app/dist/worker/index.js"),
  entrypoint_dir: z.string().min(1).default("/app/entry"),
  network_mode: z.enum(["bridge", "none"]).default("bridge"),
  user: z.string().min(1).optional(),
  stop_timeout_seconds: z.number().int().nonnegative().default(10),
  resources: DockerResourcesSchema.optional(),
});

export const AppConfigSchema = z.object({
  queue_id: z.string().min(1).optional(),
  backend: BackendSchema.default({}),
  poll_interval_ms: z.number().int().positive().default(250),
  call: CallSchema.default({}),
  state: StateSchema.default({}),
  process: ProcessSchema.default({}),
  docker: DockerSchema.default({}),
  logs_dir: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigurationError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// LOADING
// =============================================================================

export function parseAppConfig(doc: unknown, source = "<inline>"): AppConfig {
  const expanded = expandEnv(doc ?? {}, { file: source, trail: [] });

  const parsed = AppConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid workmesh config: ${source}\n${parsed.error.toString()}`);
  }

  const cfg = parsed.data;
  return {
    ...cfg,
    logs_dir: path.resolve(cfg.logs_dir ?? defaultLogsDir()),
    process: {
      ...cfg.process,
      worker_script: cfg.process.worker_script
        ? path.resolve(cfg.process.worker_script)
        : undefined,
    },
  };
}

export function loadAppConfig(configPath: string): AppConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Workmesh config not found at: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigurationError(`Failed to parse YAML config: ${configPath}`, err);
  }

  return parseAppConfig(doc, configPath);
}

export function resolveAppConfig(configPath?: string): AppConfig {
  return configPath ? loadAppConfig(configPath) : parseAppConfig({});
}
