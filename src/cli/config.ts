import path from "node:path";

import yaml from "js-yaml";

import { BackendKindSchema, resolveAppConfig, type AppConfig } from "../core/config.js";
import { ConfigurationError } from "../core/errors.js";

export type ConfigOverrides = {
  config?: string;
  backend?: string;
  queueId?: string;
};

/** Loads the YAML config (or defaults) and applies command-line overrides. */
export function loadConfigForCli(opts: ConfigOverrides): AppConfig {
  const config = resolveAppConfig(opts.config ? path.resolve(opts.config) : undefined);

  let backend = config.backend;
  if (opts.backend !== undefined) {
    const parsed = BackendKindSchema.safeParse(opts.backend);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Unknown backend "${opts.backend}"; expected one of ${BackendKindSchema.options.join(", ")}`,
      );
    }
    backend = { ...backend, type: parsed.data };
  }

  return {
    ...config,
    backend,
    queue_id: opts.queueId ?? config.queue_id,
  };
}

export function configCommand(opts: ConfigOverrides): void {
  const config = loadConfigForCli(opts);
  process.stdout.write(yaml.dump(config, { skipInvalid: true }));
}
