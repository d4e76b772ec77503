import path from "node:path";
import { pathToFileURL } from "node:url";

import { ConfigurationError } from "../core/errors.js";
import { Flow } from "../work/flow.js";

import type { App } from "./app.js";

export type AppDefinition = {
  root: Flow;
  /** Driver code run by `workmesh run` once the App has started. */
  main?: (app: App) => Promise<void> | void;
};

export function defineApp(definition: AppDefinition): AppDefinition {
  return definition;
}

/** Imports an entrypoint module whose default export is `defineApp({ ... })`. */
export async function loadAppDefinition(entrypoint: string): Promise<AppDefinition> {
  const resolved = path.resolve(entrypoint);
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(resolved).href);
  } catch (err) {
    throw new ConfigurationError(`Failed to load app definition module ${resolved}`, err);
  }

  const definition = isModule(mod) ? mod.default : undefined;
  if (!isAppDefinition(definition)) {
    throw new ConfigurationError(
      `${resolved} must default-export defineApp({ root }) with a Flow as root`,
    );
  }
  return definition;
}

function isModule(value: unknown): value is { default?: unknown } {
  return typeof value === "object" && value !== null;
}

function isAppDefinition(value: unknown): value is AppDefinition {
  if (typeof value !== "object" || value === null) return false;
  if (!("root" in value) || !(value.root instanceof Flow)) return false;
  return !("main" in value) || value.main === undefined || typeof value.main === "function";
}
