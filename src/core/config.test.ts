import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadAppConfig, parseAppConfig, resolveAppConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const tempDirs: string[] = [];

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "workmesh-config-"));
  tempDirs.push(dir);
  const file = path.join(dir, "workmesh.yaml");
  fs.writeFileSync(file, contents);
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  delete process.env.WORKMESH_TEST_IMAGE;
});

describe("parseAppConfig", () => {
  it("fills in defaults", () => {
    const config = parseAppConfig({});

    expect(config.backend.type).toBe("local");
    expect(config.poll_interval_ms).toBe(250);
    expect(config.call.timeout_ms).toBeUndefined();
    expect(config.state).toEqual({ max_buffered_deltas: 64, publish_snapshots: true });
    expect(config.process.kill_timeout_ms).toBe(5_000);
    expect(config.docker.image).toBe("workmesh-worker:latest");
    expect(config.logs_dir).toBe(path.join(process.env.WORKMESH_HOME ?? "", "logs"));
  });

  it("rejects unknown backends", () => {
    expect(() => parseAppConfig({ backend: { type: "cloud" } })).toThrow(ConfigurationError);
  });

  it("resolves a configured worker script to an absolute path", () => {
    const config = parseAppConfig({ process: { worker_script: "dist/worker/index.js" } });
    expect(config.process.worker_script).toBe(path.resolve("dist/worker/index.js"));
  });
});

describe("loadAppConfig", () => {
  it("expands environment variables in YAML values", () => {
    process.env.WORKMESH_TEST_IMAGE = "registry.local/worker:7";
    const file = writeConfig(
      ["backend:", "  type: docker", "docker:", "  image: ${WORKMESH_TEST_IMAGE}", ""].join("\n"),
    );

    const config = loadAppConfig(file);

    expect(config.backend.type).toBe("docker");
    expect(config.docker.image).toBe("registry.local/worker:7");
  });

  it("names the missing variable and where it is used", () => {
    const file = writeConfig(["docker:", "  image: ${WORKMESH_TEST_IMAGE}", ""].join("\n"));

    expect(() => loadAppConfig(file)).toThrow(
      `Environment variable WORKMESH_TEST_IMAGE is not set but is referenced in ${file} (docker.image).`,
    );
  });

  it("reports a missing file", () => {
    expect(() => loadAppConfig("/nonexistent/workmesh.yaml")).toThrow(
      "Workmesh config not found at: /nonexistent/workmesh.yaml",
    );
  });

  it("reports invalid YAML", () => {
    const file = writeConfig("backend: [unclosed\n");
    expect(() => loadAppConfig(file)).toThrow(`Failed to parse YAML config: ${file}`);
  });

  it("uses defaults without a path", () => {
    expect(resolveAppConfig().backend.type).toBe("local");
  });
});
