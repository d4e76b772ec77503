import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, beforeAll } from "vitest";

// =============================================================================
// WORKMESH_HOME ISOLATION
// =============================================================================

let tempHome: string | undefined;
let previousHome: string | undefined;

beforeAll(() => {
  previousHome = process.env.WORKMESH_HOME;
  tempHome = fs.mkdtempSync(path.join(os.tmpdir(), "workmesh-home-"));
  process.env.WORKMESH_HOME = tempHome;
});

afterAll(() => {
  if (previousHome === undefined) {
    delete process.env.WORKMESH_HOME;
  } else {
    process.env.WORKMESH_HOME = previousHome;
  }
  if (tempHome) {
    fs.rmSync(tempHome, { recursive: true, force: true });
  }
});
