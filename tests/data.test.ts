import { strict as assert } from "node:assert";
import { test } from "node:test";
import { mkdtempSync, appendFileSync, rmSync, existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { appendJsonl, readJsonl, ROOT_DIR, DATA_DIR } from "../src/data.js";
import { logRun } from "../src/logger.js";
import type { RunRecord } from "../src/types.js";

test("appendJsonl creates the directory and readJsonl reads records back", () => {
  const dir = mkdtempSync(join(tmpdir(), "aq-data-"));
  try {
    const file = join(dir, "nested", "log.jsonl");
    assert.deepEqual(readJsonl(file), []);
    appendJsonl(file, { a: 1 });
    appendJsonl(file, { a: 2 });
    appendFileSync(file, "{broken\n");
    assert.deepEqual(readJsonl<{ a: number }>(file), [{ a: 1 }, { a: 2 }]);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("logRun appends the run record", () => {
  const dir = mkdtempSync(join(tmpdir(), "aq-runs-"));
  try {
    const file = join(dir, "runs.jsonl");
    const run: RunRecord = {
      runId: "00000000-0000-4000-8000-000000000000",
      startedAt: "2025-12-14T12:00:00.000Z",
      finishedAt: "2025-12-14T12:00:05.000Z",
      status: "success",
      outputPath: "gs://test-bucket/air_quality.csv",
      measurements: 12,
      rowsLoaded: 12,
      cities: ["Warszawa"],
    };
    logRun(run, file);
    assert.deepEqual(readJsonl<RunRecord>(file), [run]);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("ROOT_DIR is the project root holding package.json and the places file", () => {
  assert.ok(existsSync(join(ROOT_DIR, "package.json")));
  assert.ok(existsSync(join(ROOT_DIR, "config", "places.json")));
  assert.equal(DATA_DIR, join(ROOT_DIR, "data"));
});
