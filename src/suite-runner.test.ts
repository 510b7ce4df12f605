/**
 * Tests for the suite runner
 * Covers sequential execution, parse failures, stop-on-failure, saving and file collection
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { listRuns } from "./storage.js";
import { collectScenarioFiles, runSuite, type SuiteEvent } from "./suite-runner.js";
import type { RunEvent } from "./types.js";
import { FakeTransport, jsonResponse, makeTempDir, removeDir } from "./__tests__/helpers.js";

function scenarioText(name: string, apiPath: string): string {
  return `scenario:
  name: ${name}
  config:
    base_url: http://api.test
  steps:
    - name: Call ${apiPath}
      api: GET ${apiPath}
`;
}

describe("Suite Runner", () => {
  let dir: string;
  let transport: FakeTransport;
  let ok: string;
  let fail: string;
  let bad: string;

  beforeEach(async () => {
    dir = await makeTempDir("suite");
    transport = new FakeTransport((req) =>
      req.url.endsWith("/fail") ? jsonResponse(500, { error: "boom" }) : jsonResponse(200, { ok: true })
    );

    ok = path.join(dir, "ok.yaml");
    fail = path.join(dir, "fail.yaml");
    bad = path.join(dir, "bad.yaml");
    await fs.writeFile(ok, scenarioText("Healthy", "/ok"));
    await fs.writeFile(fail, scenarioText("Broken backend", "/fail"));
    await fs.writeFile(bad, "scenario: {}\n");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("runSuite", () => {
    it("should run every file and count outcomes", async () => {
      const result = await runSuite({ files: [ok, fail], run: { transport } });

      expect(result.total).toBe(2);
      expect(result.passed).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.skipped).toBe(0);
      expect(result.scenarios.map((s) => [s.name, s.status])).toEqual([
        ["Healthy", "passed"],
        ["Broken backend", "failed"],
      ]);
      expect(result.scenarios[1].result?.step_results[0].errors).toEqual(["Unexpected status code: 500"]);
      expect(transport.requests.map((r) => r.url)).toEqual(["http://api.test/ok", "http://api.test/fail"]);
    });

    it("should emit suite events in order", async () => {
      const events: SuiteEvent[] = [];
      const scenarioEvents: RunEvent[] = [];

      await runSuite({ files: [ok, fail], run: { transport } }, (e) => events.push(e), (e) => scenarioEvents.push(e));

      expect(events.map((e) => e.type)).toEqual([
        "suite:start",
        "suite:scenario_start",
        "suite:scenario_complete",
        "suite:scenario_start",
        "suite:scenario_complete",
        "suite:complete",
      ]);
      expect(scenarioEvents.filter((e) => e.type === "scenario:complete")).toHaveLength(2);
    });

    it("should count a file that cannot be parsed as failed", async () => {
      const result = await runSuite({ files: [bad, ok], run: { transport } });

      expect(result.scenarios[0]).toMatchObject({
        file: bad,
        name: "bad.yaml",
        status: "failed",
        error: "Scenario is missing 'name'",
      });
      expect(result.scenarios[1].status).toBe("passed");
    });

    it("should skip the remaining files after a failure when asked", async () => {
      const result = await runSuite({ files: [fail, ok], run: { transport }, stopOnFailure: true });

      expect(result.failed).toBe(1);
      expect(result.skipped).toBe(1);
      expect(result.scenarios[1]).toEqual({ file: ok, name: "ok.yaml", status: "skipped", duration_ms: 0 });
      expect(transport.requests).toHaveLength(1);
    });

    it("should keep going after a failure by default", async () => {
      const result = await runSuite({ files: [fail, ok], run: { transport } });
      expect(result.skipped).toBe(0);
      expect(result.passed).toBe(1);
    });

    it("should save runs under the file's id", async () => {
      const storageDir = path.join(dir, "store");
      const result = await runSuite({ files: [ok], run: { transport }, storageDir });

      const runs = await listRuns(storageDir, "ok");
      expect(runs).toHaveLength(1);
      expect(result.scenarios[0].runId).toBe(runs[0].id);
      expect(runs[0].status).toBe("passed");
    });

    it("should ignore listener errors", async () => {
      const result = await runSuite({ files: [ok], run: { transport } }, () => {
        throw new Error("listener failed");
      });
      expect(result.passed).toBe(1);
    });
  });

  describe("collectScenarioFiles", () => {
    it("should expand directories to sorted scenario files", async () => {
      await fs.writeFile(path.join(dir, "notes.md"), "# notes");
      await fs.writeFile(path.join(dir, "data.JSON"), "{}");

      expect(await collectScenarioFiles([dir])).toEqual([
        bad,
        path.join(dir, "data.JSON"),
        fail,
        ok,
      ]);
    });

    it("should keep explicit files in the given order", async () => {
      expect(await collectScenarioFiles([ok, bad])).toEqual([ok, bad]);
    });

    it("should fail for a missing path", async () => {
      await expect(collectScenarioFiles([path.join(dir, "missing.yaml")])).rejects.toThrow();
    });
  });
});
