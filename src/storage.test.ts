/**
 * Tests for the storage module
 * Covers scenario discovery, run persistence, filtering and retention
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import {
  findScenario,
  getRun,
  initStorage,
  listRuns,
  listScenarios,
  saveRun,
  slugify,
  validateId,
} from "./storage.js";
import { makeTempDir, removeDir, scenarioResult } from "./__tests__/helpers.js";

const VALID = (name: string) => `scenario:\n  name: ${name}\n  description: About ${name}\n  steps:\n    - name: Ping\n      api: GET /ping\n`;

describe("Storage Module", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("storage");
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  describe("initStorage", () => {
    it("should create the results directory", async () => {
      await initStorage(tempDir);
      const stats = await fs.stat(path.join(tempDir, "results"));
      expect(stats.isDirectory()).toBe(true);
    });

    it("should reject an empty directory name", async () => {
      await expect(initStorage("")).rejects.toThrow("Invalid storage directory: storageDir must be a non-empty string");
    });
  });

  describe("listScenarios", () => {
    it("should return an empty list for a missing directory", async () => {
      expect(await listScenarios(path.join(tempDir, "nope"))).toEqual([]);
    });

    it("should list scenario files sorted by id", async () => {
      await fs.writeFile(path.join(tempDir, "b-flow.yaml"), VALID("B flow"));
      await fs.writeFile(
        path.join(tempDir, "a.json"),
        JSON.stringify({ scenario: { name: "A", steps: [{ name: "Ping", api: "GET /ping" }] } })
      );
      await fs.writeFile(path.join(tempDir, "notes.txt"), "not a scenario");

      expect(await listScenarios(tempDir)).toEqual([
        { id: "a", file: path.join(tempDir, "a.json"), name: "A", description: "" },
        { id: "b-flow", file: path.join(tempDir, "b-flow.yaml"), name: "B flow", description: "About B flow" },
      ]);
    });

    it("should list unparseable files with their error", async () => {
      await fs.writeFile(path.join(tempDir, "broken.yml"), "scenario: {}\n");

      expect(await listScenarios(tempDir)).toEqual([
        {
          id: "broken",
          file: path.join(tempDir, "broken.yml"),
          name: "broken",
          description: "",
          error: "Scenario is missing 'name'",
        },
      ]);
    });

    it("should skip files without a usable id", async () => {
      await fs.writeFile(path.join(tempDir, "___.yaml"), VALID("Hidden"));
      expect(await listScenarios(tempDir)).toEqual([]);
    });
  });

  describe("findScenario", () => {
    it("should find a scenario by id", async () => {
      await fs.writeFile(path.join(tempDir, "Checkout Flow.yaml"), VALID("Checkout"));

      const entry = await findScenario(tempDir, "checkout-flow");
      expect(entry?.name).toBe("Checkout");
      expect(await findScenario(tempDir, "missing")).toBeNull();
    });

    it("should reject path traversal", async () => {
      await expect(findScenario(tempDir, "../etc")).rejects.toThrow("Invalid ID: contains path traversal characters: ../etc");
    });
  });

  describe("saveRun", () => {
    it("should write the run atomically", async () => {
      const run = await saveRun(tempDir, "checkout", scenarioResult(true, { duration_ms: 1500 }));

      expect(run.id).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z-\d{6}$/);
      expect(run.scenarioId).toBe("checkout");
      expect(run.status).toBe("passed");
      expect(run.duration_ms).toBe(1500);
      expect(new Date(run.completedAt).getTime() - new Date(run.startedAt).getTime()).toBe(1500);

      const files = await fs.readdir(path.join(tempDir, "results", "checkout"));
      expect(files).toEqual([`${run.id}.json`]);
    });

    it("should record failed runs", async () => {
      const run = await saveRun(tempDir, "checkout", scenarioResult(false));
      expect(run.status).toBe("failed");
    });

    it("should reject an invalid scenario id", async () => {
      await expect(saveRun(tempDir, "a/b", scenarioResult(true))).rejects.toThrow("Invalid ID");
    });

    it("should keep only the newest runs", async () => {
      const first = await saveRun(tempDir, "checkout", scenarioResult(true), 2);
      const second = await saveRun(tempDir, "checkout", scenarioResult(true), 2);
      const third = await saveRun(tempDir, "checkout", scenarioResult(false), 2);

      const runs = await listRuns(tempDir, "checkout");
      expect(runs.map((r) => r.id)).toEqual([third.id, second.id]);
      expect(await getRun(tempDir, "checkout", first.id)).toBeNull();
    });
  });

  describe("listRuns", () => {
    it("should return an empty list for an unknown scenario", async () => {
      expect(await listRuns(tempDir, "unknown")).toEqual([]);
    });

    it("should sort newest first and apply filters", async () => {
      const a = await saveRun(tempDir, "checkout", scenarioResult(true));
      const b = await saveRun(tempDir, "checkout", scenarioResult(false));
      const c = await saveRun(tempDir, "checkout", scenarioResult(true));

      expect((await listRuns(tempDir, "checkout")).map((r) => r.id)).toEqual([c.id, b.id, a.id]);
      expect((await listRuns(tempDir, "checkout", { status: "passed" })).map((r) => r.id)).toEqual([c.id, a.id]);
      expect((await listRuns(tempDir, "checkout", { status: "failed" })).map((r) => r.id)).toEqual([b.id]);
      expect((await listRuns(tempDir, "checkout", { limit: 1 })).map((r) => r.id)).toEqual([c.id]);
    });

    it("should skip corrupted result files", async () => {
      const run = await saveRun(tempDir, "checkout", scenarioResult(true));
      await fs.writeFile(path.join(tempDir, "results", "checkout", "corrupt.json"), "{ not json");
      await fs.writeFile(path.join(tempDir, "results", "checkout", "other.json"), JSON.stringify({ hello: "world" }));

      expect((await listRuns(tempDir, "checkout")).map((r) => r.id)).toEqual([run.id]);
    });
  });

  describe("getRun", () => {
    it("should return a saved run", async () => {
      const run = await saveRun(tempDir, "checkout", scenarioResult(true));
      expect(await getRun(tempDir, "checkout", run.id)).toEqual(run);
    });

    it("should return null for an unknown run", async () => {
      expect(await getRun(tempDir, "checkout", "nope")).toBeNull();
    });
  });

  describe("slugify", () => {
    it("should produce file-safe slugs", () => {
      expect(slugify("My Scenario!")).toBe("my-scenario");
      expect(slugify("  --A__b--  ")).toBe("a-b");
    });

    it("should reject empty and oversized slugs", () => {
      expect(() => slugify("!!!")).toThrow("Invalid name: slug cannot be empty");
      expect(() => slugify("a".repeat(101))).toThrow("Invalid name: slug cannot exceed 100 characters");
    });
  });

  describe("validateId", () => {
    it("should reject empty ids and separators", () => {
      expect(() => validateId("")).toThrow("Invalid ID: must not be empty");
      expect(() => validateId("a\\b")).toThrow("Invalid ID: contains path traversal characters: a\\b");
      expect(() => validateId("run-1")).not.toThrow();
    });
  });
});
