import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "apiflow-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", () => {
    const config = loadConfig("/nonexistent/path.json", {});
    expect(config.timeoutSeconds).toBe(30);
    expect(config.verifyTls).toBe(true);
    expect(config.storageDir).toBe(".apiflow");
    expect(config.logLevel).toBe("info");
    expect(config.baseUrl).toBeUndefined();
  });

  it("merges the file over the defaults", async () => {
    const file = path.join(dir, "apiflow.config.json");
    await fs.writeFile(file, JSON.stringify({ baseUrl: "http://api.test", timeoutSeconds: 5 }));

    const config = loadConfig(file, {});
    expect(config.baseUrl).toBe("http://api.test");
    expect(config.timeoutSeconds).toBe(5);
    expect(config.port).toBe(3000);
  });

  it("lets environment variables win over the file", async () => {
    const file = path.join(dir, "apiflow.config.json");
    await fs.writeFile(file, JSON.stringify({ baseUrl: "http://file.test" }));

    const config = loadConfig(file, {
      APIFLOW_BASE_URL: "http://env.test",
      APIFLOW_AUTH_TOKEN: "test-secret",
      APIFLOW_LOG_LEVEL: "debug",
    });
    expect(config.baseUrl).toBe("http://env.test");
    expect(config.authToken).toBe("test-secret");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects malformed JSON", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json");
    expect(() => loadConfig(file, {})).toThrow(ConfigurationError);
  });

  it("rejects values of the wrong type", async () => {
    const file = path.join(dir, "apiflow.config.json");
    await fs.writeFile(file, JSON.stringify({ timeoutSeconds: "soon" }));
    expect(() => loadConfig(file, {})).toThrow(/timeoutSeconds/);
  });
});
