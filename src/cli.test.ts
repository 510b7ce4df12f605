import { describe, it, expect } from "vitest";
import { parseArgs } from "./cli.js";

describe("parseArgs", () => {
  it("defaults every flag", () => {
    expect(parseArgs([])).toEqual({
      command: null,
      targets: [],
      save: false,
      stopOnFailure: false,
      verbose: false,
      showHelp: false,
    });
  });

  it("reads the command and its targets", () => {
    const args = parseArgs(["run", "a.yaml", "scenarios", "--save", "--stop-on-failure", "-v"]);

    expect(args.command).toBe("run");
    expect(args.targets).toEqual(["a.yaml", "scenarios"]);
    expect(args.save).toBe(true);
    expect(args.stopOnFailure).toBe(true);
    expect(args.verbose).toBe(true);
  });

  it("reads options with values", () => {
    expect(
      parseArgs([
        "run",
        "--base-url",
        "http://localhost:8080",
        "--timeout",
        "2.5",
        "--token",
        "test-secret",
        "--config",
        "custom.json",
        "--no-verify-tls",
        "x.yaml",
      ])
    ).toMatchObject({
      command: "run",
      targets: ["x.yaml"],
      baseUrl: "http://localhost:8080",
      timeoutSeconds: 2.5,
      authToken: "test-secret",
      configPath: "custom.json",
      verifyTls: false,
    });
  });

  it("reads the serve port", () => {
    expect(parseArgs(["serve", "--port", "8000"]).port).toBe(8000);
  });

  it("recognizes help", () => {
    expect(parseArgs(["-h"]).showHelp).toBe(true);
    expect(parseArgs(["run", "--help"]).showHelp).toBe(true);
  });

  it("rejects an option without its value", () => {
    expect(() => parseArgs(["run", "--base-url"])).toThrow("Option --base-url requires a value");
    expect(() => parseArgs(["run", "--token", "--save"])).toThrow("Option --token requires a value");
  });

  it("rejects non-positive numbers", () => {
    expect(() => parseArgs(["run", "--timeout", "0"])).toThrow("Option --timeout expects a positive number, got '0'");
    expect(() => parseArgs(["serve", "--port", "abc"])).toThrow("Option --port expects a positive number, got 'abc'");
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["run", "--fast"])).toThrow("Unknown option '--fast'");
  });
});
