import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { MalformedScenarioError, MalformedStepError, ScenarioFileError } from "./errors.js";
import { parseScenario, parseScenarioFile, parseScenarioText, validateScenario } from "./scenario-parser.js";
import type { ScenarioConfig, StepConfig } from "./types.js";
import { makeTempDir, removeDir } from "./__tests__/helpers.js";

const MINIMAL = `
scenario:
  name: Minimal
  steps:
    - name: Ping
      api: GET /ping
`;

function step(overrides: Partial<StepConfig> = {}): StepConfig {
  return {
    name: "Ping",
    api: "GET /ping",
    request: { headers: {}, query: {} },
    extract: [],
    assert: [],
    vars: {},
    ...overrides,
  };
}

function scenario(overrides: Partial<ScenarioConfig> = {}): ScenarioConfig {
  return {
    name: "Checks",
    description: "",
    version: "2.0",
    config: {},
    setup: [],
    steps: [step()],
    teardown: [],
    ...overrides,
  };
}

describe("parseScenarioText", () => {
  it("fills defaults for optional fields", () => {
    expect(parseScenarioText(MINIMAL)).toEqual({
      name: "Minimal",
      description: "",
      version: "2.0",
      config: {},
      setup: [],
      steps: [step()],
      teardown: [],
    });
  });

  it("parses every step field", () => {
    const parsed = parseScenarioText(`
scenario:
  name: Full
  description: Everything at once
  version: 3
  config:
    base_url: http://api.test
    timeout: 5
  steps:
    - name: Create
      api: POST /users
      request:
        headers:
          X-Trace: abc
        query:
          dry_run: true
        body:
          name: ann
      extract:
        - name: user_id
          path: $.data.id
      assert: status_code == 201
      vars:
        role: admin
      when: enabled == True
      condition:
        if: user_id > 0
        then:
          - name: Follow up
            api: GET /users/\${user_id}
      loop:
        count: 3
`);

    expect(parsed.description).toBe("Everything at once");
    expect(parsed.version).toBe("3.0");
    expect(parsed.config).toEqual({ base_url: "http://api.test", timeout: 5 });

    const [create] = parsed.steps;
    expect(create.request).toEqual({ headers: { "X-Trace": "abc" }, query: { dry_run: true }, body: { name: "ann" } });
    expect(create.extract).toEqual([{ name: "user_id", path: "$.data.id" }]);
    expect(create.assert).toEqual(["status_code == 201"]);
    expect(create.vars).toEqual({ role: "admin" });
    expect(create.when).toBe("enabled == True");
    expect(create.condition).toEqual({
      if: "user_id > 0",
      then: [step({ name: "Follow up", api: "GET /users/${user_id}" })],
      else: [],
    });
    expect(create.loop).toEqual({ count: 3 });
    expect(create.parallel).toBeUndefined();
  });

  it("keeps the decimal place of an unquoted version", () => {
    expect(parseScenarioText(MINIMAL.replace("  name: Minimal", "  name: Minimal\n  version: 2.0")).version).toBe("2.0");
    expect(parseScenarioText(MINIMAL.replace("  name: Minimal", "  name: Minimal\n  version: 2.5")).version).toBe("2.5");
    expect(parseScenarioText(MINIMAL.replace("  name: Minimal", '  name: Minimal\n  version: "1.10"')).version).toBe("1.10");
  });

  it("accepts JSON documents", () => {
    const parsed = parseScenarioText(JSON.stringify({ scenario: { name: "Json", steps: [{ name: "Ping", api: "GET /ping" }] } }));
    expect(parsed.name).toBe("Json");
    expect(parsed.steps).toEqual([step()]);
  });

  it("rejects invalid YAML", () => {
    expect(() => parseScenarioText("scenario: [")).toThrow(/^Invalid YAML: /);
  });

  it("rejects documents without the scenario root", () => {
    expect(() => parseScenarioText("name: x")).toThrow(new MalformedScenarioError("Missing 'scenario' root key"));
    expect(() => parseScenarioText("- a")).toThrow("Scenario document must be a mapping");
  });

  it("rejects a scenario without a name", () => {
    expect(() => parseScenarioText("scenario:\n  steps:\n    - name: a\n      api: GET /")).toThrow("Scenario is missing 'name'");
  });

  it("rejects a scenario without steps", () => {
    expect(() => parseScenarioText("scenario:\n  name: Empty\n  steps: []")).toThrow("Scenario must contain at least one step");
  });

  it("reports the phase and position of a bad step", () => {
    const text = `
scenario:
  name: Bad
  steps:
    - name: Fine
      api: GET /fine
    - name: Broken
`;
    expect(() => parseScenarioText(text)).toThrow(MalformedStepError);
    expect(() => parseScenarioText(text)).toThrow("Invalid step 2 in steps: step 'Broken' is missing 'api'");
  });

  it("rejects a malformed api line", () => {
    const text = "scenario:\n  name: Bad\n  teardown:\n    - name: Cleanup\n      api: DELETE\n  steps:\n    - name: a\n      api: GET /";
    expect(() => parseScenarioText(text)).toThrow(
      "Invalid step 1 in teardown: step 'Cleanup' has malformed api 'DELETE', expected 'METHOD /path'"
    );
  });

  it("reports bad steps inside condition branches", () => {
    const text = `
scenario:
  name: Bad branch
  steps:
    - name: Check
      api: GET /check
      condition:
        if: "true"
        else:
          - name: Nested
`;
    expect(() => parseScenarioText(text)).toThrow("Invalid step 1 in steps: condition.else[1]: step 'Nested' is missing 'api'");
  });

  it("reports schema violations with their path", () => {
    const text = "scenario:\n  name: Bad\n  steps:\n    - name: a\n      api: GET /\n      extract: nope";
    expect(() => parseScenarioText(text)).toThrow(/^Invalid step 1 in steps: step 'a': extract: /);
  });

  it("gives the same result for the same text", () => {
    expect(parseScenarioText(MINIMAL)).toEqual(parseScenarioText(MINIMAL));
  });
});

describe("parseScenario", () => {
  it("rejects a null document", () => {
    expect(() => parseScenario(null)).toThrow(MalformedScenarioError);
  });
});

describe("parseScenarioFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("parser");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reads a scenario from disk", async () => {
    const file = path.join(dir, "minimal.yaml");
    await fs.writeFile(file, MINIMAL);
    expect((await parseScenarioFile(file)).name).toBe("Minimal");
  });

  it("reads the bundled example scenario", async () => {
    const file = fileURLToPath(new URL("../scenarios/user-lifecycle.yaml", import.meta.url));
    const parsed = await parseScenarioFile(file);

    expect(parsed.steps.map((s) => s.name)).toEqual(["Fetch user", "Search by tag"]);
    expect(parsed.steps[0].condition?.then.map((s) => s.api)).toEqual(["GET /admin/audit"]);
    expect(parsed.steps[1].request.query).toEqual({ tag: ["new", "trial"], limit: "${page_size}" });
    expect(validateScenario(parsed)).toEqual([]);
  });

  it("wraps read failures", async () => {
    await expect(parseScenarioFile(path.join(dir, "missing.yaml"))).rejects.toBeInstanceOf(ScenarioFileError);
  });
});

describe("validateScenario", () => {
  it("accepts a well-formed scenario", () => {
    expect(validateScenario(scenario())).toEqual([]);
  });

  it("reports an empty name and empty steps", () => {
    expect(validateScenario(scenario({ name: " ", steps: [] }))).toEqual([
      "Scenario name must not be empty",
      "Scenario must contain at least one step",
    ]);
  });

  it("reports unsupported methods and malformed api lines", () => {
    expect(
      validateScenario(
        scenario({
          setup: [step({ name: "Fetch", api: "FETCH /x" })],
          steps: [step({ name: "Bare", api: "GET" }), step({ name: "", api: "" })],
        })
      )
    ).toEqual([
      "Step 'Fetch' uses unsupported HTTP method 'FETCH'",
      "Step 'Bare' has malformed api 'GET', expected 'METHOD /path'",
      "steps step 2 is missing a name",
      "Step (steps step 2) is missing an api definition",
    ]);
  });

  it("accepts lower-case methods", () => {
    expect(validateScenario(scenario({ steps: [step({ api: "get /ping" })] }))).toEqual([]);
  });

  it("reports incomplete extract rules", () => {
    expect(validateScenario(scenario({ steps: [step({ extract: [{ path: "$.id" }, { name: "id" }] })] }))).toEqual([
      "Step 'Ping' extract rule 1 is missing 'name'",
      "Step 'Ping' extract rule 'id' has no path, header, cookie or regex",
    ]);
  });

  it("checks conditions and their branch steps", () => {
    const nested = step({ name: "Nested", api: "SEND /x" });
    expect(validateScenario(scenario({ steps: [step({ condition: { then: [nested], else: [] } })] }))).toEqual([
      "Step 'Ping' condition is missing 'if'",
      "Step 'Nested' uses unsupported HTTP method 'SEND'",
    ]);
  });
});
