/**
 * Public API of apiflow
 */

export * from "./types.js";
export * from "./errors.js";
export { ContextStore, compileTemplate, stringifyValue } from "./context.js";
export { createBuiltins, formatDate, type TemplateArg, type TemplateFunction } from "./builtins.js";
export { parseJson, toJson, toSpacedJson } from "./json.js";
export { extract, extractCookie, extractHeader, extractRegex, queryPath } from "./extractor.js";
export { ConditionEvaluator, parseCondition, fallbackEvaluate } from "./condition.js";
export {
  HTTP_METHODS,
  parseScenario,
  parseScenarioFile,
  parseScenarioText,
  validateScenario,
} from "./scenario-parser.js";
export { runScenario, joinUrl, type RunScenarioOptions } from "./scenario-runner.js";
export { FetchTransport, type FetchLike, type FetchTransportOptions } from "./http-client.js";
export { runSuite, collectScenarioFiles, type SuiteOptions, type SuiteEvent } from "./suite-runner.js";
export { listScenarios, findScenario, saveRun, listRuns, getRun } from "./storage.js";
export { loadConfig, type ApiflowConfig } from "./config.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export { formatScenarioResult, summarizeResult } from "./report.js";
export { createApiServer, startServer } from "./api-server.js";
export { createMcpServer, startMcpServer } from "./server.js";
