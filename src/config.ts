import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const ConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  authToken: z.string().min(1).optional(),
  timeoutSeconds: z.number().positive(),
  verifyTls: z.boolean(),
  storageDir: z.string().min(1),
  scenariosDir: z.string().min(1),
  resultRetention: z.number().int().positive(),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  port: z.number().int().min(1).max(65535),
});

export type ApiflowConfig = Readonly<z.infer<typeof ConfigSchema>>;

const DEFAULTS: ApiflowConfig = {
  timeoutSeconds: 30,
  verifyTls: true,
  storageDir: ".apiflow",
  scenariosDir: "scenarios",
  resultRetention: 50,
  logLevel: "info",
  port: 3000,
};

function envOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  if (env.APIFLOW_BASE_URL) overrides.baseUrl = env.APIFLOW_BASE_URL;
  if (env.APIFLOW_AUTH_TOKEN) overrides.authToken = env.APIFLOW_AUTH_TOKEN;
  if (env.APIFLOW_LOG_LEVEL) overrides.logLevel = env.APIFLOW_LOG_LEVEL;
  return overrides;
}

/**
 * Loads apiflow.config.json (or the given file) over the defaults.
 * APIFLOW_BASE_URL, APIFLOW_AUTH_TOKEN and APIFLOW_LOG_LEVEL win over the file.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ApiflowConfig {
  const filePath = configPath ?? resolve(process.cwd(), "apiflow.config.json");

  let userConfig: unknown = {};
  if (existsSync(filePath)) {
    try {
      userConfig = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Failed to load config from ${filePath}: ${message}`);
    }
  }

  if (typeof userConfig !== "object" || userConfig === null || Array.isArray(userConfig)) {
    throw new ConfigurationError(`Failed to load config from ${filePath}: expected a JSON object`);
  }

  const result = ConfigSchema.safeParse({ ...DEFAULTS, ...userConfig, ...envOverrides(env) });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid config in ${filePath}: ${issues}`);
  }
  return result.data;
}
