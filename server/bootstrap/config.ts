import Ajv from "ajv";
import { readFileSync } from "node:fs";

export type NodeEnv = "local" | "dev" | "test" | "staging" | "prod";

export interface AppConfig {
  nodeEnv: NodeEnv;
  serviceName: string;
  logLevel: "trace"|"debug"|"info"|"warn"|"error"|"fatal";
  logPretty: boolean;
  dbUrl: string;
  catalogApiUrl: string;
  catalogApiToken?: string;
  catalogTimeoutMs: number;
  catalogMaxRetries: number;
  marketingRootUrl: string;
  enterprisePortalBaseUrl: string;
  segmentWriteKey?: string;
  nudgeEventName: string;
  timezone: string;
}

export const DEFAULT_NUDGE_EVENT_NAME = "edx.bi.program.course-enrollment.nudge";

const schema: object = JSON.parse(
  readFileSync(new URL("../../config/schema.json", import.meta.url), "utf8")
);

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile(schema);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfg = {
    nodeEnv: env.NODE_ENV || "local",
    serviceName: env.SERVICE_NAME || "program-course-nudges",
    logLevel: env.LOG_LEVEL || "info",
    logPretty: env.LOG_PRETTY === "true",
    dbUrl: env.DB_URL || env.DATABASE_URL || "",
    catalogApiUrl: env.CATALOG_API_URL || "",
    ...(env.CATALOG_API_TOKEN ? { catalogApiToken: env.CATALOG_API_TOKEN } : {}),
    catalogTimeoutMs: parseInt(env.CATALOG_TIMEOUT_MS || "10000", 10),
    catalogMaxRetries: parseInt(env.CATALOG_MAX_RETRIES || "2", 10),
    marketingRootUrl: env.MKTG_ROOT_URL || "",
    enterprisePortalBaseUrl: env.ENTERPRISE_LEARNER_PORTAL_BASE_URL || "",
    ...(env.SEGMENT_WRITE_KEY ? { segmentWriteKey: env.SEGMENT_WRITE_KEY } : {}),
    nudgeEventName: env.NUDGE_EVENT_NAME || DEFAULT_NUDGE_EVENT_NAME,
    timezone: env.NUDGE_TIMEZONE || "UTC"
  };

  if (!isAppConfig(cfg)) {
    const msgs = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`).join("; ");
    throw new Error(`Invalid configuration: ${msgs}`);
  }
  return cfg;
}

function isAppConfig(cfg: unknown): cfg is AppConfig {
  return validate(cfg);
}
