import { existsSync } from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import * as z from "zod";

const PROJECT_ROOT = path.resolve(__dirname, "../..");

const DEFAULT_MESSAGES_FILE = path.join("config", "messages.pt-BR.yaml");
const DEFAULT_FAKE_DATA_FILE = path.join("fixtures", "fake-tax-data.json");

const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankAsUndefined, z.string().trim().optional()).transform((v) => v ?? null);

const booleanFlag = z
  .preprocess(blankAsUndefined, z.string().optional())
  .transform((v) => (v ?? "").trim().toLowerCase() === "true");

const EnvSchema = z.object({
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(3000)),
  LOG_LEVEL: optionalText,
  IPTU_USE_FAKE_API: booleanFlag,
  SESSION_STORE: z.preprocess(blankAsUndefined, z.enum(["memory", "file"]).default("memory")),
  SESSION_DATA_DIR: z.preprocess(blankAsUndefined, z.string().default(".sessions")),
  MESSAGES_PATH: optionalText,
  FAKE_DATA_PATH: optionalText,
  IPTU_API_URL: optionalText,
  IPTU_API_TOKEN: optionalText,
  WA_IPTU_URL: optionalText,
  WA_IPTU_TOKEN: optionalText,
  WA_IPTU_PUBLIC_KEY: optionalText,
  DIVIDA_ATIVA_API_URL: optionalText,
  DIVIDA_ATIVA_ACCESS_KEY: optionalText,
  DOCUMENT_UPLOAD_URL: optionalText,
  SHORT_API_URL: optionalText,
  SHORT_API_TOKEN: optionalText,
  ERROR_INTERCEPTOR_URL: optionalText,
  ERROR_INTERCEPTOR_TOKEN: optionalText,
});

export type SessionStoreKind = "memory" | "file";

export interface AppConfig {
  port: number;
  logLevel: string | null;
  useFakeApi: boolean;
  sessionStore: { kind: SessionStoreKind; directory: string };
  messagesPath: string;
  fakeDataPath: string;
  iptuApi: { baseUrl: string | null; token: string | null };
  propertyInfoApi: { baseUrl: string | null; token: string | null; publicKey: string | null };
  activeDebtApi: { baseUrl: string | null; accessKey: string | null };
  documents: { uploadUrl: string | null; shortenerUrl: string | null; shortenerToken: string | null };
  errorInterceptor: { url: string | null; token: string | null };
}

/** Loads `.env` from the project root into process.env (existing variables win). */
export function loadEnvironment(): void {
  dotenv.config({ path: path.join(PROJECT_ROOT, ".env") });
}

export function resolveProjectPath(...segments: string[]): string {
  return path.join(PROJECT_ROOT, ...segments);
}

function resolveConfiguredPath(explicitPath: string | null, fallback: string): string {
  if (!explicitPath) return resolveProjectPath(fallback);
  return path.isAbsolute(explicitPath) ? explicitPath : path.resolve(PROJECT_ROOT, explicitPath);
}

/**
 * Resolve the message catalog path.
 * Priority: MESSAGES_PATH env > config/messages.pt-BR.yaml
 */
export function getMessagesPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolveConfiguredPath(blankToNull(env.MESSAGES_PATH), DEFAULT_MESSAGES_FILE);
}

/**
 * Resolve the fixture file that drives the fake tax API.
 * Priority: FAKE_DATA_PATH env > fixtures/fake-tax-data.json
 */
export function getFakeDataPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolveConfiguredPath(blankToNull(env.FAKE_DATA_PATH), DEFAULT_FAKE_DATA_FILE);
}

function blankToNull(value: string | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

/**
 * Parse the environment into the application config.
 * Throws with every offending variable listed when the environment is malformed.
 */
export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const vars = parsed.data;
  const sessionDir = path.isAbsolute(vars.SESSION_DATA_DIR)
    ? vars.SESSION_DATA_DIR
    : path.resolve(PROJECT_ROOT, vars.SESSION_DATA_DIR);

  return {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    useFakeApi: vars.IPTU_USE_FAKE_API,
    sessionStore: { kind: vars.SESSION_STORE, directory: sessionDir },
    messagesPath: resolveConfiguredPath(vars.MESSAGES_PATH, DEFAULT_MESSAGES_FILE),
    fakeDataPath: resolveConfiguredPath(vars.FAKE_DATA_PATH, DEFAULT_FAKE_DATA_FILE),
    iptuApi: { baseUrl: vars.IPTU_API_URL, token: vars.IPTU_API_TOKEN },
    propertyInfoApi: { baseUrl: vars.WA_IPTU_URL, token: vars.WA_IPTU_TOKEN, publicKey: vars.WA_IPTU_PUBLIC_KEY },
    activeDebtApi: { baseUrl: vars.DIVIDA_ATIVA_API_URL, accessKey: vars.DIVIDA_ATIVA_ACCESS_KEY },
    documents: {
      uploadUrl: vars.DOCUMENT_UPLOAD_URL,
      shortenerUrl: vars.SHORT_API_URL,
      shortenerToken: vars.SHORT_API_TOKEN,
    },
    errorInterceptor: { url: vars.ERROR_INTERCEPTOR_URL, token: vars.ERROR_INTERCEPTOR_TOKEN },
  };
}

/**
 * Validate that referenced files exist and that the live API has credentials.
 * Throws with clear error message if validation fails.
 */
export function validateAppConfig(config: AppConfig): void {
  if (!existsSync(config.messagesPath)) {
    throw new Error(`Message catalog not found: ${config.messagesPath}.`);
  }
  if (config.useFakeApi) {
    if (!existsSync(config.fakeDataPath)) {
      throw new Error(`Fake tax data not found: ${config.fakeDataPath}. Disable IPTU_USE_FAKE_API or provide FAKE_DATA_PATH.`);
    }
    return;
  }
  if (!config.iptuApi.baseUrl || !config.iptuApi.token) {
    throw new Error("IPTU_API_URL and IPTU_API_TOKEN are required when IPTU_USE_FAKE_API is not enabled.");
  }
}
