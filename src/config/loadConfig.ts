import fs from "node:fs";
import path from "node:path";
import { parseRate } from "../download/rateLimiter";
import { AppConfig, CAPTCHA_METHODS, CaptchaMethod, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "hostgrab/0.1",
  ignoreHttpsErrors: false,
  verbose: 2,
  checkLink: false,
  markDownloaded: false,
  noOverwrite: false,
  noExtraWait: false,
  getModule: false,
  fallback: false,
  linkConcurrency: 1,
  requestTimeoutMs: 20_000,
  tempUnavailableWaitSeconds: 60,
  serviceUnavailableWaitSeconds: 120,
  resolverModules: [],
  moduleArgs: [],
  moduleOptions: {},
};

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function pickString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`Config field "${key}" must be a string`);
  }
  return value;
}

function pickNumber(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Config field "${key}" must be a number`);
  }
  return value;
}

function pickBoolean(source: JsonObject, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`Config field "${key}" must be a boolean`);
  }
  return value;
}

function pickStringArray(source: JsonObject, key: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isStringArray(value)) {
    throw new Error(`Config field "${key}" must be an array of strings`);
  }
  return value;
}

function pickRate(source: JsonObject): number | string | undefined {
  const value = source.limitRate;
  if (value === undefined || typeof value === "number" || typeof value === "string") {
    return value;
  }
  throw new Error('Config field "limitRate" must be a number or a string such as "200k"');
}

function pickModuleOptions(source: JsonObject): Record<string, string[]> | undefined {
  const value = source.moduleOptions;
  if (value === undefined) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new Error('Config field "moduleOptions" must be an object');
  }
  const options: Record<string, string[]> = {};
  for (const [moduleName, args] of Object.entries(value)) {
    if (!isStringArray(args)) {
      throw new Error(`Config field "moduleOptions.${moduleName}" must be an array of strings`);
    }
    options[moduleName] = args;
  }
  return options;
}

export function parseCaptchaMethod(value: string): CaptchaMethod {
  const method = CAPTCHA_METHODS.find((candidate) => candidate === value);
  if (!method) {
    throw new Error(`unknown captcha method: ${value}`);
  }
  return method;
}

// Unset fields stay absent so they never shadow the defaults when spread.
function assign<K extends keyof ConfigOverrides>(target: ConfigOverrides, key: K, value: ConfigOverrides[K]): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (!isObject(raw)) {
    throw new Error("Config file must contain a JSON object");
  }

  const captchaMethod = pickString(raw, "captchaMethod");
  const overrides: ConfigOverrides = {};
  assign(overrides, "userAgent", pickString(raw, "userAgent"));
  assign(overrides, "ignoreHttpsErrors", pickBoolean(raw, "ignoreHttpsErrors"));
  assign(overrides, "verbose", pickNumber(raw, "verbose"));
  assign(overrides, "checkLink", pickBoolean(raw, "checkLink"));
  assign(overrides, "markDownloaded", pickBoolean(raw, "markDownloaded"));
  assign(overrides, "noOverwrite", pickBoolean(raw, "noOverwrite"));
  assign(overrides, "outputDir", pickString(raw, "outputDir"));
  assign(overrides, "tempDir", pickString(raw, "tempDir"));
  assign(overrides, "limitRate", pickRate(raw));
  assign(overrides, "timeoutSeconds", pickNumber(raw, "timeoutSeconds"));
  assign(overrides, "maxRetries", pickNumber(raw, "maxRetries"));
  assign(overrides, "captchaMethod", captchaMethod === undefined ? undefined : parseCaptchaMethod(captchaMethod));
  assign(overrides, "noExtraWait", pickBoolean(raw, "noExtraWait"));
  assign(overrides, "cookiesPath", pickString(raw, "cookiesPath"));
  assign(overrides, "getModule", pickBoolean(raw, "getModule"));
  assign(overrides, "runDownload", pickString(raw, "runDownload"));
  assign(overrides, "downloadInfo", pickString(raw, "downloadInfo"));
  assign(overrides, "fallback", pickBoolean(raw, "fallback"));
  assign(overrides, "linkConcurrency", pickNumber(raw, "linkConcurrency"));
  assign(overrides, "requestTimeoutMs", pickNumber(raw, "requestTimeoutMs"));
  assign(overrides, "tempUnavailableWaitSeconds", pickNumber(raw, "tempUnavailableWaitSeconds"));
  assign(overrides, "serviceUnavailableWaitSeconds", pickNumber(raw, "serviceUnavailableWaitSeconds"));
  assign(overrides, "resolverModules", pickStringArray(raw, "resolverModules"));
  assign(overrides, "moduleArgs", pickStringArray(raw, "moduleArgs"));
  assign(overrides, "moduleOptions", pickModuleOptions(raw));
  return overrides;
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return parseConfigOverrides(parsed);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toRate(value: number | string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return typeof value === "number" ? value : parseRate(value);
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    limitRate: toRate(fileConfig.limitRate),
    moduleOptions: {
      ...DEFAULT_CONFIG.moduleOptions,
      ...(fileConfig.moduleOptions ?? {}),
    },
  };

  return {
    ...merged,
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    tempDir: env.TEMP_DIR ?? merged.tempDir,
    maxRetries: toOptionalInt(env.MAX_RETRIES, merged.maxRetries),
    timeoutSeconds: toOptionalInt(env.TIMEOUT_SECONDS, merged.timeoutSeconds),
    limitRate: env.LIMIT_RATE ? parseRate(env.LIMIT_RATE) : merged.limitRate,
    captchaMethod: env.CAPTCHA_METHOD ? parseCaptchaMethod(env.CAPTCHA_METHOD) : merged.captchaMethod,
    cookiesPath: env.COOKIES_FILE ?? merged.cookiesPath,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    linkConcurrency: toInt(env.LINK_CONCURRENCY, merged.linkConcurrency),
    verbose: toInt(env.VERBOSE, merged.verbose),
  };
}

export { DEFAULT_CONFIG };
