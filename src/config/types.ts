export type CaptchaMethod = "prompt" | "none";

export const CAPTCHA_METHODS: readonly CaptchaMethod[] = ["prompt", "none"];

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  verbose: number;
  checkLink: boolean;
  markDownloaded: boolean;
  noOverwrite: boolean;
  outputDir?: string;
  tempDir?: string;
  /** Global transfer rate limit in bytes per second. */
  limitRate?: number;
  /** Per-link budget, in seconds, for all waits (temporary unavailability, 503 backoff). */
  timeoutSeconds?: number;
  /** Captcha retries; unset means retry forever, 0 means never retry. */
  maxRetries?: number;
  captchaMethod?: CaptchaMethod;
  noExtraWait: boolean;
  cookiesPath?: string;
  getModule: boolean;
  runDownload?: string;
  downloadInfo?: string;
  fallback: boolean;
  linkConcurrency: number;
  requestTimeoutMs: number;
  tempUnavailableWaitSeconds: number;
  serviceUnavailableWaitSeconds: number;
  resolverModules: string[];
  /** Options passed to every resolver module. */
  moduleArgs: string[];
  /** Options passed to one resolver module, keyed by its name. */
  moduleOptions: Record<string, string[]>;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "limitRate">> & {
  limitRate?: number | string;
};
