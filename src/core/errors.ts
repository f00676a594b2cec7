import { AnnotationTag, ErrorKind, ResolveOutcome } from "../types";

export const EXIT_CODES: Record<ErrorKind, number> = {
  fatal: 1,
  no_module: 2,
  network: 3,
  login_failed: 4,
  max_wait_reached: 5,
  max_tries_reached: 6,
  captcha_failed: 7,
  system_failure: 8,
  temporarily_unavailable: 10,
  password_required: 11,
  need_permissions: 12,
  link_dead: 13,
};

export const EXIT_OK = 0;
export const EXIT_BAD_COMMAND_LINE = 15;
export const EXIT_FATAL_MULTIPLE = 100;

const ERROR_KINDS = new Set<string>(Object.keys(EXIT_CODES));

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === "string" && ERROR_KINDS.has(value);
}

// Only the transfer engine reports network failures.
const TRANSFER_ONLY_KINDS = new Set<ErrorKind>(["network"]);

export function isResolverErrorKind(value: unknown): value is ErrorKind {
  return isErrorKind(value) && !TRANSFER_ONLY_KINDS.has(value);
}

export type ClassifiedAction = "abort" | "transfer";

export interface Classification {
  action: ClassifiedAction;
  code: number;
  notice: string;
  tag?: AnnotationTag;
}

interface FailureRule {
  notice: (moduleName: string) => string;
  tag?: AnnotationTag;
}

const FAILURE_RULES: Record<ErrorKind, FailureRule> = {
  fatal: { notice: (moduleName) => `failed inside ${moduleName}()` },
  no_module: { notice: () => "Skip: no module for URL", tag: "NOMODULE" },
  network: { notice: () => "Network failure during transfer" },
  login_failed: { notice: () => "Login process failed. Bad username/password or unexpected content" },
  max_wait_reached: { notice: (moduleName) => `Delay limit reached (${moduleName})` },
  max_tries_reached: { notice: (moduleName) => `Retry limit reached (${moduleName})` },
  captcha_failed: { notice: (moduleName) => `Error: decoding captcha (${moduleName})` },
  system_failure: { notice: (moduleName) => `System failure (${moduleName})` },
  temporarily_unavailable: { notice: () => "Warning: file link is alive but not currently available, try later" },
  password_required: { notice: () => "You must provide a password", tag: "PASSWORD" },
  need_permissions: { notice: () => "Insufficient permissions (premium link?)" },
  link_dead: { notice: () => "Link is not alive: file not found", tag: "NOTFOUND" },
};

export function classifyOutcome(outcome: ResolveOutcome, moduleName: string): Classification {
  if (outcome.ok) {
    return { action: "transfer", code: EXIT_OK, notice: "" };
  }

  const rule = FAILURE_RULES[outcome.kind];
  const notice = outcome.kind === "fatal" && outcome.detail ? `${rule.notice(moduleName)} [${outcome.detail}]` : rule.notice(moduleName);
  return {
    action: "abort",
    code: EXIT_CODES[outcome.kind],
    notice,
    tag: rule.tag,
  };
}

export function aggregateExitCodes(codes: number[]): number {
  const failing = codes.filter((code) => code !== EXIT_OK);
  if (failing.length === 0) {
    return EXIT_OK;
  }
  if (failing.length === 1) {
    return failing[0];
  }
  return EXIT_FATAL_MULTIPLE + failing[0];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
