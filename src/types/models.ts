export type LinkKind = "url" | "file";

export interface LinkItem {
  kind: LinkKind;
  url: string;
  sourceFile?: string;
  rawLine?: string;
}

export type ErrorKind =
  | "fatal"
  | "no_module"
  | "network"
  | "login_failed"
  | "max_wait_reached"
  | "max_tries_reached"
  | "captcha_failed"
  | "system_failure"
  | "temporarily_unavailable"
  | "password_required"
  | "need_permissions"
  | "link_dead";

export interface ResolveSuccess {
  ok: true;
  directUrl: string;
  filename?: string;
}

export interface ResolveFailure {
  ok: false;
  kind: ErrorKind;
  /** Seconds to wait before the next attempt; only read for `temporarily_unavailable`. */
  waitHint?: number;
  detail?: string;
}

export type ResolveOutcome = ResolveSuccess | ResolveFailure;

export interface DownloadAttempt {
  attempts: number;
  outcome: ResolveOutcome;
}

export interface FileTarget {
  tempPath: string;
  finalPath: string;
}

export interface ModuleCapabilities {
  supportsResume: boolean;
  needsCookieOnFinalRequest: boolean;
}

export type AnnotationTag = "NOTFOUND" | "PASSWORD" | "NOMODULE" | "";

export interface LinkResult {
  item: LinkItem;
  code: number;
  kind?: ErrorKind;
  output?: string;
}
