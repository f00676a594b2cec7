import { CaptchaMethod } from "../config";
import { CookieJar } from "../cookies/cookieJar";
import { Logger } from "../observability";
import { ModuleCapabilities, ResolveOutcome } from "../types";

export interface ResolverContext {
  url: string;
  cookies: CookieJar;
  moduleArgs: string[];
  logger: Logger;
  captchaMethod?: CaptchaMethod;
  signal?: AbortSignal;
}

export interface ResolverModule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly capabilities: ModuleCapabilities;
  resolve(ctx: ResolverContext): Promise<ResolveOutcome>;
}
