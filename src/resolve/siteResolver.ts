import { ErrorKind, ModuleCapabilities, ResolveFailure, ResolveOutcome, ResolveSuccess } from "../types";
import { ResolverContext, ResolverModule } from "./types";

export abstract class SiteResolver implements ResolverModule {
  abstract readonly name: string;
  abstract readonly pattern: RegExp;
  readonly capabilities: ModuleCapabilities = {
    supportsResume: false,
    needsCookieOnFinalRequest: false,
  };

  abstract resolve(ctx: ResolverContext): Promise<ResolveOutcome>;

  protected success(directUrl: string, filename?: string): ResolveSuccess {
    return { ok: true, directUrl, filename };
  }

  protected fail(kind: ErrorKind, detail?: string): ResolveFailure {
    return { ok: false, kind, detail };
  }

  protected unavailable(waitHint?: number): ResolveFailure {
    return { ok: false, kind: "temporarily_unavailable", waitHint };
  }
}
