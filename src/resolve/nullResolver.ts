import { ModuleCapabilities, ResolveOutcome } from "../types";
import { SiteResolver } from "./siteResolver";
import { ResolverContext } from "./types";

/** Plain HTTP GET of the link itself, used when `--fallback` is set. */
export class NullResolver extends SiteResolver {
  readonly name = "null";
  // Never selected by pattern; the registry picks it explicitly.
  readonly pattern = /$^/;
  override readonly capabilities: ModuleCapabilities = {
    supportsResume: true,
    needsCookieOnFinalRequest: false,
  };

  async resolve(ctx: ResolverContext): Promise<ResolveOutcome> {
    return this.success(ctx.url);
  }
}
