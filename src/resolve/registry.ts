import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { NullResolver } from "./nullResolver";
import { ResolverModule } from "./types";

const REMOTE_URL = /^(https?|ftp):\/\//i;

export function isRemoteUrl(value: string): boolean {
  return REMOTE_URL.test(value);
}

export type RedirectProbe = (url: string) => Promise<string | undefined>;

export interface RegistryOptions {
  logger: Logger;
  /** Use the plain-GET resolver when nothing else matches. */
  fallback: boolean;
  probeRedirect?: RedirectProbe;
}

export interface Dispatch {
  url: string;
  module?: ResolverModule;
}

export class ResolverRegistry {
  private readonly modules: ResolverModule[];
  private readonly options: RegistryOptions;
  private readonly nullResolver = new NullResolver();

  constructor(modules: ResolverModule[], options: RegistryOptions) {
    const seen = new Set<string>();
    for (const resolver of modules) {
      if (seen.has(resolver.name)) {
        throw new Error(`Duplicate resolver module name: ${resolver.name}`);
      }
      seen.add(resolver.name);
    }
    this.modules = modules;
    this.options = options;
  }

  names(): string[] {
    return this.modules.map((resolver) => resolver.name);
  }

  find(url: string): ResolverModule | undefined {
    return this.modules.find((resolver) => resolver.pattern.test(url));
  }

  async dispatch(url: string): Promise<Dispatch> {
    const direct = this.find(url);
    if (direct) {
      return { url, module: direct };
    }
    if (!isRemoteUrl(url)) {
      return { url };
    }

    const { logger, probeRedirect, fallback } = this.options;
    if (probeRedirect) {
      logger.debug("no_module_try_redirection", { url });
      let location: string | undefined;
      try {
        location = await probeRedirect(url);
      } catch (error) {
        logger.debug("redirection_probe_failed", { url, error: errorMessage(error) });
      }
      if (location) {
        return { url: location, module: this.find(location) };
      }
    }

    if (fallback) {
      logger.info("no_module_plain_get", { url });
      return { url, module: this.nullResolver };
    }
    return { url };
  }
}
