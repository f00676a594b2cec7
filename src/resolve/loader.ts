import path from "node:path";
import { types } from "node:util";
import { ResolverModule } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isResolverModule(value: unknown): value is ResolverModule {
  if (!isRecord(value)) {
    return false;
  }
  const capabilities = value.capabilities;
  return (
    typeof value.name === "string" &&
    value.name !== "" &&
    types.isRegExp(value.pattern) &&
    typeof value.resolve === "function" &&
    isRecord(capabilities) &&
    typeof capabilities.supportsResume === "boolean" &&
    typeof capabilities.needsCookieOnFinalRequest === "boolean"
  );
}

/**
 * Loads resolver modules from files. Each file exports the module as its
 * default export or under the name `resolver`.
 */
export async function loadResolverModules(paths: string[]): Promise<ResolverModule[]> {
  const modules: ResolverModule[] = [];
  for (const modulePath of paths) {
    const absolutePath = path.resolve(modulePath);
    const loaded: unknown = await import(absolutePath);
    const candidates = isRecord(loaded) ? [loaded.default, loaded.resolver] : [];
    const resolver = candidates.find(isResolverModule);
    if (!resolver) {
      throw new Error(`Not a resolver module: ${absolutePath}`);
    }
    modules.push(resolver);
  }
  return modules;
}
