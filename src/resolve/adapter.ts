import { errorMessage, isResolverErrorKind } from "../core/errors";
import { ResolveOutcome } from "../types";
import { ResolverContext, ResolverModule } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Checks what a module handed back. External modules are plain JavaScript, so
 * nothing about the shape is assumed.
 */
export function normalizeOutcome(raw: unknown): ResolveOutcome {
  if (!isRecord(raw)) {
    return { ok: false, kind: "fatal", detail: "resolver returned no outcome" };
  }

  if (raw.ok === true) {
    const directUrl = typeof raw.directUrl === "string" ? raw.directUrl : "";
    const filename = typeof raw.filename === "string" && raw.filename !== "" ? raw.filename : undefined;
    return { ok: true, directUrl, filename };
  }

  if (!isResolverErrorKind(raw.kind)) {
    return { ok: false, kind: "fatal", detail: String(raw.kind) };
  }
  const waitHint = typeof raw.waitHint === "number" && raw.waitHint >= 0 ? raw.waitHint : undefined;
  const detail = typeof raw.detail === "string" ? raw.detail : undefined;
  return { ok: false, kind: raw.kind, waitHint, detail };
}

export async function invokeResolver(resolver: ResolverModule, ctx: ResolverContext): Promise<ResolveOutcome> {
  let raw: unknown;
  try {
    raw = await resolver.resolve(ctx);
  } catch (error) {
    if (ctx.signal?.aborted) {
      throw error;
    }
    ctx.logger.error("resolver_threw", { module: resolver.name, url: ctx.url, error: errorMessage(error) });
    return { ok: false, kind: "fatal", detail: errorMessage(error) };
  }
  return normalizeOutcome(raw);
}
