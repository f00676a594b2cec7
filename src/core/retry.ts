import { CaptchaMethod } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { DownloadAttempt, ResolveOutcome } from "../types";
import { Waiter } from "./wait";

export interface RetryPolicy {
  /** Unset retries captcha failures forever; 0 disables retrying. */
  maxRetries?: number;
  noExtraWait: boolean;
  captchaMethod?: CaptchaMethod;
  defaultWaitSeconds: number;
}

export interface RetryDeps {
  waiter: Waiter;
  logger: Logger;
  metrics?: MetricsRegistry;
  moduleName: string;
}

/**
 * Drives a resolver until it produces a terminal outcome.
 *
 * Temporary unavailability waits (hint or default) and retries without
 * consuming the retry budget. Captcha failures consume it. Every other outcome
 * ends the loop unchanged.
 */
export async function runWithRetries(
  resolve: () => Promise<ResolveOutcome>,
  policy: RetryPolicy,
  deps: RetryDeps,
): Promise<DownloadAttempt> {
  const { waiter, logger, metrics, moduleName } = deps;
  let attempts = 0;
  let retries = 0;

  while (true) {
    attempts += 1;
    const stopTimer = metrics?.startTimer("resolve_ms");
    const outcome = await resolve();
    stopTimer?.();

    if (outcome.ok) {
      return { attempts, outcome };
    }

    if (outcome.kind === "temporarily_unavailable") {
      if (policy.noExtraWait) {
        return { attempts, outcome };
      }
      if (outcome.waitHint === undefined) {
        logger.debug("arbitrary_wait", { module: moduleName });
      }
      const waited = await waiter.wait(outcome.waitHint ?? policy.defaultWaitSeconds, "temporarily_unavailable");
      if (waited !== "elapsed") {
        return { attempts, outcome: { ok: false, kind: "max_wait_reached", detail: waited } };
      }
      logger.info("resolve_retry_after_wait", { module: moduleName, attempt: attempts + 1 });
      continue;
    }

    if (outcome.kind !== "captcha_failed") {
      return { attempts, outcome };
    }

    if (policy.captchaMethod === "none") {
      logger.debug("captcha_method_none_abort", { module: moduleName });
      return { attempts, outcome };
    }

    retries += 1;
    if (policy.maxRetries !== undefined) {
      if (policy.maxRetries === 0) {
        logger.debug("no_retry_requested", { module: moduleName });
        return { attempts, outcome };
      }
      if (retries > policy.maxRetries) {
        return { attempts, outcome: { ok: false, kind: "max_tries_reached", detail: outcome.detail } };
      }
    }

    metrics?.incrementCounter("resolve_retries");
    logger.info("resolve_retry", {
      module: moduleName,
      retry: retries,
      maxRetries: policy.maxRetries ?? "infinite",
    });
  }
}
