import fs from "node:fs";
import { Waiter } from "../core/wait";
import { CookieJar } from "../cookies/cookieJar";
import { Logger, MetricsRegistry } from "../observability";
import { ErrorKind, FileTarget, ModuleCapabilities } from "../types";
import { avoidCollision, computeFileTarget, ExistsFn, placeFile, removeFile } from "./fileTarget";
import { TransferClient, TransferOutcome } from "./transferClient";

export interface TransferJob {
  directUrl: string;
  filename: string;
  capabilities: ModuleCapabilities;
  cookies?: CookieJar;
  tempDir?: string;
  outputDir?: string;
  noOverwrite: boolean;
  /** Caps restarts after unexpected HTTP statuses; unset restarts forever. */
  maxRestarts?: number;
  serviceUnavailableWaitSeconds: number;
  signal?: AbortSignal;
}

export interface TransferDeps {
  client: TransferClient;
  waiter: Waiter;
  logger: Logger;
  metrics?: MetricsRegistry;
  exists?: ExistsFn;
}

export type TransferResult =
  | { ok: true; finalPath: string }
  | { ok: false; kind: ErrorKind; detail?: string };

type StepDecision = { next: "restart" } | { next: "place" } | { next: "stop"; result: TransferResult };

/**
 * Transfers a resolved direct URL to disk.
 *
 * Each pass recomputes the target, fetches into the temp path and decides from
 * the outcome whether to restart, stop, or move the file into place.
 */
export async function runTransfer(job: TransferJob, deps: TransferDeps): Promise<TransferResult> {
  const { client, logger, metrics } = deps;
  const exists = deps.exists ?? fs.existsSync;
  let badStatusRestarts = 0;

  const restartAfterBadStatus = (status: number): StepDecision => {
    badStatusRestarts += 1;
    if (job.maxRestarts !== undefined && badStatusRestarts > job.maxRestarts) {
      return { next: "stop", result: { ok: false, kind: "max_tries_reached", detail: `HTTP ${status}` } };
    }
    metrics?.incrementCounter("transfer_restarts");
    return { next: "restart" };
  };

  const decideHttpError = async (status: number, target: FileTarget): Promise<StepDecision> => {
    if (status === 503) {
      logger.error("transfer_unexpected_status_wait", { status, url: job.directUrl });
      const waited = await deps.waiter.wait(job.serviceUnavailableWaitSeconds, "service_unavailable");
      if (waited !== "elapsed") {
        return { next: "stop", result: { ok: false, kind: "max_wait_reached", detail: waited } };
      }
      return { next: "restart" };
    }

    if (status === 416) {
      // With resume on, 416 means the file is already complete.
      if (job.capabilities.supportsResume) {
        logger.error("transfer_bad_range_skip", { path: target.tempPath });
        return { next: "place" };
      }
      logger.error("transfer_bad_range_restart", { path: target.tempPath });
      await removeFile(target.tempPath);
      return restartAfterBadStatus(status);
    }

    logger.error("transfer_unexpected_status_restart", { status, url: job.directUrl });
    return restartAfterBadStatus(status);
  };

  const decide = async (outcome: TransferOutcome, target: FileTarget): Promise<StepDecision> => {
    switch (outcome.kind) {
      case "complete":
        return { next: "place" };
      case "partial":
        if (job.capabilities.supportsResume) {
          logger.info("transfer_partial_content_restart", { bytes: outcome.bytes, url: job.directUrl });
          metrics?.incrementCounter("transfer_restarts");
          return { next: "restart" };
        }
        return { next: "stop", result: { ok: false, kind: "network", detail: outcome.error ?? "partial content" } };
      case "network_error":
        logger.error("transfer_network_error", { url: job.directUrl, error: outcome.error });
        return { next: "stop", result: { ok: false, kind: "network", detail: outcome.error } };
      case "http_error":
        return decideHttpError(outcome.status, target);
    }
  };

  while (true) {
    let target: FileTarget = computeFileTarget(job.filename, job);
    if (job.noOverwrite && exists(target.finalPath)) {
      target = avoidCollision(target, exists);
      logger.info("transfer_alternate_name", { finalPath: target.finalPath });
    }

    const resume = job.capabilities.supportsResume && !job.noOverwrite;
    const cookieHeader =
      job.capabilities.needsCookieOnFinalRequest && job.cookies ? await job.cookies.headerFor(job.directUrl) : undefined;

    const stopTimer = metrics?.startTimer("transfer_ms");
    let outcome: TransferOutcome;
    try {
      outcome = await client.fetchToFile({
        url: job.directUrl,
        destination: target.tempPath,
        resume,
        cookieHeader,
        signal: job.signal,
      });
    } catch (error) {
      if (job.signal?.aborted) {
        await removeFile(target.tempPath);
      }
      throw error;
    } finally {
      stopTimer?.();
    }

    const decision = await decide(outcome, target);
    if (decision.next === "restart") {
      continue;
    }
    if (decision.next === "stop") {
      return decision.result;
    }

    if (target.tempPath !== target.finalPath && exists(target.tempPath)) {
      logger.info("transfer_move_to_output", { from: target.tempPath, to: target.finalPath });
      await placeFile(target.tempPath, target.finalPath);
    }
    return { ok: true, finalPath: target.finalPath };
  }
}
