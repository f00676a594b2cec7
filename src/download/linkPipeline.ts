import os from "node:os";
import path from "node:path";
import { AppConfig } from "../config";
import { classifyOutcome, errorMessage, EXIT_CODES, EXIT_OK } from "../core/errors";
import { runWithRetries } from "../core/retry";
import { SleepFn, WaitBudget, Waiter } from "../core/wait";
import { CookieJar } from "../cookies/cookieJar";
import { LineWriter, Logger, MetricsRegistry } from "../observability";
import { LinkListAnnotator } from "../queue/annotator";
import { invokeResolver } from "../resolve/adapter";
import { ResolverContext, ResolverModule } from "../resolve/types";
import { ErrorKind, LinkItem, LinkResult, ResolveFailure, ResolveSuccess } from "../types";
import { interpolateTemplate, runExternalCommand } from "./externalCommand";
import { deriveFilename } from "./fileTarget";
import { TransferClient } from "./transferClient";
import { runTransfer } from "./transferEngine";

export interface LinkPipelineDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  annotator: LinkListAnnotator;
  transferClient: TransferClient;
  output: LineWriter;
  signal?: AbortSignal;
  sleepFn?: SleepFn;
}

/** Everything one link's stages share, created per link and dropped afterwards. */
export interface LinkContext {
  item: LinkItem;
  url: string;
  resolver: ResolverModule;
  moduleArgs: string[];
  cookies: CookieJar;
  waiter: Waiter;
  logger: Logger;
}

// Outcomes that still prove the link exists when only checking it.
const ALIVE_KINDS = new Set<ErrorKind>(["temporarily_unavailable", "need_permissions", "password_required"]);

function resolverContext(ctx: LinkContext, deps: LinkPipelineDeps): ResolverContext {
  return {
    url: ctx.url,
    cookies: ctx.cookies,
    moduleArgs: ctx.moduleArgs,
    logger: ctx.logger,
    captchaMethod: deps.config.captchaMethod,
    signal: deps.signal,
  };
}

async function reportFailure(ctx: LinkContext, deps: LinkPipelineDeps, failure: ResolveFailure): Promise<LinkResult> {
  const classification = classifyOutcome(failure, ctx.resolver.name);
  const fields = { module: ctx.resolver.name, url: ctx.url, kind: failure.kind, detail: failure.detail };
  if (failure.kind === "fatal") {
    ctx.logger.error(classification.notice, fields);
  } else {
    ctx.logger.info(classification.notice, fields);
  }
  if (classification.tag !== undefined) {
    await deps.annotator.markQueue({ item: ctx.item, tag: classification.tag });
  }
  return { item: ctx.item, code: classification.code, kind: failure.kind };
}

async function checkLink(ctx: LinkContext, deps: LinkPipelineDeps): Promise<LinkResult> {
  const outcome = await invokeResolver(ctx.resolver, resolverContext(ctx, deps));
  if (outcome.ok || ALIVE_KINDS.has(outcome.kind)) {
    ctx.logger.info("link_active", { url: ctx.url });
    deps.output(ctx.url);
    return { item: ctx.item, code: EXIT_OK, output: ctx.url };
  }
  return reportFailure(ctx, deps, outcome);
}

async function runDownloadCommand(
  ctx: LinkContext,
  deps: LinkPipelineDeps,
  template: string,
  resolved: ResolveSuccess,
  filename: string,
): Promise<LinkResult> {
  const target = deps.config.outputDir ? path.join(deps.config.outputDir, filename) : filename;
  const command = interpolateTemplate(template, { url: resolved.directUrl, filename: target, cookies: ctx.cookies.path }, true);
  const exitCode = await runExternalCommand(command, ctx.logger, deps.signal);
  if (exitCode !== 0) {
    return reportFailure(ctx, deps, { ok: false, kind: "system_failure", detail: `command exited with ${exitCode}` });
  }
  await deps.annotator.markQueue({ item: ctx.item, tag: "", suffix: `|${target}` });
  return { item: ctx.item, code: EXIT_OK, output: target };
}

async function printDownloadInfo(
  ctx: LinkContext,
  deps: LinkPipelineDeps,
  template: string,
  resolved: ResolveSuccess,
  filename: string,
): Promise<LinkResult> {
  let cookiesPath = "";
  if (template.includes("%cookies")) {
    // Kept after the run so the printed command can still use it.
    cookiesPath = path.join(os.tmpdir(), `hostgrab.cookies.${process.pid}.txt`);
    await ctx.cookies.copyTo(cookiesPath);
  }
  const line = interpolateTemplate(template, { url: resolved.directUrl, filename, cookies: cookiesPath });
  deps.output(line);
  await deps.annotator.markQueue({ item: ctx.item, tag: "", suffix: `|${filename}` });
  return { item: ctx.item, code: EXIT_OK, output: line };
}

async function downloadLink(ctx: LinkContext, deps: LinkPipelineDeps): Promise<LinkResult> {
  const { config } = deps;
  const attempt = await runWithRetries(
    () => invokeResolver(ctx.resolver, resolverContext(ctx, deps)),
    {
      maxRetries: config.maxRetries,
      noExtraWait: config.noExtraWait,
      captchaMethod: config.captchaMethod,
      defaultWaitSeconds: config.tempUnavailableWaitSeconds,
    },
    { waiter: ctx.waiter, logger: ctx.logger, metrics: deps.metrics, moduleName: ctx.resolver.name },
  );

  const resolved = attempt.outcome;
  if (!resolved.ok) {
    return reportFailure(ctx, deps, resolved);
  }
  if (!resolved.directUrl) {
    return reportFailure(ctx, deps, { ok: false, kind: "fatal", detail: "Output URL expected" });
  }

  ctx.logger.info("file_url", { fileUrl: resolved.directUrl, attempts: attempt.attempts });
  const filename = deriveFilename(resolved.directUrl, resolved.filename);
  ctx.logger.info("filename", { filename });

  if (config.runDownload) {
    return runDownloadCommand(ctx, deps, config.runDownload, resolved, filename);
  }
  if (config.downloadInfo) {
    return printDownloadInfo(ctx, deps, config.downloadInfo, resolved, filename);
  }

  const transfer = await runTransfer(
    {
      directUrl: resolved.directUrl,
      filename,
      capabilities: ctx.resolver.capabilities,
      cookies: ctx.cookies,
      tempDir: config.tempDir,
      outputDir: config.outputDir,
      noOverwrite: config.noOverwrite,
      maxRestarts: config.maxRetries,
      serviceUnavailableWaitSeconds: config.serviceUnavailableWaitSeconds,
      signal: deps.signal,
    },
    { client: deps.transferClient, waiter: ctx.waiter, logger: ctx.logger, metrics: deps.metrics },
  );
  if (!transfer.ok) {
    return reportFailure(ctx, deps, { ok: false, kind: transfer.kind, detail: transfer.detail });
  }

  deps.output(transfer.finalPath);
  await deps.annotator.markQueue({ item: ctx.item, tag: "", suffix: `|${transfer.finalPath}` });
  return { item: ctx.item, code: EXIT_OK, output: transfer.finalPath };
}

/**
 * Runs one link from resolution to its final result. The cookie jar made here
 * is removed on every exit path, including interruption.
 */
export async function processLink(
  item: LinkItem,
  resolver: ResolverModule,
  url: string,
  deps: LinkPipelineDeps,
): Promise<LinkResult> {
  const { config, metrics } = deps;
  const logger = deps.logger.child("link");
  logger.info("download_start", { module: resolver.name, url });

  let cookies: CookieJar;
  try {
    cookies = await CookieJar.create(config.cookiesPath);
  } catch (error) {
    metrics.incrementCounter("links_failed");
    logger.error("cookie_jar_failed", { url, error: errorMessage(error) });
    return { item, code: EXIT_CODES.system_failure, kind: "system_failure" };
  }

  const ctx: LinkContext = {
    item,
    url,
    resolver,
    moduleArgs: [...config.moduleArgs, ...(config.moduleOptions[resolver.name] ?? [])],
    cookies,
    waiter: new WaitBudget({ logger, timeoutSeconds: config.timeoutSeconds, signal: deps.signal, sleepFn: deps.sleepFn }),
    logger,
  };

  try {
    const result = config.checkLink ? await checkLink(ctx, deps) : await downloadLink(ctx, deps);
    if (result.code !== EXIT_OK && deps.signal?.aborted) {
      metrics.incrementCounter("links_failed");
      logger.warn("link_interrupted", { url });
      return { item, code: EXIT_CODES.fatal, kind: "fatal" };
    }
    metrics.incrementCounter(result.code === EXIT_OK ? "links_ok" : "links_failed");
    return result;
  } catch (error) {
    metrics.incrementCounter("links_failed");
    if (deps.signal?.aborted) {
      logger.warn("link_interrupted", { url });
      return { item, code: EXIT_CODES.fatal, kind: "fatal" };
    }
    logger.error("link_system_failure", { url, error: errorMessage(error) });
    return { item, code: EXIT_CODES.system_failure, kind: "system_failure" };
  } finally {
    await cookies.dispose();
  }
}
