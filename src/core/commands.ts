import { AppConfig } from "../config";
import { processLink } from "../download/linkPipeline";
import { TransferClient } from "../download/transferClient";
import { LineWriter, Logger, MetricsRegistry } from "../observability";
import { LinkListAnnotator } from "../queue/annotator";
import { classifyItem } from "../queue/linkItems";
import { ResolverRegistry } from "../resolve/registry";
import { LinkItem, LinkResult } from "../types";
import { aggregateExitCodes, classifyOutcome, EXIT_CODES, EXIT_OK } from "./errors";
import { SleepFn } from "./wait";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  registry: ResolverRegistry;
  annotator: LinkListAnnotator;
  transferClient: TransferClient;
  /** Receives result lines: file paths, module names, printed templates. */
  output: LineWriter;
  signal?: AbortSignal;
  sleepFn?: SleepFn;
}

export interface BatchSummary {
  exitCode: number;
  results: LinkResult[];
}

async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current], current);
    }
  });
  await Promise.all(slots);
}

async function runLink(ctx: CommandContext, item: LinkItem): Promise<LinkResult> {
  const dispatch = await ctx.registry.dispatch(item.url);
  const resolver = dispatch.module;

  if (!resolver) {
    const { notice, tag } = classifyOutcome({ ok: false, kind: "no_module" }, "");
    ctx.logger.info(notice, { url: item.url });
    if (tag !== undefined) {
      await ctx.annotator.markQueue({ item, tag });
    }
    ctx.metrics.incrementCounter("links_failed");
    return { item, code: EXIT_CODES.no_module, kind: "no_module" };
  }

  if (ctx.config.getModule) {
    ctx.output(resolver.name);
    return { item, code: EXIT_OK, output: resolver.name };
  }

  return processLink(item, resolver, dispatch.url, {
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    annotator: ctx.annotator,
    transferClient: ctx.transferClient,
    output: ctx.output,
    signal: ctx.signal,
    sleepFn: ctx.sleepFn,
  });
}

/**
 * Expands command-line items into links and runs each one. Results keep input
 * order, so the aggregated exit code names the first failing link even when
 * links run in parallel.
 */
export async function runBatch(ctx: CommandContext, args: string[]): Promise<BatchSummary> {
  const items: LinkItem[] = [];
  for (const arg of args) {
    items.push(...(await classifyItem(arg, ctx.logger)));
  }
  ctx.logger.info("batch_start", { items: args.length, links: items.length, concurrency: ctx.config.linkConcurrency });

  const slots: Array<LinkResult | undefined> = new Array(items.length).fill(undefined);
  await processWithConcurrency(items, ctx.config.linkConcurrency, async (item, index) => {
    if (ctx.signal?.aborted) {
      return;
    }
    slots[index] = await runLink(ctx, item);
  });

  const results = slots.filter((result): result is LinkResult => result !== undefined);
  const codes = results.map((result) => result.code);
  if (results.length < items.length) {
    ctx.logger.warn("batch_interrupted", { processed: results.length, links: items.length });
    codes.push(EXIT_CODES.fatal);
  }

  const exitCode = aggregateExitCodes(codes);
  ctx.logger.info("batch_complete", { links: items.length, exitCode, ...ctx.metrics.getCounters() });
  return { exitCode, results };
}
