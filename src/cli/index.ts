import fs from "node:fs";
import { AppConfig, ConfigOverrides, loadConfig, parseCaptchaMethod } from "../config";
import { runBatch } from "../core/commands";
import { EXIT_BAD_COMMAND_LINE, EXIT_CODES, EXIT_OK } from "../core/errors";
import { getFetchDispatcher, probeRedirect } from "../core/fetch";
import { parseRate, RateLimiter } from "../download/rateLimiter";
import { TransferClient, UndiciTransferClient } from "../download/transferClient";
import { createRunId, LineWriter, Logger, MetricsRegistry, thresholdForVerbosity } from "../observability";
import { LinkListAnnotator } from "../queue/annotator";
import { loadResolverModules } from "../resolve/loader";
import { RedirectProbe, ResolverRegistry } from "../resolve/registry";
import { ResolverModule } from "../resolve/types";

export const VERSION = "0.1.0";

export interface ParsedCliArgs {
  items: string[];
  overrides: ConfigOverrides;
  captchaMethod?: string;
  configPath?: string;
  /** Options hostgrab does not know, handed to resolver modules. */
  moduleArgs: string[];
}

export type CliParseResult = ParsedCliArgs | "help" | "version" | { error: string };

const HELP_TEXT = `
Usage:
  hostgrab [OPTIONS] [MODULE_OPTIONS] URL|FILE ...

Options:
  -h, --help                  Show this help
      --version               Print the version
  -v, --verbose <n>           Verbosity: 0 none, 1 errors, 2 notices (default), 3 debug, 4 report
  -q, --quiet                 Same as --verbose 0
  -c, --check-link            Only check whether links are alive
  -m, --mark-downloaded       Comment out processed links in their link-list files
  -x, --no-overwrite          Never overwrite an existing file, pick name.1, name.2, ...
  -o, --output-directory <d>  Directory for downloaded files
      --temp-directory <d>    Directory for partial downloads
  -l, --limit-rate <speed>    Transfer rate limit in bytes per second (k, m, g suffixes)
  -t, --timeout <secs>        Wait budget per link
  -r, --max-retries <n>       Resolution retries (captcha failures, bad statuses)
      --captchamethod <m>     Captcha method: prompt, none
      --no-extra-wait         Do not wait when a link is temporarily unavailable
      --cookies <file>        Seed every link's cookie jar from a Netscape cookie file
      --get-module            Print the resolver module of each link and exit
      --run-download <cmd>    Download with a command (%url, %filename, %cookies)
      --download-info-only <s> Print a line (%url, %filename, %cookies) instead of downloading
      --fallback              Download unmatched URLs with a plain GET
      --config <path>         Optional path to JSON config file
      --ignore-https-errors   Ignore TLS certificate errors (use only when required)
      --concurrency <n>       Links processed in parallel

Module options are long options hostgrab does not know, such as --auth=user:pass.
They take their value after "=": a separate word is read as a link or file.
`;

const SHORT_OPTIONS: Record<string, string> = {
  "-h": "--help",
  "-v": "--verbose",
  "-q": "--quiet",
  "-c": "--check-link",
  "-m": "--mark-downloaded",
  "-x": "--no-overwrite",
  "-o": "--output-directory",
  "-l": "--limit-rate",
  "-t": "--timeout",
  "-r": "--max-retries",
};

class CliUsageError extends Error {}

function toCount(option: string, raw: string, min = 0): number {
  if (!/^\d+$/.test(raw)) {
    throw new CliUsageError(`option ${option} expects a number, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    throw new CliUsageError(`option ${option} must be at least ${min}`);
  }
  return value;
}

function toRate(option: string, raw: string): number {
  try {
    return parseRate(raw);
  } catch {
    throw new CliUsageError(`option ${option} expects a speed such as 200k, got "${raw}"`);
  }
}

function parseOptions(argv: string[]): CliParseResult {
  const items: string[] = [];
  const overrides: ConfigOverrides = {};
  const moduleArgs: string[] = [];
  let captchaMethod: string | undefined;
  let configPath: string | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      items.push(...argv.slice(index + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      items.push(arg);
      continue;
    }

    const equals = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const rawName = equals > 0 ? arg.slice(0, equals) : arg;
    const inlineValue = equals > 0 ? arg.slice(equals + 1) : undefined;
    const option = SHORT_OPTIONS[rawName] ?? rawName;
    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[index + 1];
      if (next === undefined) {
        throw new CliUsageError(`option ${option} requires an argument`);
      }
      index += 1;
      return next;
    };

    switch (option) {
      case "--help":
        return "help";
      case "--version":
        return "version";
      case "--verbose":
        overrides.verbose = toCount(option, takeValue());
        break;
      case "--quiet":
        overrides.verbose = 0;
        break;
      case "--check-link":
        overrides.checkLink = true;
        break;
      case "--mark-downloaded":
        overrides.markDownloaded = true;
        break;
      case "--no-overwrite":
        overrides.noOverwrite = true;
        break;
      case "--output-directory":
        overrides.outputDir = takeValue();
        break;
      case "--temp-directory":
        overrides.tempDir = takeValue();
        break;
      case "--limit-rate":
        overrides.limitRate = toRate(option, takeValue());
        break;
      case "--timeout":
        overrides.timeoutSeconds = toCount(option, takeValue(), 1);
        break;
      case "--max-retries":
        overrides.maxRetries = toCount(option, takeValue());
        break;
      case "--captchamethod":
        captchaMethod = takeValue();
        break;
      case "--no-extra-wait":
        overrides.noExtraWait = true;
        break;
      case "--cookies":
        overrides.cookiesPath = takeValue();
        break;
      case "--get-module":
        overrides.getModule = true;
        break;
      case "--run-download":
        overrides.runDownload = takeValue();
        break;
      case "--download-info-only":
        overrides.downloadInfo = takeValue();
        break;
      case "--fallback":
        overrides.fallback = true;
        break;
      case "--config":
        configPath = takeValue();
        break;
      case "--ignore-https-errors":
        overrides.ignoreHttpsErrors = true;
        break;
      case "--concurrency":
        overrides.linkConcurrency = toCount(option, takeValue(), 1);
        break;
      default:
        if (!option.startsWith("--")) {
          throw new CliUsageError(`unknown option: ${arg}`);
        }
        moduleArgs.push(arg);
    }
  }

  if (overrides.runDownload !== undefined && overrides.downloadInfo !== undefined) {
    throw new CliUsageError("--run-download and --download-info-only cannot be used together");
  }

  return { items, overrides, captchaMethod, configPath, moduleArgs };
}

export function parseCliArgs(argv: string[]): CliParseResult {
  try {
    return parseOptions(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      return { error: error.message };
    }
    throw error;
  }
}

function applyCliArgs(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  const { limitRate, ...overrides } = parsed.overrides;
  const merged: AppConfig = {
    ...config,
    ...overrides,
    moduleArgs: [...config.moduleArgs, ...parsed.moduleArgs],
  };
  if (typeof limitRate === "number") {
    merged.limitRate = limitRate;
  }
  if (parsed.captchaMethod !== undefined) {
    merged.captchaMethod = parseCaptchaMethod(parsed.captchaMethod);
  }
  return merged;
}

async function prepareDirectory(label: string, dir: string | undefined): Promise<void> {
  if (!dir) {
    return;
  }
  await fs.promises.mkdir(dir, { recursive: true });
  try {
    await fs.promises.access(dir, fs.constants.W_OK);
  } catch {
    throw new Error(`${label} directory is not writable: ${dir}`);
  }
}

async function checkCookiesFile(cookiesPath: string | undefined): Promise<void> {
  if (!cookiesPath) {
    return;
  }
  try {
    await fs.promises.access(cookiesPath, fs.constants.R_OK);
  } catch {
    throw new Error(`cannot read cookies file: ${cookiesPath}`);
  }
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Result lines; stdout by default. */
  output?: LineWriter;
  /** Log and usage lines; stderr by default. */
  logWriter?: LineWriter;
  /** Resolver modules registered ahead of the configured ones. */
  modules?: ResolverModule[];
  transferClient?: TransferClient;
  probeRedirect?: RedirectProbe;
  /** When given, the caller owns interruption and no signal handlers are installed. */
  signal?: AbortSignal;
}

const writeStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

const writeStderr: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const output = deps.output ?? writeStdout;
  const errorOutput = deps.logWriter ?? writeStderr;

  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    output(HELP_TEXT.trim());
    return EXIT_OK;
  }
  if (parsed === "version") {
    output(`hostgrab ${VERSION}`);
    return EXIT_OK;
  }
  if ("error" in parsed) {
    errorOutput(`hostgrab: ${parsed.error}`);
    errorOutput("Try `hostgrab --help' for more information.");
    return EXIT_BAD_COMMAND_LINE;
  }
  if (parsed.items.length === 0) {
    errorOutput(HELP_TEXT.trim());
    return EXIT_CODES.fatal;
  }

  const config = applyCliArgs(loadConfig(parsed.configPath, deps.env), parsed);
  await prepareDirectory("temporary", config.tempDir);
  await prepareDirectory("output", config.outputDir);
  await checkCookiesFile(config.cookiesPath);

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({
    component: "cli",
    runId,
    threshold: thresholdForVerbosity(config.verbose),
    write: deps.logWriter,
  });

  const modules = [...(deps.modules ?? []), ...(await loadResolverModules(config.resolverModules))];
  const dispatcher = getFetchDispatcher(config.ignoreHttpsErrors);
  const registry = new ResolverRegistry(modules, {
    logger: logger.child("registry"),
    fallback: config.fallback,
    probeRedirect: deps.probeRedirect ?? ((url) => probeRedirect(url, { timeoutMs: config.requestTimeoutMs, dispatcher })),
  });
  const transferClient =
    deps.transferClient ??
    new UndiciTransferClient({
      userAgent: config.userAgent,
      dispatcher,
      rateLimiter: config.limitRate !== undefined ? new RateLimiter(config.limitRate) : undefined,
    });
  const annotator = new LinkListAnnotator({ enabled: config.markDownloaded, logger: logger.child("annotator"), output });

  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals): void => {
    logger.warn("interrupted", { signal });
    controller.abort();
  };
  if (!deps.signal) {
    process.once("SIGINT", interrupt);
    process.once("SIGTERM", interrupt);
  }

  logger.info("command_start", {
    items: parsed.items.length,
    modules: registry.names(),
    checkLink: config.checkLink,
    getModule: config.getModule,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    const summary = await runBatch(
      {
        runId,
        config,
        logger: logger.child("batch"),
        metrics,
        registry,
        annotator,
        transferClient,
        output,
        signal: deps.signal ?? controller.signal,
      },
      parsed.items,
    );
    logger.info("command_complete", { exitCode: summary.exitCode });
    return summary.exitCode;
  } finally {
    process.removeListener("SIGINT", interrupt);
    process.removeListener("SIGTERM", interrupt);
    logger.debug("metrics_summary", { ...metrics.summary() });
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
