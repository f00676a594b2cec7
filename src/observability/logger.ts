import { LogFields, LogLevel, LogThreshold } from "./types";

export type LineWriter = (line: string) => void;

export interface LoggerContext {
  component: string;
  runId: string;
  threshold?: LogThreshold;
  write?: LineWriter;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const writeStderr: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Maps the command-line verbosity (0 none, 1 error, 2 notice, 3 debug, 4 report)
 * onto a log threshold.
 */
export function thresholdForVerbosity(verbose: number): LogThreshold {
  if (verbose <= 0) {
    return "silent";
  }
  if (verbose === 1) {
    return "error";
  }
  if (verbose === 2) {
    return "info";
  }
  return "debug";
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.context.threshold ?? "info"]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    // stdout is reserved for results (file paths, marks, module names)
    (this.context.write ?? writeStderr)(JSON.stringify(payload));
  }
}
