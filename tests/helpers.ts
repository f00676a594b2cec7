import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Waiter, WaitResult } from "../src/core/wait";
import { TransferClient, TransferOutcome, TransferRequest } from "../src/download/transferClient";
import { Logger } from "../src/observability";
import { ResolverContext, ResolverModule } from "../src/resolve/types";
import { ModuleCapabilities, ResolveOutcome } from "../src/types";

export function quietLogger(lines: string[] = []): Logger {
  return new Logger({ component: "test", runId: "test-run", threshold: "debug", write: (line) => lines.push(line) });
}

export function logMessages(lines: string[]): string[] {
  return lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === "object" && parsed !== null && "msg" in parsed ? String(parsed.msg) : "";
  });
}

export class FakeWaiter implements Waiter {
  readonly waits: Array<{ seconds: number; reason: string }> = [];
  private readonly results: WaitResult[];

  constructor(results: WaitResult[] = []) {
    this.results = results;
  }

  async wait(seconds: number, reason: string): Promise<WaitResult> {
    this.waits.push({ seconds, reason });
    return this.results.shift() ?? "elapsed";
  }
}

export class ScriptedResolver implements ResolverModule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly capabilities: ModuleCapabilities;
  readonly calls: ResolverContext[] = [];
  private readonly outcomes: ResolveOutcome[];

  constructor(
    name: string,
    pattern: RegExp,
    outcomes: ResolveOutcome[],
    capabilities: ModuleCapabilities = { supportsResume: false, needsCookieOnFinalRequest: false },
  ) {
    this.name = name;
    this.pattern = pattern;
    this.outcomes = outcomes;
    this.capabilities = capabilities;
  }

  async resolve(ctx: ResolverContext): Promise<ResolveOutcome> {
    this.calls.push(ctx);
    const next = this.outcomes.length > 1 ? this.outcomes.shift() : this.outcomes[0];
    if (!next) {
      throw new Error("no scripted outcome left");
    }
    return next;
  }
}

export type TransferStep = (request: TransferRequest) => Promise<TransferOutcome>;

/** Plays one step per request; the last step repeats. */
export class FakeTransferClient implements TransferClient {
  readonly requests: TransferRequest[] = [];
  private readonly steps: TransferStep[];

  constructor(steps: TransferStep[]) {
    this.steps = steps;
  }

  async fetchToFile(request: TransferRequest): Promise<TransferOutcome> {
    this.requests.push(request);
    const step = this.steps.length > 1 ? this.steps.shift() : this.steps[0];
    if (!step) {
      throw new Error("no transfer step left");
    }
    return step(request);
  }
}

export function writeBody(body: string, status = 200): TransferStep {
  return async (request) => {
    await fs.promises.mkdir(path.dirname(path.resolve(request.destination)), { recursive: true });
    await fs.promises.writeFile(request.destination, body);
    return { kind: "complete", status, bytes: Buffer.byteLength(body) };
  };
}

export function httpError(status: number): TransferStep {
  return async () => ({ kind: "http_error", status });
}

export async function makeTempDir(prefix = "hostgrab-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}
