import { once } from "node:events";
import fs from "node:fs";
import path from "node:path";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { Dispatcher, fetch, Response } from "undici";
import { errorMessage } from "../core/errors";
import { RateLimiter } from "./rateLimiter";

export interface TransferRequest {
  url: string;
  destination: string;
  /** Continue an existing destination file with a Range request. */
  resume: boolean;
  cookieHeader?: string;
  signal?: AbortSignal;
}

export type TransferOutcome =
  | { kind: "complete"; status: number; bytes: number }
  | { kind: "partial"; status: number; bytes: number; error?: string }
  | { kind: "http_error"; status: number }
  | { kind: "network_error"; error: string };

export interface TransferClient {
  fetchToFile(request: TransferRequest): Promise<TransferOutcome>;
}

export interface UndiciTransferClientOptions {
  userAgent: string;
  dispatcher?: Dispatcher;
  rateLimiter?: RateLimiter;
}

async function existingSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.size;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return 0;
    }
    throw error;
  }
}

function contentLength(response: Response): number | undefined {
  const raw = response.headers.get("content-length");
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * HTTP GET into a local file. HTTP errors leave the destination untouched;
 * a body shorter than its Content-Length is reported as partial.
 */
export class UndiciTransferClient implements TransferClient {
  private readonly options: UndiciTransferClientOptions;

  constructor(options: UndiciTransferClientOptions) {
    this.options = options;
  }

  async fetchToFile(request: TransferRequest): Promise<TransferOutcome> {
    const offset = request.resume ? await existingSize(request.destination) : 0;
    const headers: Record<string, string> = {
      "user-agent": this.options.userAgent,
    };
    if (offset > 0) {
      headers.range = `bytes=${offset}-`;
    }
    if (request.cookieHeader) {
      headers.cookie = request.cookieHeader;
    }

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: "GET",
        headers,
        redirect: "follow",
        dispatcher: this.options.dispatcher,
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal?.aborted) {
        throw error;
      }
      return { kind: "network_error", error: errorMessage(error) };
    }

    if (response.status < 200 || response.status >= 300) {
      await response.body?.cancel();
      return { kind: "http_error", status: response.status };
    }

    // A server ignoring the Range header answers 200 with the whole file.
    const append = response.status === 206 && offset > 0;
    await fs.promises.mkdir(path.dirname(path.resolve(request.destination)), { recursive: true });
    const writable = fs.createWriteStream(request.destination, { flags: append ? "a" : "w" });
    const expected = contentLength(response);
    let bytes = 0;

    if (!response.body) {
      writable.end();
      await once(writable, "finish");
      return { kind: "complete", status: response.status, bytes };
    }

    const readable = Readable.fromWeb(response.body);
    readable.on("data", (chunk: Buffer) => {
      bytes += chunk.length;
    });

    try {
      await this.pipe(readable, writable, request.signal);
    } catch (error) {
      if (request.signal?.aborted) {
        throw error;
      }
      return { kind: "partial", status: response.status, bytes, error: errorMessage(error) };
    }

    if (expected !== undefined && bytes < expected) {
      return { kind: "partial", status: response.status, bytes };
    }
    return { kind: "complete", status: response.status, bytes };
  }

  private async pipe(readable: Readable, writable: Writable, signal?: AbortSignal): Promise<void> {
    if (this.options.rateLimiter) {
      await pipeline(readable, this.options.rateLimiter.throttle(signal), writable);
      return;
    }
    await pipeline(readable, writable);
  }
}
