import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export interface Cookie {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Unix seconds; 0 marks a session cookie. */
  expires: number;
  name: string;
  value: string;
}

const HTTP_ONLY_PREFIX = "#HttpOnly_";

export function parseNetscapeCookies(text: string): Cookie[] {
  const cookies: Cookie[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      line = line.slice(HTTP_ONLY_PREFIX.length);
    } else if (line === "" || line.startsWith("#")) {
      continue;
    }

    const fields = line.split("\t");
    if (fields.length < 7) {
      continue;
    }
    const [domain, includeSubdomains, cookiePath, secure, expires, name, ...rest] = fields;
    cookies.push({
      domain,
      includeSubdomains: includeSubdomains.toUpperCase() === "TRUE",
      path: cookiePath,
      secure: secure.toUpperCase() === "TRUE",
      expires: Number.parseInt(expires, 10) || 0,
      name,
      value: rest.join("\t"),
    });
  }
  return cookies;
}

export function formatNetscapeCookie(cookie: Cookie): string {
  return [
    cookie.domain,
    cookie.includeSubdomains ? "TRUE" : "FALSE",
    cookie.path,
    cookie.secure ? "TRUE" : "FALSE",
    String(cookie.expires),
    cookie.name,
    cookie.value,
  ].join("\t");
}

function domainMatches(cookie: Cookie, host: string): boolean {
  const domain = cookie.domain.replace(/^\./, "").toLowerCase();
  if (host === domain) {
    return true;
  }
  const subdomainsAllowed = cookie.includeSubdomains || cookie.domain.startsWith(".");
  return subdomainsAllowed && host.endsWith(`.${domain}`);
}

export function cookiesForUrl(cookies: Cookie[], url: string, now = Date.now()): Cookie[] {
  const target = new URL(url);
  const host = target.hostname.toLowerCase();
  return cookies.filter(
    (cookie) =>
      domainMatches(cookie, host) &&
      target.pathname.startsWith(cookie.path || "/") &&
      (!cookie.secure || target.protocol === "https:") &&
      (cookie.expires === 0 || cookie.expires * 1000 > now),
  );
}

/**
 * File-backed cookie set owned by a single link's pipeline. The file lives in a
 * private temporary directory that `dispose` removes.
 */
export class CookieJar {
  readonly path: string;
  private readonly directory: string;

  private constructor(directory: string) {
    this.directory = directory;
    this.path = path.join(directory, "cookies.txt");
  }

  static async create(seedPath?: string): Promise<CookieJar> {
    const directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), "hostgrab-"));
    const jar = new CookieJar(directory);
    const seed = seedPath ? await fs.promises.readFile(seedPath, "utf-8") : "";
    await fs.promises.writeFile(jar.path, seed, "utf-8");
    return jar;
  }

  async list(): Promise<Cookie[]> {
    return parseNetscapeCookies(await fs.promises.readFile(this.path, "utf-8"));
  }

  async set(cookie: Cookie): Promise<void> {
    const kept = (await this.list()).filter(
      (existing) =>
        !(existing.name === cookie.name && existing.domain === cookie.domain && existing.path === cookie.path),
    );
    kept.push(cookie);
    await fs.promises.writeFile(this.path, `${kept.map(formatNetscapeCookie).join("\n")}\n`, "utf-8");
  }

  async headerFor(url: string): Promise<string | undefined> {
    const matching = cookiesForUrl(await this.list(), url);
    if (matching.length === 0) {
      return undefined;
    }
    return matching.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
  }

  async copyTo(destination: string): Promise<void> {
    await fs.promises.copyFile(this.path, destination);
  }

  async dispose(): Promise<void> {
    await fs.promises.rm(this.directory, { recursive: true, force: true });
  }
}
