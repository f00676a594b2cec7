import { Agent, Dispatcher, fetch } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface RedirectProbeOptions {
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Requests `url` without following redirects and returns its Location header,
 * resolved against `url`. The User-Agent is sent empty since some proxies
 * rewrite answers for known agents.
 */
export async function probeRedirect(url: string, options: RedirectProbeOptions): Promise<string | undefined> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    const response = await fetch(url, {
      method: "GET",
      headers: { "user-agent": "" },
      redirect: "manual",
      dispatcher: options.dispatcher,
      signal: controller.signal,
    });
    await response.body?.cancel();
    const location = response.headers.get("location");
    if (response.status < 300 || response.status >= 400 || !location) {
      return undefined;
    }
    return new URL(location, url).toString();
  } finally {
    clearTimeout(timeout);
  }
}
