import fs from "node:fs";
import path from "node:path";
import { CookieJar } from "../src/cookies/cookieJar";
import { invokeResolver, normalizeOutcome } from "../src/resolve/adapter";
import { isResolverModule, loadResolverModules } from "../src/resolve/loader";
import { NullResolver } from "../src/resolve/nullResolver";
import { isRemoteUrl, ResolverRegistry } from "../src/resolve/registry";
import { ResolverModule } from "../src/resolve/types";
import { makeTempDir, quietLogger, removeDir, ScriptedResolver } from "./helpers";

const first = new ScriptedResolver("first", /^https?:\/\/one\.example\.test\//, [{ ok: false, kind: "link_dead" }]);
const second = new ScriptedResolver("second", /^https?:\/\/(one|two)\.example\.test\//, [{ ok: false, kind: "link_dead" }]);

describe("ResolverRegistry", () => {
  it("picks the first module whose pattern matches", async () => {
    const registry = new ResolverRegistry([first, second], { logger: quietLogger(), fallback: false });
    expect(registry.names()).toEqual(["first", "second"]);
    expect(await registry.dispatch("http://one.example.test/f")).toEqual({ url: "http://one.example.test/f", module: first });
    expect(await registry.dispatch("http://two.example.test/f")).toEqual({ url: "http://two.example.test/f", module: second });
  });

  it("rejects two modules with the same name", () => {
    expect(() => new ResolverRegistry([first, first], { logger: quietLogger(), fallback: false })).toThrow(
      "Duplicate resolver module name: first",
    );
  });

  it("follows a redirect of an unmatched URL", async () => {
    const probed: string[] = [];
    const registry = new ResolverRegistry([first], {
      logger: quietLogger(),
      fallback: true,
      probeRedirect: async (url) => {
        probed.push(url);
        return "http://one.example.test/real";
      },
    });

    expect(await registry.dispatch("http://short.example.test/abc")).toEqual({
      url: "http://one.example.test/real",
      module: first,
    });
    expect(probed).toEqual(["http://short.example.test/abc"]);
  });

  it("uses the plain GET module only with fallback enabled", async () => {
    const noRedirect = async (): Promise<string | undefined> => undefined;
    const withFallback = new ResolverRegistry([first], { logger: quietLogger(), fallback: true, probeRedirect: noRedirect });
    const without = new ResolverRegistry([first], { logger: quietLogger(), fallback: false, probeRedirect: noRedirect });

    const dispatched = await withFallback.dispatch("http://other.example.test/file.bin");
    expect(dispatched.module).toBeInstanceOf(NullResolver);
    expect(await without.dispatch("http://other.example.test/file.bin")).toEqual({ url: "http://other.example.test/file.bin" });
  });

  it("falls back when the redirect probe fails", async () => {
    const registry = new ResolverRegistry([], {
      logger: quietLogger(),
      fallback: true,
      probeRedirect: async () => {
        throw new Error("connect ECONNREFUSED");
      },
    });
    const dispatched = await registry.dispatch("https://other.example.test/file.bin");
    expect(dispatched.module?.name).toBe("null");
  });

  it("never probes or falls back for items that are not remote URLs", async () => {
    const registry = new ResolverRegistry([], {
      logger: quietLogger(),
      fallback: true,
      probeRedirect: async () => {
        throw new Error("unexpected probe");
      },
    });
    expect(await registry.dispatch("magnet:?xt=abc")).toEqual({ url: "magnet:?xt=abc" });
    expect(isRemoteUrl("FTP://a.example.test/")).toBe(true);
    expect(isRemoteUrl("file:///etc/hosts")).toBe(false);
  });
});

describe("resolver adapter", () => {
  it("normalizes what modules return", () => {
    expect(normalizeOutcome({ ok: true, directUrl: "http://a.example.test/f", filename: "" })).toEqual({
      ok: true,
      directUrl: "http://a.example.test/f",
      filename: undefined,
    });
    expect(normalizeOutcome({ ok: false, kind: "temporarily_unavailable", waitHint: 30 })).toEqual({
      ok: false,
      kind: "temporarily_unavailable",
      waitHint: 30,
      detail: undefined,
    });
    expect(normalizeOutcome({ ok: false, kind: "weird" })).toEqual({ ok: false, kind: "fatal", detail: "weird" });
    expect(normalizeOutcome({ ok: false, kind: "network", detail: "timeout" })).toEqual({
      ok: false,
      kind: "fatal",
      detail: "network",
    });
    expect(normalizeOutcome(undefined)).toEqual({ ok: false, kind: "fatal", detail: "resolver returned no outcome" });
  });

  it("turns a throwing module into a fatal outcome", async () => {
    const throwing: ResolverModule = {
      name: "throwing",
      pattern: /x/,
      capabilities: { supportsResume: false, needsCookieOnFinalRequest: false },
      resolve: async () => {
        throw new Error("parse error");
      },
    };
    const cookies = await CookieJar.create();
    try {
      const outcome = await invokeResolver(throwing, { url: "http://x", cookies, moduleArgs: [], logger: quietLogger() });
      expect(outcome).toEqual({ ok: false, kind: "fatal", detail: "parse error" });
    } finally {
      await cookies.dispose();
    }
  });
});

describe("loadResolverModules", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("loads a module exported under the name resolver", async () => {
    const modulePath = path.join(dir, "tmpmod.js");
    await fs.promises.writeFile(
      modulePath,
      [
        "module.exports = {",
        "  resolver: {",
        '    name: "tmpmod",',
        "    pattern: /^https?:\\/\\/tmp\\.example\\.test\\//,",
        "    capabilities: { supportsResume: true, needsCookieOnFinalRequest: false },",
        '    resolve: async (ctx) => ({ ok: true, directUrl: ctx.url + "/file" }),',
        "  },",
        "};",
      ].join("\n"),
    );

    const [loaded] = await loadResolverModules([modulePath]);

    expect(loaded.name).toBe("tmpmod");
    expect(loaded.pattern.test("http://tmp.example.test/abc")).toBe(true);
    expect(loaded.capabilities).toEqual({ supportsResume: true, needsCookieOnFinalRequest: false });
  });

  it("rejects files that do not export a module", async () => {
    const modulePath = path.join(dir, "bad.js");
    await fs.promises.writeFile(modulePath, 'module.exports = { name: "bad" };\n');
    await expect(loadResolverModules([modulePath])).rejects.toThrow(`Not a resolver module: ${modulePath}`);
  });

  it("checks the module shape", () => {
    expect(isResolverModule(new NullResolver())).toBe(true);
    expect(isResolverModule({ name: "x", pattern: "x", resolve: () => undefined })).toBe(false);
  });
});
