import fs from "node:fs";
import path from "node:path";
import { getHelpText, parseCliArgs, runCli } from "../src/cli";
import { FakeTransferClient, makeTempDir, removeDir, ScriptedResolver, writeBody } from "./helpers";

describe("parseCliArgs", () => {
  it("separates options, module options and items", () => {
    expect(
      parseCliArgs(["-m", "--max-retries", "3", "-o", "out", "--auth=user:test-secret", "--premium", "links.txt", "http://a.example.test/1"]),
    ).toEqual({
      items: ["links.txt", "http://a.example.test/1"],
      overrides: { markDownloaded: true, maxRetries: 3, outputDir: "out" },
      captchaMethod: undefined,
      configPath: undefined,
      moduleArgs: ["--auth=user:test-secret", "--premium"],
    });
  });

  it("reads values written with an equals sign", () => {
    const parsed = parseCliArgs(["--limit-rate=200k", "--timeout=30", "--captchamethod=none", "--config=cfg.json", "u"]);
    expect(parsed).toEqual({
      items: ["u"],
      overrides: { limitRate: 200 * 1024, timeoutSeconds: 30 },
      captchaMethod: "none",
      configPath: "cfg.json",
      moduleArgs: [],
    });
  });

  it("treats everything after -- as items", () => {
    const parsed = parseCliArgs(["-q", "--", "-weird-name.txt"]);
    expect(parsed).toEqual({
      items: ["-weird-name.txt"],
      overrides: { verbose: 0 },
      captchaMethod: undefined,
      configPath: undefined,
      moduleArgs: [],
    });
  });

  it("reads a separate word after a module option as an item", () => {
    const parsed = parseCliArgs(["--premium", "http://a.example.test/1"]);
    expect(parsed).toEqual({
      items: ["http://a.example.test/1"],
      overrides: {},
      captchaMethod: undefined,
      configPath: undefined,
      moduleArgs: ["--premium"],
    });
    expect(getHelpText()).toContain("--auth=user:pass");
  });

  it("recognises help and version", () => {
    expect(parseCliArgs(["u", "-h"])).toBe("help");
    expect(parseCliArgs(["--version"])).toBe("version");
  });

  it("reports usage errors", () => {
    expect(parseCliArgs(["-z"])).toEqual({ error: "unknown option: -z" });
    expect(parseCliArgs(["-r"])).toEqual({ error: "option --max-retries requires an argument" });
    expect(parseCliArgs(["-r", "many"])).toEqual({ error: 'option --max-retries expects a number, got "many"' });
    expect(parseCliArgs(["--concurrency", "0"])).toEqual({ error: "option --concurrency must be at least 1" });
    expect(parseCliArgs(["-l", "fast"])).toEqual({ error: 'option --limit-rate expects a speed such as 200k, got "fast"' });
    expect(parseCliArgs(["--run-download", "a", "--download-info-only", "b"])).toEqual({
      error: "--run-download and --download-info-only cannot be used together",
    });
  });
});

describe("runCli", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("prints the help text", async () => {
    const output: string[] = [];
    expect(await runCli(["--help"], { output: (line) => output.push(line) })).toBe(0);
    expect(output).toEqual([getHelpText()]);
  });

  it("exits 15 on a bad command line", async () => {
    const errors: string[] = [];
    expect(await runCli(["--max-retries"], { logWriter: (line) => errors.push(line), output: () => undefined })).toBe(15);
    expect(errors[0]).toBe("hostgrab: option --max-retries requires an argument");
  });

  it("exits 1 without items", async () => {
    expect(await runCli([], { logWriter: () => undefined, output: () => undefined, env: {} })).toBe(1);
  });

  it("fails at startup on an unknown captcha method", async () => {
    await expect(
      runCli(["--captchamethod", "ocr", "http://a.example.test/1"], { env: {}, logWriter: () => undefined }),
    ).rejects.toThrow("unknown captcha method: ocr");
  });

  it("fails at startup on a missing cookie file", async () => {
    const missing = path.join(dir, "cookies.txt");
    await expect(
      runCli(["--cookies", missing, "http://a.example.test/1"], { env: {}, logWriter: () => undefined }),
    ).rejects.toThrow(`cannot read cookies file: ${missing}`);
  });

  it("runs a batch end to end", async () => {
    const outputDir = path.join(dir, "out");
    const listPath = path.join(dir, "links.txt");
    await fs.promises.writeFile(listPath, "http://host.example.test/1\nhttp://dead.example.test/2\n");
    const host = new ScriptedResolver("host", /host\.example\.test/, [{ ok: true, directUrl: "http://cdn.example.test/a.bin" }]);
    const dead = new ScriptedResolver("dead", /dead\.example\.test/, [{ ok: false, kind: "link_dead" }]);
    const output: string[] = [];
    const controller = new AbortController();

    const exitCode = await runCli(["-m", "-o", outputDir, listPath], {
      env: {},
      output: (line) => output.push(line),
      logWriter: () => undefined,
      modules: [host, dead],
      transferClient: new FakeTransferClient([writeBody("payload")]),
      probeRedirect: async () => undefined,
      signal: controller.signal,
    });

    const finalPath = path.join(outputDir, "a.bin");
    expect(exitCode).toBe(13);
    expect(output).toEqual([finalPath]);
    expect(await fs.promises.readFile(listPath, "utf-8")).toBe(
      `# http://host.example.test/1|${finalPath}\n#NOTFOUND http://dead.example.test/2\n`,
    );
  });
});
