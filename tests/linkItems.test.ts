import fs from "node:fs";
import path from "node:path";
import { classifyItem, parseLinkList, uriDecode, uriEncode } from "../src/queue/linkItems";
import { logMessages, makeTempDir, quietLogger, removeDir } from "./helpers";

describe("parseLinkList", () => {
  it("skips blank lines and comments and trims the rest", () => {
    const content = ["http://a.example.test/1", "", "   ", "# a comment", "   #NOTFOUND http://x", "  http://a.example.test/2\t", "\r"].join("\n");
    expect(parseLinkList(content, "list.txt")).toEqual([
      { kind: "file", url: "http://a.example.test/1", sourceFile: "list.txt", rawLine: "http://a.example.test/1" },
      { kind: "file", url: "http://a.example.test/2", sourceFile: "list.txt", rawLine: "  http://a.example.test/2\t" },
    ]);
  });

  it("handles CRLF line endings", () => {
    expect(parseLinkList("http://a.example.test/1\r\nhttp://a.example.test/2\r\n", "l").map((item) => item.url)).toEqual([
      "http://a.example.test/1",
      "http://a.example.test/2",
    ]);
  });
});

describe("uriEncode", () => {
  it("escapes spaces and brackets and decodes them back", () => {
    expect(uriEncode("http://a.example.test/a b[1]")).toBe("http://a.example.test/a%20b%5B1%5D");
    expect(uriDecode("http://a.example.test/a%20b%5B1%5D")).toBe("http://a.example.test/a b[1]");
  });
});

describe("classifyItem", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("uses remote URLs as they are", async () => {
    expect(await classifyItem("ftp://a.example.test/file", quietLogger())).toEqual([
      { kind: "url", url: "ftp://a.example.test/file" },
    ]);
  });

  it("reads link-list files", async () => {
    const listPath = path.join(dir, "links.txt");
    await fs.promises.writeFile(listPath, "http://a.example.test/1\n");
    expect(await classifyItem(listPath, quietLogger())).toEqual([
      { kind: "file", url: "http://a.example.test/1", sourceFile: listPath, rawLine: "http://a.example.test/1" },
    ]);
  });

  it("skips binary files, directories and missing paths", async () => {
    const lines: string[] = [];
    const archive = path.join(dir, "movie.AVI");
    await fs.promises.writeFile(archive, "http://a.example.test/1\n");

    expect(await classifyItem(archive, quietLogger(lines))).toEqual([]);
    expect(await classifyItem(dir, quietLogger(lines))).toEqual([]);
    expect(await classifyItem(path.join(dir, "missing.txt"), quietLogger(lines))).toEqual([]);
    expect(logMessages(lines)).toEqual(["item_skipped_binary", "item_skipped_not_file", "item_skipped_missing"]);
  });
});
