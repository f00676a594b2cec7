import fs from "node:fs";
import path from "node:path";
import { Logger } from "../observability";
import { isRemoteUrl } from "../resolve/registry";
import { LinkItem } from "../types";

const BINARY_EXTENSIONS = new Set(["zip", "rar", "tar", "gz", "7z", "bz2", "mp3", "avi"]);

// Empty lines and `#` comments are not links.
const LINK_LINE = /^\s*([^\s#].*?)\s*$/;

export function uriEncode(value: string): string {
  return value.replace(/ /g, "%20").replace(/\[/g, "%5B").replace(/\]/g, "%5D");
}

export function uriDecode(value: string): string {
  return value.replace(/%20/g, " ").replace(/%5B/g, "[").replace(/%5D/g, "]");
}

export function parseLinkList(content: string, sourceFile: string): LinkItem[] {
  const items: LinkItem[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const match = LINK_LINE.exec(rawLine);
    if (!match) {
      continue;
    }
    items.push({ kind: "file", url: uriEncode(match[1]), sourceFile, rawLine });
  }
  return items;
}

/**
 * Turns one command-line argument into link items: a remote URL is used as is,
 * a text file is read as a list of links.
 */
export async function classifyItem(item: string, logger: Logger): Promise<LinkItem[]> {
  if (isRemoteUrl(item)) {
    return [{ kind: "url", url: uriEncode(item.trim()) }];
  }

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(item);
  } catch {
    logger.error("item_skipped_missing", { item, reason: "No such file or directory" });
    return [];
  }
  if (!stats.isFile()) {
    logger.error("item_skipped_not_file", { item });
    return [];
  }

  const extension = path.extname(item).slice(1).toLowerCase();
  if (BINARY_EXTENSIONS.has(extension)) {
    logger.error("item_skipped_binary", { item, reason: "seems to be a binary file, not a list of links" });
    return [];
  }

  return parseLinkList(await fs.promises.readFile(item, "utf-8"), item);
}
