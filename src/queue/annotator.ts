import fs from "node:fs";
import { errorMessage } from "../core/errors";
import { Logger, LineWriter } from "../observability";
import { AnnotationTag, LinkItem } from "../types";
import { uriDecode } from "./linkItems";

export interface MarkRequest {
  item: LinkItem;
  tag: AnnotationTag;
  suffix?: string;
}

export interface MarkedLines {
  lines: string[];
  changed: number;
}

/** Comments out every line whose trimmed text is `link`; a trailing `\r` is kept. */
export function markLines(lines: string[], link: string, tag: AnnotationTag, suffix = ""): MarkedLines {
  let changed = 0;
  const marked = lines.map((line) => {
    if (line.trim() !== link) {
      return line;
    }
    changed += 1;
    const eol = line.endsWith("\r") ? "\r" : "";
    return `#${tag} ${link}${suffix}${eol}`;
  });
  return { lines: marked, changed };
}

/**
 * Records the outcome of a link next to where it came from: the matching line
 * of its link-list file is commented out with a tag, or a tagged line is
 * printed for links given on the command line. Rewrites of one file never
 * overlap.
 */
export class LinkListAnnotator {
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly output: LineWriter;
  private readonly queues = new Map<string, Promise<boolean>>();

  constructor(options: { enabled: boolean; logger: Logger; output: LineWriter }) {
    this.enabled = options.enabled;
    this.logger = options.logger;
    this.output = options.output;
  }

  async markQueue(request: MarkRequest): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }

    const { item, tag, suffix } = request;
    if (item.kind !== "file" || !item.sourceFile) {
      this.output(`#${tag} ${item.url}`);
      return true;
    }

    const sourceFile = item.sourceFile;
    const previous = this.queues.get(sourceFile) ?? Promise.resolve(true);
    const link = item.rawLine?.trim() ?? uriDecode(item.url);
    const next = previous.then(() => this.rewrite(sourceFile, link, tag, suffix));
    this.queues.set(sourceFile, next);
    return next;
  }

  private async rewrite(sourceFile: string, link: string, tag: AnnotationTag, suffix?: string): Promise<boolean> {
    try {
      await fs.promises.access(sourceFile, fs.constants.W_OK);
    } catch {
      this.logger.info("mark_no_write_permission", { file: sourceFile, tag });
      return false;
    }

    const tempPath = `${sourceFile}.${process.pid}.tmp`;
    try {
      const content = await fs.promises.readFile(sourceFile, "utf-8");
      const { lines, changed } = markLines(content.split("\n"), link, tag, suffix);
      if (changed === 0) {
        this.logger.warn("mark_line_not_found", { file: sourceFile, link, tag });
        return false;
      }
      await fs.promises.writeFile(tempPath, lines.join("\n"), "utf-8");
      await fs.promises.rename(tempPath, sourceFile);
      this.logger.info("link_marked", { file: sourceFile, tag: `#${tag}` });
      return true;
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      this.logger.error("mark_failed", { file: sourceFile, tag, error: errorMessage(error) });
      return false;
    }
  }
}
