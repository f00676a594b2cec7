import { spawn } from "node:child_process";
import { Logger } from "../observability";

export interface TemplateValues {
  url: string;
  filename: string;
  cookies: string;
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Replaces `%url`, `%filename` and `%cookies`. With `quote`, each value is
 * single-quoted for the shell.
 */
export function interpolateTemplate(template: string, values: TemplateValues, quote = false): string {
  return template.replace(/%(url|filename|cookies)/g, (_match: string, key: string) => {
    const value = key === "url" ? values.url : key === "filename" ? values.filename : values.cookies;
    return quote ? shellQuote(value) : value;
  });
}

export function runExternalCommand(command: string, logger: Logger, signal?: AbortSignal): Promise<number> {
  logger.info("external_command_start", { command });
  return new Promise<number>((resolve, reject) => {
    const child = spawn(command, { shell: true, stdio: "inherit", signal });
    child.once("error", reject);
    child.once("exit", (code, exitSignal) => {
      const exitCode = code ?? (exitSignal ? 128 : 1);
      logger.info("external_command_exit", { exitCode, signal: exitSignal ?? undefined });
      resolve(exitCode);
    });
  });
}
