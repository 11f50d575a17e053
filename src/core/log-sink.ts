import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type CommandResult, type CommandSpec, formatCommand } from "./shell.js";

/**
 * Append-only install log. Truncated once per run, never rotated.
 * Subprocess output is only ever written here.
 */
export class LogSink {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async truncate(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, "", "utf8");
  }

  async append(text: string): Promise<void> {
    await appendFile(this.filePath, text.endsWith("\n") ? text : `${text}\n`, "utf8");
  }

  async note(message: string): Promise<void> {
    await this.append(`[${new Date().toISOString()}] ${message}`);
  }

  async command(spec: Pick<CommandSpec, "command" | "args">, cwd?: string): Promise<void> {
    await this.note(`${cwd ? `(${cwd}) ` : ""}$ ${formatCommand(spec)}`);
  }

  async output(result: CommandResult): Promise<void> {
    if (result.stdout) await this.append(result.stdout);
    if (result.stderr) await this.append(result.stderr);
    if (result.exitCode !== 0) await this.note(`exit code ${result.exitCode}`);
  }
}
