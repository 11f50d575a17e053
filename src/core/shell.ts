import { execFile, spawn } from "node:child_process";
import { open } from "node:fs/promises";
import { promisify } from "node:util";
import type { LogSink } from "./log-sink.js";

const pExecFile = promisify(execFile);

const MAX_BUFFER = 256 * 1024 * 1024;

export type CommandSpec = {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Runs child processes.
 * A non-zero exit is reported in the result, never thrown.
 */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
  stream(spec: CommandSpec, logFile: string): Promise<number>;
  /** True when `command` resolves on PATH (`command -v`). */
  exists(command: string): Promise<boolean>;
}

type ExecFailure = {
  code?: number | string | null;
  stdout?: string;
  stderr?: string;
  message?: string;
};

function isExecFailure(e: unknown): e is ExecFailure {
  return typeof e === "object" && e !== null && ("code" in e || "stdout" in e);
}

export class ExecFileRunner implements CommandRunner {
  async run(spec: CommandSpec): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await pExecFile(spec.command, spec.args, {
        cwd: spec.cwd,
        env: spec.env,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      });
      return { exitCode: 0, stdout, stderr };
    } catch (e: unknown) {
      if (!isExecFailure(e)) throw e;
      // Spawn failures (ENOENT, EACCES) carry a string code; report them like a shell would.
      const exitCode = typeof e.code === "number" ? e.code : 127;
      const stderr = e.stderr || (typeof e.code === "string" ? `${spec.command}: ${e.message ?? e.code}` : "");
      return { exitCode, stdout: e.stdout ?? "", stderr };
    }
  }

  async stream(spec: CommandSpec, logFile: string): Promise<number> {
    const handle = await open(logFile, "a");
    try {
      const outcome = await new Promise<{ code: number } | { error: Error }>((resolve) => {
        const child = spawn(spec.command, spec.args, {
          cwd: spec.cwd,
          env: spec.env,
          stdio: ["ignore", handle.fd, handle.fd],
        });
        child.once("error", (error) => resolve({ error }));
        child.once("close", (code) => resolve({ code: code ?? 1 }));
      });
      if ("code" in outcome) return outcome.code;

      await handle.appendFile(`${spec.command}: ${outcome.error.message}\n`, "utf8");
      return 127;
    } finally {
      await handle.close();
    }
  }

  async exists(command: string): Promise<boolean> {
    const res = await this.run({ command: "sh", args: ["-c", 'command -v "$1"', "sh", command] });
    return res.exitCode === 0;
  }
}

export function formatCommand(spec: Pick<CommandSpec, "command" | "args">): string {
  return [spec.command, ...spec.args].map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

/**
 * Runs commands for pipeline steps: every command gets the explicit build
 * environment and its output goes to the log file, never to the terminal.
 */
export class LoggedShell {
  constructor(
    private readonly runner: CommandRunner,
    private readonly log: LogSink,
    private readonly env: Readonly<Record<string, string>> = {},
  ) {}

  /** Output streams into the log while the command runs. Resolves to the exit code. */
  async run(command: string, args: string[], opts: { cwd?: string } = {}): Promise<number> {
    const spec = this.spec(command, args, opts.cwd);
    await this.log.command(spec, opts.cwd);
    const exitCode = await this.runner.stream(spec, this.log.filePath);
    if (exitCode !== 0) await this.log.note(`exit code ${exitCode}`);
    return exitCode;
  }

  /** For short queries whose output the caller reads; the output is logged after exit. */
  async capture(command: string, args: string[], opts: { cwd?: string } = {}): Promise<CommandResult> {
    const spec = this.spec(command, args, opts.cwd);
    await this.log.command(spec, opts.cwd);
    const result = await this.runner.run(spec);
    await this.log.output(result);
    return result;
  }

  private spec(command: string, args: string[], cwd?: string): CommandSpec {
    return { command, args, cwd, env: { ...process.env, ...this.env } };
  }
}
