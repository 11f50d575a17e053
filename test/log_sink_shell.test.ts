import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { LogSink } from "../src/core/log-sink.js";
import { ExecFileRunner, LoggedShell, formatCommand } from "../src/core/shell.js";
import { FakeRunner } from "./helpers/fake-runner.js";

const TIMESTAMP = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /;

describe("formatCommand", () => {
  it("quotes only parts that need it", () => {
    expect(formatCommand({ command: "apt-get", args: ["install", "-y", "g++"] })).toBe("apt-get install -y g++");
    expect(formatCommand({ command: "sh", args: ["-c", 'command -v "$1"'] })).toBe('sh -c "command -v \\"$1\\""');
  });
});

describe("LogSink", () => {
  let tmpDir: string;
  let log: LogSink;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "im7-log-"));
    log = new LogSink(path.join(tmpDir, "nested", "install.log"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("truncates an existing log", async () => {
    fs.mkdirSync(path.dirname(log.filePath), { recursive: true });
    fs.writeFileSync(log.filePath, "previous run\n");
    await log.truncate();
    expect(fs.readFileSync(log.filePath, "utf8")).toBe("");
  });

  it("terminates every append with a newline", async () => {
    await log.truncate();
    await log.append("one");
    await log.append("two\n");
    expect(fs.readFileSync(log.filePath, "utf8")).toBe("one\ntwo\n");
  });

  it("timestamps notes and records commands with their cwd", async () => {
    await log.truncate();
    await log.command({ command: "make", args: ["install"] }, "/work/build_aom");

    const line = fs.readFileSync(log.filePath, "utf8");
    expect(line).toMatch(TIMESTAMP);
    expect(line.replace(TIMESTAMP, "")).toBe("(/work/build_aom) $ make install\n");
  });

  it("records the exit code of failed commands", async () => {
    await log.truncate();
    await log.output({ exitCode: 2, stdout: "compiling\n", stderr: "error: boom" });

    const lines = fs.readFileSync(log.filePath, "utf8").split("\n");
    expect(lines.slice(0, 2)).toEqual(["compiling", "error: boom"]);
    expect(lines[2]?.replace(TIMESTAMP, "")).toBe("exit code 2");
  });
});

describe("LoggedShell", () => {
  let tmpDir: string;
  let log: LogSink;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "im7-shell-"));
    log = new LogSink(path.join(tmpDir, "install.log"));
    await log.truncate();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("passes the build environment and logs output instead of printing it", async () => {
    const runner = new FakeRunner().on(() => ({ stdout: "checking for gcc... gcc\n" }));
    const shell = new LoggedShell(runner, log, { MAKEFLAGS: "-j3 -l2" });

    const exitCode = await shell.run("./configure", ["--disable-docs"], { cwd: "/work/ImageMagick-7.1.1-29" });

    expect(exitCode).toBe(0);
    expect(runner.calls[0]?.cwd).toBe("/work/ImageMagick-7.1.1-29");
    expect(runner.calls[0]?.env?.MAKEFLAGS).toBe("-j3 -l2");
    expect(fs.readFileSync(log.filePath, "utf8")).toContain("checking for gcc... gcc\n");
  });

  it("keeps stdout and stderr in the order the command wrote them", async () => {
    const shell = new LoggedShell(new ExecFileRunner(), log);

    const exitCode = await shell.run("sh", ["-c", "echo out1; echo err1 >&2; sleep 0.1; echo out2; exit 4"]);

    expect(exitCode).toBe(4);
    const lines = fs.readFileSync(log.filePath, "utf8").trimEnd().split("\n");
    expect(lines.slice(1, 4)).toEqual(["out1", "err1", "out2"]);
    expect(lines[4]?.replace(TIMESTAMP, "")).toBe("exit code 4");
  });

  it("returns captured output for queries", async () => {
    const runner = new FakeRunner().on(() => ({ stdout: "Version: ImageMagick 7.1.1-29\n" }));
    const res = await new LoggedShell(runner, log).capture("identify", ["-version"]);

    expect(res.stdout).toBe("Version: ImageMagick 7.1.1-29\n");
    expect(fs.readFileSync(log.filePath, "utf8")).toContain("Version: ImageMagick 7.1.1-29\n");
  });
});

describe("ExecFileRunner", () => {
  const runner = new ExecFileRunner();

  it("captures output and exit codes", async () => {
    const res = await runner.run({ command: "sh", args: ["-c", "echo out; echo err >&2; exit 3"] });
    expect(res).toEqual({ exitCode: 3, stdout: "out\n", stderr: "err\n" });
  });

  it("reports a missing binary as exit code 127", async () => {
    const res = await runner.run({ command: "im7-no-such-binary", args: [] });
    expect(res.exitCode).toBe(127);
    expect(res.stderr).toMatch(/^im7-no-such-binary: /);
  });

  it("writes output to the log while the command is still running", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "im7-stream-"));
    const logFile = path.join(dir, "install.log");
    fs.writeFileSync(logFile, "");
    try {
      const pending = runner.stream({ command: "sh", args: ["-c", "echo started; sleep 1"] }, logFile);
      await vi.waitFor(() => expect(fs.readFileSync(logFile, "utf8")).toBe("started\n"), { timeout: 800, interval: 20 });
      expect(await pending).toBe(0);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("logs a missing binary when streaming", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "im7-stream-"));
    const logFile = path.join(dir, "install.log");
    fs.writeFileSync(logFile, "");
    try {
      expect(await runner.stream({ command: "im7-no-such-binary", args: [] }, logFile)).toBe(127);
      expect(fs.readFileSync(logFile, "utf8")).toMatch(/^im7-no-such-binary: /);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("looks commands up on PATH", async () => {
    expect(await runner.exists("sh")).toBe(true);
    expect(await runner.exists("im7-no-such-binary")).toBe(false);
  });
});
