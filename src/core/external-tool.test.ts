import os from "node:os";

import { describe, expect, it } from "vitest";

import {
  ExecaExternalTool,
  OUTPUT_TAIL_BYTES,
  OutputTail,
  SPAWN_FAILURE_EXIT_CODE,
} from "./external-tool.js";

describe("ExecaExternalTool", () => {
  it("captures output and the exit status", async () => {
    const tool = new ExecaExternalTool();

    const result = await tool.invoke({
      label: "test:exit",
      argv: [
        process.execPath,
        "-e",
        "process.stdout.write('12'); process.stderr.write('partial read'); process.exit(3)",
      ],
      cwd: os.tmpdir(),
      threads: 1,
    });

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe("12");
    expect(result.stderr).toBe("partial read");
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("passes its environment to the child", async () => {
    const tool = new ExecaExternalTool({ ...process.env, MODPIPE_TEST_VALUE: "placeholder" });

    const result = await tool.invoke({
      label: "test:env",
      argv: [process.execPath, "-e", "process.stdout.write(process.env.MODPIPE_TEST_VALUE ?? '')"],
      cwd: os.tmpdir(),
      threads: 1,
    });

    expect(result).toMatchObject({ exitCode: 0, stdout: "placeholder" });
  });

  it("reports a command that cannot be started", async () => {
    const tool = new ExecaExternalTool();

    const result = await tool.invoke({
      label: "test:missing",
      argv: ["modpipe-no-such-tool"],
      cwd: os.tmpdir(),
      threads: 1,
    });

    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.stderr).toBe(
      "failed to start modpipe-no-such-tool (command not found or not executable)",
    );
  });

  it("keeps only the tail of a large stream without failing the command", async () => {
    const tool = new ExecaExternalTool();

    const result = await tool.invoke({
      label: "test:chatty",
      argv: [
        process.execPath,
        "-e",
        "const chunk = 'x'.repeat(1024 * 1024); for (let i = 0; i < 20; i++) process.stderr.write(chunk);",
      ],
      cwd: os.tmpdir(),
      threads: 1,
    });

    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeNull();
    const header = `[${19 * 1024 * 1024} bytes of earlier output truncated]\n`;
    expect(result.stderr.startsWith(header)).toBe(true);
    expect(result.stderr.length - header.length).toBe(OUTPUT_TAIL_BYTES);
  });

  it("reports a signal kill as 128 plus the signal number", async () => {
    const tool = new ExecaExternalTool();

    const result = await tool.invoke({
      label: "test:killed",
      argv: [process.execPath, "-e", "process.kill(process.pid, 'SIGKILL')"],
      cwd: os.tmpdir(),
      threads: 1,
    });

    expect(result).toMatchObject({ exitCode: 137, signal: "SIGKILL" });
    expect(result.stderr).not.toContain("failed to start");
  });

  it("rejects an empty argv", async () => {
    await expect(
      new ExecaExternalTool().invoke({ label: "test:empty", argv: [], cwd: os.tmpdir(), threads: 1 }),
    ).rejects.toThrow("test:empty: argv must be non-empty");
  });
});

describe("OutputTail", () => {
  it("returns everything under the limit minus one final newline", () => {
    const tail = new OutputTail(16);
    tail.push("abc\n");
    tail.push(Buffer.from("def\n"));

    expect(tail.text()).toBe("abc\ndef");
  });

  it("drops the oldest bytes past the limit and says how many", () => {
    const tail = new OutputTail(4);
    tail.push("abcdef");
    tail.push("gh");

    expect(tail.text()).toBe("[4 bytes of earlier output truncated]\nefgh");
  });
});
