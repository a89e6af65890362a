import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { describeFailure, runCommand } from "../src/core/collaborators/command";
import { makeTempDir, removeDir, shell } from "./helpers";

let dir: string;

beforeEach(() => {
  dir = makeTempDir("command");
});

afterEach(() => {
  removeDir(dir);
});

describe("runCommand", () => {
  it("expands placeholders and captures both output streams", async () => {
    const result = await runCommand(shell("echo {name}-{profile}; echo oops >&2; exit 3", dir), {
      placeholders: { name: "app", profile: "debug" },
    });
    expect(result.code).toBe(3);
    expect(result.aborted).toBe(false);
    expect(result.output).toContain("app-debug\n");
    expect(result.output).toContain("oops\n");
  });

  it("passes the command's environment and working directory", async () => {
    const cmd = { ...shell('printf "%s:%s" "$TANDEM_TEST_VALUE" "$(pwd)"', dir), env: { TANDEM_TEST_VALUE: "placeholder" } };
    const result = await runCommand(cmd);
    expect(result.code).toBe(0);
    expect(result.output).toBe(`placeholder:${dir}`);
  });

  it("terminates the child when the signal aborts", async () => {
    const controller = new AbortController();
    const running = runCommand(shell("exec sleep 30", dir), { signal: controller.signal });
    setTimeout(() => controller.abort(), 100);
    const result = await running;
    expect(result.aborted).toBe(true);
    expect(result.signal).toBe("SIGTERM");
  });

  it("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await runCommand(shell("exit 0", dir), { signal: controller.signal });
    expect(result).toEqual({ code: null, signal: null, output: "", aborted: true });
  });

  it("reports a command that cannot be spawned", async () => {
    const cmd = { command: "tandem-no-such-binary", args: [], env: {}, cwd: dir };
    const result = await runCommand(cmd);
    expect(result.spawnError).toBeInstanceOf(Error);
    expect(describeFailure(cmd, result)).toMatch(/^could not run tandem-no-such-binary: /);
  });

  it("describes a failed exit with the tail of its output", async () => {
    const cmd = shell("echo first; echo second; exit 2", dir);
    const result = await runCommand(cmd);
    expect(describeFailure(cmd, result)).toBe("sh failed with exit code 2\nfirst\nsecond");
  });
});
