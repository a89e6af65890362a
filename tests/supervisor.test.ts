import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LaunchError, ProcessCrash } from "../src/core/errors";
import { ProcessSupervisor, serverEnv } from "../src/core/supervisor";
import { delay, makeConfig, makeTempDir, removeDir, writeFile } from "./helpers";

let dir: string;
let supervisor: ProcessSupervisor;

function script(name: string, body: string, mode = 0o755): string {
  const file = path.join(dir, name);
  writeFile(file, `#!/bin/sh\n${body}\n`, mode);
  return file;
}

beforeEach(() => {
  dir = makeTempDir("supervisor");
  supervisor = new ProcessSupervisor({ stdio: "ignore", stopGraceMs: 2000 });
});

afterEach(async () => {
  await supervisor.stop();
  removeDir(dir);
});

describe("ProcessSupervisor", () => {
  it("starts and stops a server", async () => {
    const binary = script("server", "exec sleep 30");
    const handle = await supervisor.start(binary, "h1");
    expect(handle.pid).toBeGreaterThan(0);
    expect(handle.binaryHash).toBe("h1");
    expect(supervisor.state).toBe("running");

    await supervisor.stop();
    expect(supervisor.state).toBe("stopped");
    expect(supervisor.handle).toBeNull();
    expect(supervisor.exits.size).toBe(0);
  });

  it("refuses a missing or non-executable binary", async () => {
    await expect(supervisor.start(path.join(dir, "missing"))).rejects.toBeInstanceOf(LaunchError);
    const plain = script("plain", "exec sleep 30", 0o644);
    await expect(supervisor.start(plain)).rejects.toBeInstanceOf(LaunchError);
    expect(supervisor.state).toBe("stopped");
  });

  it("refuses to start a second instance", async () => {
    const binary = script("server", "exec sleep 30");
    await supervisor.start(binary, "h1");
    await expect(supervisor.start(binary, "h1")).rejects.toThrow("Server already running");
  });

  it("restarts only when the binary hash changed", async () => {
    const binary = script("server", "exec sleep 30");
    const first = await supervisor.start(binary, "h1");

    expect(await supervisor.restartIfChanged(binary, "h1")).toBe(false);
    expect(supervisor.handle?.pid).toBe(first.pid);

    expect(await supervisor.restartIfChanged(binary, "h2")).toBe(true);
    expect(supervisor.handle?.pid).not.toBe(first.pid);
    expect(supervisor.handle?.binaryHash).toBe("h2");
  });

  it("starts a stopped server from restartIfChanged", async () => {
    const binary = script("server", "exec sleep 30");
    expect(await supervisor.restartIfChanged(binary, "h1")).toBe(true);
    expect(supervisor.state).toBe("running");
  });

  it("reports an unexpected exit without restarting", async () => {
    const binary = script("crash", "sleep 0.1; exit 3");
    const handle = await supervisor.start(binary);

    const exit = await supervisor.exits.receive();
    expect(exit.done).toBe(false);
    if (!exit.done) {
      expect(exit.value.pid).toBe(handle.pid);
      expect(exit.value.code).toBe(3);
      expect(exit.value.signal).toBeNull();
      expect(exit.value.error).toBeInstanceOf(ProcessCrash);
    }
    expect(supervisor.state).toBe("stopped");
  });

  it("kills a server that ignores SIGTERM after the grace period", async () => {
    supervisor = new ProcessSupervisor({ stdio: "ignore", stopGraceMs: 200 });
    const binary = script("stubborn", "trap '' TERM\nwhile true; do sleep 0.1; done");
    await supervisor.start(binary);
    await delay(200);

    const started = Date.now();
    await supervisor.stop();
    expect(Date.now() - started).toBeGreaterThanOrEqual(190);
    expect(supervisor.state).toBe("stopped");
    expect(supervisor.exits.size).toBe(0);
  });
});

describe("serverEnv", () => {
  it("describes the site to the server", () => {
    const config = makeConfig("/p");
    expect(serverEnv(config, true)).toEqual({
      TANDEM_OUTPUT_NAME: "app",
      TANDEM_SITE_ROOT: "/p/target/site",
      TANDEM_SITE_PKG_DIR: "pkg",
      TANDEM_SITE_ADDR: "127.0.0.1:3000",
      TANDEM_RELOAD_PORT: "3001",
      TANDEM_WATCH: "ON",
    });
    expect(serverEnv(config, false).TANDEM_WATCH).toBeUndefined();
  });
});
