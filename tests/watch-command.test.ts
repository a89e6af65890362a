import fs from "fs";
import path from "path";
import WebSocket from "ws";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { startWatch, type WatchHandle } from "../src/cli/commands/watch";
import { resetTandemConfigCache } from "../src/cli/utils/config";
import { Channel } from "../src/core/channel";
import { resetPostcssCache } from "../src/core/collaborators/style";
import type { FinalizedReport } from "../src/core/orchestrator";
import { delay, makeTempDir, removeDir, writeFile, writeProject } from "./helpers";

let root: string;
let handle: WatchHandle | null = null;

beforeEach(() => {
  root = makeTempDir("watch");
  resetTandemConfigCache();
  resetPostcssCache();
});

afterEach(async () => {
  await handle?.close();
  handle = null;
  removeDir(root);
});

/** Polls; a timed-out wait must not leave a receiver behind to take a later report. */
async function nextReport(reports: Channel<FinalizedReport>, timeoutMs: number): Promise<FinalizedReport | null> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const next = reports.tryReceive();
    if (next) return next.value;
    await delay(20);
  }
  return null;
}

function connect(port: number): Promise<{ socket: WebSocket; messages: string[] }> {
  const socket = new WebSocket(`ws://127.0.0.1:${port}/live_reload`);
  const messages: string[] = [];
  socket.on("message", (data) => messages.push(data.toString()));
  return new Promise((resolve, reject) => {
    socket.once("open", () => resolve({ socket, messages }));
    socket.once("error", reject);
  });
}

describe("watch command", () => {
  it("builds, starts the server, and patches styles on change", async () => {
    writeProject(root);
    const reports = new Channel<FinalizedReport>();
    handle = await startWatch({ rootDir: root, enableSignalHandlers: false, reports });

    const cold = await nextReport(reports, 20000);
    expect(cold?.outcome.overall).toBe("succeeded");
    expect(cold?.outcome.intent.initial).toBe(true);
    expect(cold?.restarted).toBe(true);
    expect(cold?.directive).toEqual({ kind: "full-reload" });
    expect(cold?.delivery).toBeNull();
    expect(fs.existsSync(path.join(root, "target", "site", "index.html"))).toBe(true);

    const { socket, messages } = await connect(handle.reloadPort);

    // The polling watcher becomes ready asynchronously; edit until a rebuild is reported.
    let report: FinalizedReport | null = null;
    for (let round = 0; round < 20 && !report; round++) {
      writeFile(path.join(root, "style", "main.css"), `body { margin: ${round}px; }\n`);
      report = await nextReport(reports, 1000);
    }
    await vi.waitFor(() => expect(messages.length).toBeGreaterThan(0));
    socket.close();

    expect(report?.restarted).toBe(false);
    expect(report?.directive?.kind).toBe("style-patch");
    expect(report?.delivery?.delivered).toEqual(["session-1"]);
    expect(report?.outcome.results.map((result) => result.step)).toEqual(["style"]);

    const last: unknown = JSON.parse(messages[messages.length - 1] ?? "{}");
    expect(last).toEqual({
      type: "style",
      href: "/pkg/app.css",
      css: expect.stringMatching(/^body \{ margin: \d+px; \}\n$/),
    });
  }, 60000);

  it("stops the server and closes the reload port on close", async () => {
    writeProject(root);
    const reports = new Channel<FinalizedReport>();
    const session = await startWatch({ rootDir: root, enableSignalHandlers: false, reports });
    await nextReport(reports, 20000);

    await session.close();
    await session.done;

    expect(session.orchestrator.state).toEqual({ kind: "idle" });
    await expect(connect(session.reloadPort)).rejects.toThrow();
  }, 30000);
});
