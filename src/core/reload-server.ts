import WebSocket, { WebSocketServer } from "ws";
import { logDebug, logInfo } from "@cli/utils/logger";
import { RELOAD_PATH, type ReloadConnection, type ReloadHub } from "@core/reload";

export interface ReloadServerOptions {
  host: string;
  /** 0 picks a free port. */
  port: number;
  path?: string;
}

export interface ReloadServer {
  readonly port: number;
  close(): Promise<void>;
}

function socketConnection(socket: WebSocket): ReloadConnection {
  return {
    send: (message) =>
      new Promise((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error("socket is not open"));
          return;
        }
        socket.send(message, (err) => (err ? reject(err) : resolve()));
      }),
    close: () => socket.close(),
  };
}

/** Accepts browser sessions on `ws://host:port/live_reload` and hands them to the hub. */
export async function startReloadServer(hub: ReloadHub, options: ReloadServerOptions): Promise<ReloadServer> {
  const wss = new WebSocketServer({ host: options.host, port: options.port, path: options.path ?? RELOAD_PATH });

  await new Promise<void>((resolve, reject) => {
    wss.once("listening", () => resolve());
    wss.once("error", reject);
  });

  wss.on("connection", (socket) => {
    const id = hub.connect(socketConnection(socket));
    if (!id) return;
    socket.on("close", () => hub.disconnect(id));
    socket.on("error", (err) => {
      logDebug(`Reload socket ${id} error: ${err.message}`);
      hub.disconnect(id);
    });
  });

  const address = wss.address();
  const port = address && typeof address === "object" ? address.port : options.port;
  logInfo(`Live reload listening on ws://${options.host}:${port}${options.path ?? RELOAD_PATH}`);

  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) client.terminate();
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
