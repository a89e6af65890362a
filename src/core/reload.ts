/**
{
  "description": "Live-reload hub. Tracks connected browser sessions and tells them to reload the page or swap the stylesheet after a successful build.",
  "phase": 2
}
*/

import { logDebug } from "@cli/utils/logger";
import { BroadcastError, describeError } from "@core/errors";
import type { Artifact, ReloadDirective } from "@core/types/build";
import { publicPathForFile } from "@core/utils/paths";

export const RELOAD_PATH = "/live_reload";
export const DEFAULT_SEND_TIMEOUT_MS = 1000;

/** Transport of one browser session. */
export interface ReloadConnection {
  send(message: string): Promise<void>;
  close(): void;
}

export interface ReloadSession {
  readonly id: string;
  readonly connection: ReloadConnection;
}

export interface DeliveryReport {
  delivered: string[];
  failed: BroadcastError[];
}

export type WireMessage =
  | { type: "reload" }
  | { type: "style"; href: string; css: string };

export function encodeDirective(directive: ReloadDirective): string {
  const message: WireMessage =
    directive.kind === "full-reload"
      ? { type: "reload" }
      : { type: "style", href: directive.href, css: directive.css };
  return JSON.stringify(message);
}

export interface DirectiveContext {
  siteRoot: string;
  readFile: (path: string) => Promise<string>;
}

/**
 * Style-only changes that include a changed `.css` file become a stylesheet swap.
 * Any other change, or a server restart, is a full reload. No change at all is nothing.
 */
export async function selectDirective(
  changed: readonly Artifact[],
  restarted: boolean,
  context: DirectiveContext,
): Promise<ReloadDirective | null> {
  if (restarted) return { kind: "full-reload" };
  if (!changed.length) return null;
  const styles = changed.filter((artifact) => artifact.category === "style");
  if (styles.length !== changed.length) return { kind: "full-reload" };
  const sheet = styles.find((artifact) => artifact.path.endsWith(".css"));
  if (!sheet) return { kind: "full-reload" };
  return {
    kind: "style-patch",
    href: publicPathForFile(context.siteRoot, sheet.path),
    css: await context.readFile(sheet.path),
  };
}

export interface ReloadHubOptions {
  sendTimeoutMs?: number;
}

export class ReloadHub {
  private sessions = new Map<string, ReloadSession>();
  private nextId = 1;
  private closed = false;

  constructor(private readonly options: ReloadHubOptions = {}) {}

  get size(): number {
    return this.sessions.size;
  }

  /** Returns the new session id, or null once the hub is closed. */
  connect(connection: ReloadConnection): string | null {
    if (this.closed) {
      connection.close();
      return null;
    }
    const id = `session-${this.nextId++}`;
    this.sessions.set(id, { id, connection });
    logDebug(`Reload session ${id} connected (${this.sessions.size} open)`);
    return id;
  }

  disconnect(id: string) {
    if (this.sessions.delete(id)) {
      logDebug(`Reload session ${id} disconnected`);
    }
  }

  /** Sends to every session at once; a session that fails or times out is dropped. */
  async broadcast(directive: ReloadDirective): Promise<DeliveryReport> {
    const message = encodeDirective(directive);
    const timeoutMs = this.options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    const sessions = [...this.sessions.values()];
    const settled = await Promise.all(
      sessions.map(async (session) => {
        try {
          await withTimeout(session.connection.send(message), timeoutMs);
          return null;
        } catch (err) {
          return new BroadcastError(`Reload session ${session.id}: ${describeError(err)}`, session.id);
        }
      }),
    );

    const report: DeliveryReport = { delivered: [], failed: [] };
    sessions.forEach((session, index) => {
      const error = settled[index];
      if (!error) {
        report.delivered.push(session.id);
        return;
      }
      logDebug(error.message);
      report.failed.push(error);
      this.sessions.delete(session.id);
      session.connection.close();
    });
    return report;
  }

  close() {
    this.closed = true;
    for (const session of this.sessions.values()) {
      session.connection.close();
    }
    this.sessions.clear();
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`send timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/** Browser side of the reload channel. */
export function reloadClientScript(port: number, path = RELOAD_PATH): string {
  return `(() => {
  const ws = new WebSocket(\`ws://\${location.hostname}:${port}${path}\`);
  ws.onmessage = (event) => {
    const msg = JSON.parse(event.data);
    if (msg.type === "reload") {
      location.reload();
    } else if (msg.type === "style") {
      let link = document.querySelector(\`link[href^="\${msg.href}"]\`);
      if (link) link.remove();
      let style = document.querySelector("style[data-tandem-reload]");
      if (!style) {
        style = document.createElement("style");
        style.setAttribute("data-tandem-reload", "");
        document.head.appendChild(style);
      }
      style.textContent = msg.css;
    }
  };
  ws.onclose = () => console.warn("live-reload disconnected");
})();`;
}

/** Injects the reload client before </body>. */
export function injectReloadClient(html: string, port: number): string {
  const tag = `<script>${reloadClientScript(port)}</script>`;
  return html.includes("</body>")
    ? html.replace("</body>", `${tag}\n</body>`)
    : html + "\n" + tag;
}
