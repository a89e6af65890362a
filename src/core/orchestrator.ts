/**
{
  "description": "Orchestrator. Single inbox state machine that turns build intents into build attempts, discards stale results, and after a successful build restarts the server and notifies browsers.",
  "phase": 2
}
*/

import fs from "fs";
import { logDebug, logError, logInfo, logSuccess, logWarn } from "@cli/utils/logger";
import { CancellationToken } from "@core/cancellation";
import { Channel, forward } from "@core/channel";
import { Debouncer } from "@core/debouncer";
import { describeError, LaunchError } from "@core/errors";
import { ArtifactLedger } from "@core/hasher";
import type { BuildRunner } from "@core/pipeline";
import { selectDirective, type DeliveryReport, type ReloadHub } from "@core/reload";
import type { ProcessExit, ServerControl } from "@core/supervisor";
import { ALL_CATEGORIES, type BuildIntent, type BuildOutcome, type Category, type ReloadDirective } from "@core/types/build";
import type { ProjectWatcher } from "@core/watcher";

export type OrchestratorState =
  | { kind: "idle" }
  | { kind: "building"; intent: BuildIntent; attempt: number; token: CancellationToken }
  | { kind: "finalizing"; outcome: BuildOutcome };

type InboxMessage =
  | { type: "intent"; intent: BuildIntent }
  | { type: "build-settled"; attempt: number; outcome: BuildOutcome }
  | { type: "build-settled"; attempt: number; error: unknown }
  | { type: "server-exited"; exit: ProcessExit }
  | { type: "watch-failed"; error: unknown }
  | { type: "stop" };

/** Decisions taken when an outcome was finalized. */
export interface FinalizedReport {
  outcome: BuildOutcome;
  restarted: boolean;
  directive: ReloadDirective | null;
  delivery: DeliveryReport | null;
}

/** Where intents come from in watch mode. */
export interface IntentSource {
  intents: Channel<BuildIntent>;
  /** Resolves when the source ends, rejects when watching fails. */
  done: Promise<void>;
  close(): Promise<void>;
}

export type ReloadBroadcaster = Pick<ReloadHub, "size" | "broadcast">;

export interface OrchestratorOptions {
  pipeline: BuildRunner;
  siteRoot: string;
  supervisor?: ServerControl | null;
  /** Committed path of the server binary; enables starting the server after a crash. */
  serverBinary?: string | null;
  hub?: ReloadBroadcaster | null;
  ledger?: ArtifactLedger;
  readFile?: (path: string) => Promise<string>;
  reports?: Channel<FinalizedReport>;
  /** Shut down when the server exits on its own instead of waiting for the next build. */
  stopOnServerExit?: boolean;
}

/** The intent of a cold build: every category, plus steps flagged to run on the first build. */
export function coldIntent(categories: Iterable<Category> = ALL_CATEGORIES): BuildIntent {
  return { id: 0, categories: new Set(categories), triggeredAt: Date.now(), paths: [], initial: true };
}

/** Watcher → debouncer chain as an intent source. */
export function watchIntents(watcher: ProjectWatcher, debounceMs?: number): IntentSource {
  const intents = new Channel<BuildIntent>();
  const debouncer = new Debouncer(intents, debounceMs);
  const events = watcher.subscribe();
  const done = debouncer.consume(events);
  return {
    intents,
    done,
    close: async () => {
      await events.return?.();
      debouncer.dispose();
      intents.close();
    },
  };
}

export class Orchestrator {
  readonly ledger: ArtifactLedger;
  private readonly inbox = new Channel<InboxMessage>();
  private current: { attempt: number; intent: BuildIntent; token: CancellationToken } | null = null;
  private status: OrchestratorState = { kind: "idle" };
  private attempts = 0;
  private inflight = new Set<Promise<void>>();
  private source: IntentSource | null = null;
  private running: Promise<void> | null = null;
  private stopped = false;
  private discarded = 0;
  private lastExit: ProcessExit | null = null;

  constructor(private readonly options: OrchestratorOptions) {
    this.ledger = options.ledger ?? new ArtifactLedger();
  }

  get state(): OrchestratorState {
    return this.status;
  }

  /** Outcomes of superseded attempts dropped so far. */
  get discardedOutcomes(): number {
    return this.discarded;
  }

  /** Last unexpected server exit, if any. */
  get serverExit(): ProcessExit | null {
    return this.lastExit;
  }

  submit(intent: BuildIntent): boolean {
    return this.inbox.send({ type: "intent", intent });
  }

  /** Processes the inbox until `stop()`; resolves once everything is shut down. */
  run(source?: IntentSource): Promise<void> {
    if (!this.running) this.running = this.loop(source ?? null);
    return this.running;
  }

  async stop(): Promise<void> {
    if (this.running) {
      this.inbox.send({ type: "stop" });
      await this.running;
      return;
    }
    await this.shutdown();
  }

  private async loop(source: IntentSource | null): Promise<void> {
    this.source = source;
    if (source) {
      void forward(source.intents, this.inbox, (intent): InboxMessage => ({ type: "intent", intent })).catch((err) =>
        logError("Intent forwarding stopped", err),
      );
      void source.done.then(
        () => logDebug("Watch source ended"),
        (error: unknown) => this.inbox.send({ type: "watch-failed", error }),
      );
    }
    const supervisor = this.options.supervisor;
    if (supervisor) {
      void forward(supervisor.exits, this.inbox, (exit): InboxMessage => ({ type: "server-exited", exit })).catch((err) =>
        logError("Server exit forwarding stopped", err),
      );
    }

    while (true) {
      const next = await this.inbox.receive();
      if (next.done) break;
      const message = next.value;
      if (message.type === "stop") break;
      if ((await this.handle(message)) === "stop") break;
    }
    await this.shutdown();
  }

  private async handle(message: Exclude<InboxMessage, { type: "stop" }>): Promise<"stop" | void> {
    switch (message.type) {
      case "intent":
        this.startAttempt(message.intent);
        return;
      case "build-settled": {
        if (!this.current || this.current.attempt !== message.attempt) {
          this.discarded++;
          logDebug(`Discarding result of superseded attempt #${message.attempt}`);
          return;
        }
        this.current = null;
        if ("error" in message) {
          logError(`Build attempt #${message.attempt} aborted`, message.error);
          this.status = { kind: "idle" };
          return;
        }
        this.status = { kind: "finalizing", outcome: message.outcome };
        try {
          const report = await this.finalize(message.outcome);
          this.options.reports?.send(report);
        } catch (err) {
          logError(`Finishing attempt #${message.attempt} failed`, err);
        }
        this.status = { kind: "idle" };
        return;
      }
      case "server-exited":
        this.lastExit = message.exit;
        if (this.options.stopOnServerExit) {
          logError(message.exit.error.message);
          return "stop";
        }
        logError(`${message.exit.error.message}; it will be started again after the next successful build`);
        return;
      case "watch-failed":
        logError(`Watching stopped: ${describeError(message.error)}. Last build output and server are kept.`);
        await this.closeSource();
        return;
    }
  }

  private startAttempt(intent: BuildIntent) {
    if (this.stopped) return;
    if (this.current) {
      logDebug(`Intent #${intent.id} supersedes attempt #${this.current.attempt}`);
      this.current.token.cancel();
    }
    const attempt = ++this.attempts;
    const token = new CancellationToken();
    this.current = { attempt, intent, token };
    this.status = { kind: "building", intent, attempt, token };
    logInfo(`Building ${[...intent.categories].join(", ") || "nothing"} (attempt #${attempt})`);

    const settled: Promise<void> = this.options.pipeline
      .run(intent, { attempt, token, baseline: (artifactPath) => this.ledger.get(artifactPath) })
      .then(
        (outcome) => {
          this.inbox.send({ type: "build-settled", attempt, outcome });
        },
        (error: unknown) => {
          this.inbox.send({ type: "build-settled", attempt, error });
        },
      )
      .finally(() => this.inflight.delete(settled));
    this.inflight.add(settled);
  }

  private async finalize(outcome: BuildOutcome): Promise<FinalizedReport> {
    const report: FinalizedReport = { outcome, restarted: false, directive: null, delivery: null };
    const elapsed = Date.now() - outcome.intent.triggeredAt;

    if (outcome.overall === "canceled") {
      logDebug(`Attempt #${outcome.attempt} canceled`);
      return report;
    }
    if (outcome.overall === "failed") {
      for (const result of outcome.results) {
        if (result.outcome.kind === "failed") logError(result.outcome.error.message);
      }
      logWarn(`Build failed after ${elapsed}ms; server and browsers left as they were`);
      return report;
    }

    this.ledger.record(outcome.artifacts);
    report.restarted = await this.reconcileServer(outcome);
    report.directive = await selectDirective(outcome.changed, report.restarted, {
      siteRoot: this.options.siteRoot,
      readFile: this.options.readFile ?? ((file) => fs.promises.readFile(file, "utf8")),
    });
    const hub = this.options.hub;
    if (report.directive && hub && hub.size > 0) {
      report.delivery = await hub.broadcast(report.directive);
    }
    logSuccess(
      `Build finished in ${elapsed}ms (${outcome.changed.length} changed)` +
        (report.directive ? `, ${report.directive.kind}` : ""),
    );
    return report;
  }

  /** Restarts the server when its binary changed, or starts it when it is down. */
  private async reconcileServer(outcome: BuildOutcome): Promise<boolean> {
    const supervisor = this.options.supervisor;
    if (!supervisor) return false;
    try {
      const server = outcome.changed.find((artifact) => artifact.step === "server");
      if (server) return await supervisor.restartIfChanged(server.path, server.hash);
      const binary = this.options.serverBinary;
      if (supervisor.state === "stopped" && binary && fs.existsSync(binary)) {
        await supervisor.start(binary, this.ledger.get(binary));
        return true;
      }
    } catch (err) {
      if (!(err instanceof LaunchError)) throw err;
      logError(err.message);
    }
    return false;
  }

  private async closeSource() {
    const source = this.source;
    this.source = null;
    if (source) await source.close();
  }

  private async shutdown() {
    if (this.stopped) return;
    this.stopped = true;
    this.current?.token.cancel("stopped");
    this.current = null;
    this.inbox.close();
    await this.closeSource();
    await Promise.all([...this.inflight]);
    if (this.options.supervisor) {
      await this.options.supervisor.stop();
      this.options.supervisor.exits.close();
    }
    this.status = { kind: "idle" };
  }
}
