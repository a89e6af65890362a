import { logDebug } from "@cli/utils/logger";
import type { Channel } from "@core/channel";
import type { BuildIntent, Category, ChangeEvent } from "@core/types/build";

export const DEFAULT_DEBOUNCE_MS = 100;

interface Window {
  categories: Set<Category>;
  paths: Set<string>;
  firstAt: number;
}

/**
 * Coalesces bursts of change events into one build intent. The window restarts on every
 * event; when it expires the union of categories seen is emitted on `output`.
 */
export class Debouncer {
  private window: Window | null = null;
  private timer: NodeJS.Timeout | null = null;
  private nextId = 1;

  constructor(
    private readonly output: Channel<BuildIntent>,
    private readonly windowMs: number = DEFAULT_DEBOUNCE_MS,
  ) {}

  get state(): "idle" | "collecting" {
    return this.window ? "collecting" : "idle";
  }

  push(event: ChangeEvent) {
    if (!this.window) {
      this.window = { categories: new Set(), paths: new Set(), firstAt: event.timestamp };
    }
    this.window.categories.add(event.category);
    this.window.paths.add(event.path);
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.windowMs);
  }

  /** Emits the pending window now. Returns null when idle. */
  flush(): BuildIntent | null {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const window = this.window;
    if (!window) return null;
    this.window = null;
    const intent: BuildIntent = {
      id: this.nextId++,
      categories: window.categories,
      triggeredAt: window.firstAt,
      paths: [...window.paths],
      initial: false,
    };
    logDebug(`Build intent #${intent.id}: ${[...intent.categories].join(", ")} (${intent.paths.length} path(s))`);
    this.output.send(intent);
    return intent;
  }

  /** Feeds the debouncer from a change stream until it ends; watcher errors propagate. */
  async consume(events: AsyncIterable<ChangeEvent>): Promise<void> {
    try {
      for await (const event of events) {
        this.push(event);
      }
    } finally {
      this.dispose();
    }
  }

  /** Drops any pending window without emitting it. */
  dispose() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.window = null;
  }
}
