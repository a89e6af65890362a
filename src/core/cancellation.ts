/** One per build attempt; set when a newer intent supersedes the attempt or the orchestrator stops. */
export class CancellationToken {
  private readonly controller = new AbortController();

  get canceled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Handed to collaborators that can abandon external work early. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason = "superseded") {
    if (!this.canceled) this.controller.abort(reason);
  }
}
