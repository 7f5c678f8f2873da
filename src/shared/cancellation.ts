/**
 * Cooperative cancellation flag shared between the front-end and a run.
 * Backed by an AbortController so the state is set exactly once.
 */
export class CancellationToken {
  private controller = new AbortController();

  cancel(reason: string = 'Download cancelled by user'): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error(reason));
    }
  }

  get isCancellationRequested(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }
}
