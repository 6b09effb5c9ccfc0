/**
 * Cooperative cancellation latch shared between the control surface and a run.
 *
 * Created fresh per run and handed to the engine by reference. `cancel()` is the
 * only mutation and may be called any number of times; the latch never resets.
 * The engine polls `isCancellationRequested` at its checkpoints, and in-flight
 * backend calls observe `signal`.
 */
export class CancellationToken {
    private readonly controller = new AbortController();

    get isCancellationRequested(): boolean {
        return this.controller.signal.aborted;
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    cancel(): void {
        if (!this.controller.signal.aborted) {
            this.controller.abort();
        }
    }
}
