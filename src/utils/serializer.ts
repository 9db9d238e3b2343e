import { AsyncLocalStorage } from "async_hooks";
import PQueue from "p-queue";
import { InvalidStateError } from "./errors";

/**
 * Runs ledger mutations one at a time, in arrival order.
 *
 * A task that calls back into the serializer from inside its own async context
 * (for example a transfer hook invoking another ledger operation) is rejected
 * instead of queued: it would otherwise wait on the task that started it.
 */
export class Serializer {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly running = new AsyncLocalStorage<string>();

  async run<T>(label: string, task: () => Promise<T>): Promise<T> {
    const active = this.running.getStore();
    if (active !== undefined) {
      throw new InvalidStateError(`Reentrant ${label} rejected while ${active} is in progress`);
    }
    return this.queue.add<T>(() => this.running.run(label, task), { throwOnTimeout: true });
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  async idle(): Promise<void> {
    await this.queue.onIdle();
  }
}
