import { AdmissionAbortedError, ConfigurationError } from "@/common/errors/throttling.errors";
import type { TokenSink } from "./interfaces/throttling.interfaces";

interface Waiter {
  resolve: () => void;
  reject: (error: unknown) => void;
  detach: () => void;
}

/**
 * Bounded FIFO of opaque admission tokens shared by one producer (the token
 * scheduler) and any number of consumers (requests waiting to be sent).
 *
 * `put` waits while the queue is full, `get` waits while it is empty. A token
 * put while consumers are waiting goes straight to the longest-waiting one, so
 * the queue never holds tokens and waiters at the same time.
 */
export class AdmissionQueue implements TokenSink {
  private tokens = 0;
  private readonly consumers: Waiter[] = [];
  private readonly producers: Waiter[] = [];

  constructor(private maxSize: number) {
    AdmissionQueue.assertCapacity(maxSize);
  }

  get capacity(): number {
    return this.maxSize;
  }

  get size(): number {
    return this.tokens;
  }

  get waitingConsumers(): number {
    return this.consumers.length;
  }

  get waitingProducers(): number {
    return this.producers.length;
  }

  isFull(): boolean {
    return this.tokens >= this.maxSize;
  }

  /**
   * Add one token, waiting for room while the queue is full.
   * Aborting the signal withdraws the pending token and rejects with the signal's reason.
   */
  put(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.detach();
      consumer.resolve();
      return Promise.resolve();
    }

    if (this.tokens < this.maxSize) {
      this.tokens++;
      return Promise.resolve();
    }

    return this.enqueue(this.producers, signal, reason => reason);
  }

  /**
   * Take one token, waiting while the queue is empty. There is no timeout here;
   * aborting the signal stops the wait with an AdmissionAbortedError.
   */
  get(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new AdmissionAbortedError(signal.reason));
    }

    if (this.tokens > 0) {
      this.tokens--;
      this.admitProducers();
      return Promise.resolve();
    }

    return this.enqueue(this.consumers, signal, reason => new AdmissionAbortedError(reason));
  }

  /**
   * Change the capacity in place. Tokens above the new capacity are dropped;
   * waiting consumers keep their place.
   */
  resize(capacity: number): void {
    AdmissionQueue.assertCapacity(capacity);
    this.maxSize = capacity;
    this.tokens = Math.min(this.tokens, capacity);
    this.admitProducers();
  }

  /**
   * Let every waiting consumer through without a token
   */
  releaseConsumers(): number {
    return this.drainConsumers(waiter => waiter.resolve());
  }

  /**
   * Fail every waiting consumer with `error`
   */
  rejectConsumers(error: unknown): number {
    return this.drainConsumers(waiter => waiter.reject(error));
  }

  private drainConsumers(settle: (waiter: Waiter) => void): number {
    const waiters = this.consumers.splice(0, this.consumers.length);
    for (const waiter of waiters) {
      waiter.detach();
      settle(waiter);
    }
    return waiters.length;
  }

  // Producers blocked on a full queue deposit their token as soon as room appears
  private admitProducers(): void {
    while (this.tokens < this.maxSize) {
      const producer = this.producers.shift();
      if (!producer) return;
      producer.detach();
      this.tokens++;
      producer.resolve();
    }
  }

  private enqueue(
    waiters: Waiter[],
    signal: AbortSignal | undefined,
    toError: (reason: unknown) => unknown
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, detach: () => undefined };

      if (signal) {
        const onAbort = () => {
          const index = waiters.indexOf(waiter);
          if (index >= 0) waiters.splice(index, 1);
          reject(toError(signal.reason));
        };
        signal.addEventListener("abort", onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener("abort", onAbort);
      }

      waiters.push(waiter);
    });
  }

  private static assertCapacity(capacity: number): void {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigurationError(`Admission queue capacity must be a positive integer: ${capacity}`, { capacity });
    }
  }
}
