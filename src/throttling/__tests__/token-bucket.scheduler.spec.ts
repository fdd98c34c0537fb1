import { ConfigurationError } from "@/common/errors/throttling.errors";
import { MAX_TIMER_DELAY_MS } from "@/common/utils/common.utils";
import { ErrorCode } from "@/common/types/error-handling";
import { MockFactory, MockSetup } from "@/__tests__/utils";
import { AdmissionQueue } from "../admission-queue";
import { TokenBucketScheduler } from "../token-bucket.scheduler";
import { queueLengthFor } from "../throttling.constants";

describe("TokenBucketScheduler", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  const createScheduler = (sink: ConstructorParameters<typeof TokenBucketScheduler>[0], rateLimit: number) => {
    const scheduler = new TokenBucketScheduler(sink, rateLimit);
    const logs = MockSetup.spyOnLogger(scheduler);
    return { scheduler, logs };
  };

  describe("regimes", () => {
    it("should fill one token every 1/rate seconds up to 20 requests/sec", () => {
      const { scheduler } = createScheduler(new AdmissionQueue(1), 10);

      expect(scheduler.regime).toBe("simple");
      expect(scheduler.batchSize).toBe(1);
      expect(scheduler.intervalMs).toBe(100);
    });

    it("should stay in the simple regime at exactly 20 requests/sec", () => {
      const { scheduler } = createScheduler(new AdmissionQueue(1), 20);

      expect(scheduler.regime).toBe("simple");
      expect(scheduler.batchSize).toBe(1);
    });

    it("should fill ceil(ln(rate)) tokens per cycle above 20 requests/sec", () => {
      const { scheduler } = createScheduler(new AdmissionQueue(4), 50);

      expect(scheduler.regime).toBe("batched");
      expect(scheduler.batchSize).toBe(4);
      expect(scheduler.intervalMs).toBeCloseTo(80);
    });

    it("should refuse a rate that is not positive", () => {
      const queue = new AdmissionQueue(1);

      expect(() => new TokenBucketScheduler(queue, 0)).toThrow(ConfigurationError);
      expect(() => new TokenBucketScheduler(queue, -2)).toThrow(ConfigurationError);
      expect(() => new TokenBucketScheduler(queue, Number.POSITIVE_INFINITY)).toThrow(ConfigurationError);
    });
  });

  describe("filling", () => {
    it("should deposit the first token as soon as it starts", async () => {
      const queue = new AdmissionQueue(1);
      const { scheduler } = createScheduler(queue, 10);

      scheduler.start();

      expect(scheduler.isRunning).toBe(true);
      expect(queue.size).toBe(1);
      await scheduler.stop();
    });

    it("should admit a waiting consumer one interval after the previous token", async () => {
      const queue = new AdmissionQueue(1);
      const { scheduler } = createScheduler(queue, 10);
      scheduler.start();
      await queue.get();

      let admitted = false;
      const pending = queue.get().then(() => {
        admitted = true;
      });

      await jest.advanceTimersByTimeAsync(99);
      expect(admitted).toBe(false);

      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(admitted).toBe(true);

      await scheduler.stop();
    });

    it("should never hold more tokens than the queue length", async () => {
      const queue = new AdmissionQueue(queueLengthFor(50));
      const { scheduler } = createScheduler(queue, 50);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(1000);

      expect(queue.size).toBe(4);
      expect(queue.waitingProducers).toBe(1);

      await scheduler.stop();
      expect(queue.waitingProducers).toBe(0);
      expect(queue.size).toBe(4);
    });

    // runs half an interval past the ten-second mark so the last cycle falls inside the window
    it.each([
      [5, 10_100, 51],
      [50, 10_040, 504],
    ])("should deliver tokens at %p requests/sec over ten seconds", async (rateLimit, windowMs, expectedTokens) => {
      const sink = MockFactory.createCountingSink();
      const { scheduler } = createScheduler(sink, rateLimit);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(windowMs);
      await scheduler.stop();

      expect(sink.puts).toBe(expectedTokens);
    });

    it("should log and end the loop when the sink fails", async () => {
      const failure = new Error("sink exploded");
      const { scheduler, logs } = createScheduler({ put: () => Promise.reject(failure) }, 10);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(0);

      expect(logs.error).toHaveBeenCalledWith("[fill] sink exploded", failure.stack);
      await expect(scheduler.stop()).resolves.toBe(true);
    });
  });

  describe("stop", () => {
    it("should interrupt the sleep between cycles", async () => {
      const queue = new AdmissionQueue(1);
      const { scheduler, logs } = createScheduler(queue, 0.5);
      scheduler.start();
      await jest.advanceTimersByTimeAsync(0);

      await expect(scheduler.stop()).resolves.toBe(true);

      expect(scheduler.isRunning).toBe(false);
      expect(jest.getTimerCount()).toBe(0);
      expect(logs.debug).toHaveBeenCalledWith("Cancelled");
    });

    it("should resolve true when it was never started", async () => {
      const { scheduler } = createScheduler(new AdmissionQueue(1), 1);

      await expect(scheduler.stop()).resolves.toBe(true);
    });

    it("should warn and resolve false when the filler outlives the grace period", async () => {
      const { scheduler, logs } = createScheduler(MockFactory.createStuckSink(), 5);
      scheduler.start();

      const stopping = scheduler.stop(500);
      await jest.advanceTimersByTimeAsync(500);

      await expect(stopping).resolves.toBe(false);
      expect(logs.warn).toHaveBeenCalledWith(
        "[stop] Timeout while cancelling bucket filler after 500ms",
        expect.objectContaining({ code: ErrorCode.SHUTDOWN_TIMEOUT, module: "TokenBucketScheduler" })
      );
    });

    it("should not fill after it was stopped", async () => {
      const sink = MockFactory.createCountingSink();
      const { scheduler } = createScheduler(sink, 10);

      scheduler.start();
      await scheduler.stop();
      await jest.advanceTimersByTimeAsync(1000);

      expect(sink.puts).toBe(1);
    });
  });

  describe("very small rates", () => {
    it("should wait the full interval when it exceeds the longest timer delay", async () => {
      const sink = MockFactory.createCountingSink();
      const { scheduler } = createScheduler(sink, 1e-7);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(60_000);

      expect(scheduler.intervalMs).toBeGreaterThan(MAX_TIMER_DELAY_MS);
      expect(sink.puts).toBe(1);
      await scheduler.stop();
    });
  });
});
