import { MAX_TIMER_DELAY_MS, sleepFor } from "../common.utils";

describe("Common Utils", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  describe("sleepFor", () => {
    it("should resolve after the specified duration", async () => {
      let done = false;
      const sleeping = sleepFor(100).then(() => {
        done = true;
      });

      await jest.advanceTimersByTimeAsync(99);
      expect(done).toBe(false);

      await jest.advanceTimersByTimeAsync(1);
      await sleeping;
      expect(done).toBe(true);
    });

    it("should treat a negative duration as zero", async () => {
      const sleeping = sleepFor(-100);

      await jest.advanceTimersByTimeAsync(0);

      await expect(sleeping).resolves.toBeUndefined();
    });

    it("should end early with the abort reason", async () => {
      const controller = new AbortController();
      const sleeping = sleepFor(10_000, controller.signal);

      controller.abort("shutting down");

      await expect(sleeping).rejects.toBe("shutting down");
      expect(jest.getTimerCount()).toBe(0);
    });

    it("should not start when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort("too late");

      await expect(sleepFor(100, controller.signal)).rejects.toBe("too late");
      expect(jest.getTimerCount()).toBe(0);
    });

    it("should sleep past the longest single timer delay", async () => {
      let done = false;
      const sleeping = sleepFor(MAX_TIMER_DELAY_MS + 5000).then(() => {
        done = true;
      });

      await jest.advanceTimersByTimeAsync(1000);
      expect(done).toBe(false);

      await jest.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS - 1000);
      expect(done).toBe(false);

      await jest.advanceTimersByTimeAsync(4999);
      expect(done).toBe(false);

      await jest.advanceTimersByTimeAsync(1);
      await sleeping;
      expect(done).toBe(true);
    });

    it("should abort a long sleep in any chunk", async () => {
      const controller = new AbortController();
      const sleeping = sleepFor(MAX_TIMER_DELAY_MS * 2, controller.signal);

      await jest.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS + 10);
      controller.abort("stopped");

      await expect(sleeping).rejects.toBe("stopped");
      expect(jest.getTimerCount()).toBe(0);
    });
  });
});
