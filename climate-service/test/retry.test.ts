import { describe, expect, it, vi } from "vitest";
import { NotFoundError, UpstreamUnavailableError } from "../src/errors.js";
import { backoffDelay, withDeadline, withRetry } from "../src/retry.js";

const noSleep = () => vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(500, attempt))).toEqual([500, 1000, 2000]);
  });
});

describe("withRetry", () => {
  it("retries retryable failures with backoff", async () => {
    const sleep = noSleep();
    const task = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new UpstreamUnavailableError("weather.gov request failed (503): busy", { status: 503 }))
      .mockRejectedValueOnce(new UpstreamUnavailableError("weather.gov is unreachable: fetch failed"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(task, { attempts: 3, baseDelayMs: 500, sleep })).resolves.toBe("ok");
    expect(task.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000]);
  });

  it("gives up after the last attempt", async () => {
    const sleep = noSleep();
    const onRetry = vi.fn();
    const task = vi.fn(async () => {
      throw new UpstreamUnavailableError("NCEI request failed (502): bad gateway", { status: 502 });
    });

    await expect(withRetry(task, { attempts: 3, baseDelayMs: 10, sleep, onRetry })).rejects.toThrow("NCEI request failed (502)");
    expect(task).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt, delayMs]) => [attempt, delayMs])).toEqual([[1, 10], [2, 20]]);
  });

  it("does not retry permanent failures", async () => {
    const sleep = noSleep();
    const task = vi.fn(async () => {
      throw new NotFoundError("Postal code 99999 was not found");
    });

    await expect(withRetry(task, { attempts: 3, baseDelayMs: 10, sleep })).rejects.toThrow(NotFoundError);
    expect(task).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("does not retry 4xx responses marked permanent", async () => {
    const task = vi.fn(async () => {
      throw new UpstreamUnavailableError("NCEI request failed (400): bad extent", { status: 400, retryable: false });
    });

    await expect(withRetry(task, { attempts: 3, baseDelayMs: 10, sleep: noSleep() })).rejects.toThrow("bad extent");
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("stops once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("deadline"));
    const task = vi.fn(async () => "never");

    await expect(withRetry(task, { attempts: 3, baseDelayMs: 10, signal: controller.signal })).rejects.toThrow("deadline");
    expect(task).not.toHaveBeenCalled();
  });
});

describe("withDeadline", () => {
  it("returns the task result when it finishes in time", async () => {
    await expect(withDeadline(async () => 42, 1000, () => new Error("late"))).resolves.toBe(42);
  });

  it("rejects with the timeout error and aborts the task signal", async () => {
    let seen: AbortSignal | undefined;
    const pending = withDeadline(
      (signal) => {
        seen = signal;
        return new Promise<number>(() => {});
      },
      10,
      () => new Error("Request exceeded 10ms")
    );

    await expect(pending).rejects.toThrow("Request exceeded 10ms");
    expect(seen?.aborted).toBe(true);
  });
});
