import {
  AttemptTimeoutError,
  backoffDelay,
  executeWithRetry,
} from "../retry-utils";
import { silentLogger } from "../../__tests__/fakes";

describe("executeWithRetry", () => {
  it("should retry until the operation succeeds", async () => {
    let calls = 0;

    const result = await executeWithRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error("flaky");
        return "ok";
      },
      {
        maxAttempts: 3,
        baseDelayMs: 1,
        isRetryable: () => true,
        logger: silentLogger,
      },
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("should rethrow the last error once attempts run out", async () => {
    let calls = 0;

    await expect(
      executeWithRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        {
          maxAttempts: 2,
          baseDelayMs: 1,
          isRetryable: () => true,
          logger: silentLogger,
        },
      ),
    ).rejects.toThrow("failure 2");
  });

  it("should not retry errors the caller marks permanent", async () => {
    let calls = 0;

    await expect(
      executeWithRetry(
        async () => {
          calls++;
          throw new Error("bad request");
        },
        {
          maxAttempts: 5,
          baseDelayMs: 1,
          isRetryable: () => false,
          logger: silentLogger,
        },
      ),
    ).rejects.toThrow("bad request");
    expect(calls).toBe(1);
  });

  it("should time out a hanging attempt and abort its signal", async () => {
    let seen: AbortSignal | undefined;

    await expect(
      executeWithRetry(
        signal => {
          seen = signal;
          return new Promise<never>(() => {});
        },
        {
          maxAttempts: 1,
          baseDelayMs: 1,
          timeoutMs: 10,
          isRetryable: () => true,
          logger: silentLogger,
        },
      ),
    ).rejects.toBeInstanceOf(AttemptTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it("should stop when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort(new Error("shutting down"));

    await expect(
      executeWithRetry(async () => "never", {
        maxAttempts: 3,
        baseDelayMs: 1,
        isRetryable: () => true,
        signal: controller.signal,
        logger: silentLogger,
      }),
    ).rejects.toThrow("shutting down");
  });
});

describe("backoffDelay", () => {
  it("should double per attempt up to the cap", () => {
    expect(backoffDelay(0, 500)).toBe(500);
    expect(backoffDelay(3, 500)).toBe(4000);
    expect(backoffDelay(10, 500)).toBe(30000);
    expect(backoffDelay(2, 100, 250)).toBe(250);
  });
});
