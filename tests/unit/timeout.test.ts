import { describe, expect, it } from "vitest";
import { OperationTimeoutError } from "../../src/errors";
import { withTimeout } from "../../src/timeout";

describe("withTimeout", () => {
  it("resolves with the wrapped value", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, "slow")).resolves.toBe(42);
  });

  it("rejects with OperationTimeoutError when the bound elapses", async () => {
    const never = new Promise<number>(() => undefined);
    const result = withTimeout(never, 10, "embedding timed out");
    await expect(result).rejects.toBeInstanceOf(OperationTimeoutError);
    await expect(result).rejects.toMatchObject({ message: "embedding timed out", timeoutMs: 10 });
  });

  it("passes wrapped rejections through", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 1000, "slow")).rejects.toThrow("boom");
  });

  it("does not bound the call when the timeout is disabled", async () => {
    const late = new Promise<string>((resolve) => setTimeout(() => resolve("done"), 20));
    await expect(withTimeout(late, 0, "slow")).resolves.toBe("done");
  });
});
