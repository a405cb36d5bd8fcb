import { describe, it, expect, vi, afterEach } from "vitest";
import { fireAndForget } from "../../src/utils/logger.js";

describe("fireAndForget", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs a rejection under the caller's namespace with its data", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    fireAndForget(Promise.reject(new Error("boom")), "[bot]", "Deactivate blocked user", { telegramId: 5 });
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/ WARN \[bot\] Deactivate blocked user \{"telegramId":5,"error":"boom"\}$/);
  });

  it("stays quiet when the promise resolves", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    fireAndForget(Promise.resolve(1), "[bot]", "noop");
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(warn).not.toHaveBeenCalled();
  });
});
