import { describe, expect, it, vi } from "vitest";

import { ConsoleLogger, describeError } from "@/backend/adapters/logging/console-logger";

describe("ConsoleLogger", () => {
  it("prefixes lines with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    const logger = new ConsoleLogger();
    logger.warn("Slow query", { ms: 1200 });
    logger.child("analysis").info("Ready");

    expect(warn).toHaveBeenCalledWith("[truthfinder] Slow query", { ms: 1200 });
    expect(info).toHaveBeenCalledWith("[analysis] Ready");
  });

  it("emits debug lines only when enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    new ConsoleLogger({ scope: "quiet" }).debug("hidden");
    new ConsoleLogger({ scope: "loud", debug: true }).child("chat-agent").debug("shown");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[chat-agent] shown");
  });
});

describe("describeError", () => {
  it("formats errors and other values", () => {
    expect(describeError(new TypeError("bad input"))).toBe("TypeError: bad input");
    expect(describeError("plain")).toBe("plain");
  });
});
