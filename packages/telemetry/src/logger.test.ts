/**
 * Logger Tests
 *
 * Console routing and Sentry forwarding of the scoped logger.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("@sentry/node", () => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  captureMessage: vi.fn(),
  init: vi.fn(),
  flush: vi.fn(async () => true),
}));

import * as Sentry from "@sentry/node";
import { createLogger } from "./logger";
import { initTelemetry } from "./index";

describe("createLogger", () => {
  const originalDebug = process.env.TURNLAB_DEBUG;
  const originalNodeEnv = process.env.NODE_ENV;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    delete process.env.TURNLAB_DEBUG;
    process.env.NODE_ENV = "test";
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug === undefined) delete process.env.TURNLAB_DEBUG;
    else process.env.TURNLAB_DEBUG = originalDebug;
    process.env.NODE_ENV = originalNodeEnv;
  });

  it("should prefix info lines with the scope", () => {
    createLogger("EnergyVAD").info("ready", 3);
    expect(console.log).toHaveBeenCalledWith("[EnergyVAD]", "ready", 3);
  });

  it("should suppress debug output unless enabled", () => {
    const log = createLogger("EnergyVAD");
    log.debug("hidden");
    expect(console.debug).not.toHaveBeenCalled();

    process.env.TURNLAB_DEBUG = "1";
    log.debug("shown");
    expect(console.debug).toHaveBeenCalledWith("[EnergyVAD]", "shown");
  });

  it("should treat TURNLAB_DEBUG=false as disabled", () => {
    process.env.TURNLAB_DEBUG = "false";
    createLogger("Cli").debug("hidden");
    expect(console.debug).not.toHaveBeenCalled();
  });

  it("should leave a breadcrumb on warn", () => {
    createLogger("ModelVAD").warn("slow model", { ms: 40 });
    expect(Sentry.addBreadcrumb).toHaveBeenCalledWith({
      category: "modelvad",
      message: 'slow model {"ms":40}',
      level: "warning",
    });
  });

  it("should capture Error arguments as exceptions", () => {
    const failure = new Error("boom");
    createLogger("Cli").error("analysis failed", failure);
    expect(Sentry.captureException).toHaveBeenCalledWith(failure, {
      tags: { module: "cli" },
      extra: { args: "analysis failed" },
    });
    expect(Sentry.captureMessage).not.toHaveBeenCalled();
  });

  it("should capture plain error lines as messages", () => {
    createLogger("Cli").error("no output path");
    expect(Sentry.captureMessage).toHaveBeenCalledWith("[Cli] no output path", {
      level: "error",
      tags: { module: "cli" },
    });
  });
});

describe("initTelemetry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should stay disabled without a DSN", async () => {
    const client = initTelemetry({ environment: "test" });

    expect(client.enabled).toBe(false);
    expect(Sentry.init).not.toHaveBeenCalled();
    await expect(client.flush()).resolves.toBe(true);
    expect(Sentry.flush).not.toHaveBeenCalled();
  });

  it("should initialise Sentry when a DSN is given", async () => {
    const client = initTelemetry({
      sentryDsn: "https://public@example.invalid/1",
      environment: "test",
      release: "0.1.0",
      context: { argv: ["call.wav"] },
    });

    expect(client.enabled).toBe(true);
    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: "https://public@example.invalid/1",
        environment: "test",
        release: "0.1.0",
        initialScope: { extra: { argv: ["call.wav"] } },
      }),
    );

    await client.flush(500);
    expect(Sentry.flush).toHaveBeenCalledWith(500);
  });
});
