import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, resolveConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { createLogger } from "../logger.js";

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveConfig({})).toEqual({
      profile: undefined,
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      accessToken: undefined,
      refreshToken: undefined,
    });
  });

  it("reads overrides from the environment", () => {
    const config = resolveConfig({
      MECALLER_PROFILE: "work",
      MECALLER_BASE_URL: "https://api.example.test/v2/",
      MECALLER_TIMEOUT_MS: "2500",
      MECALLER_ACCESS_TOKEN: "test-access",
      MECALLER_REFRESH_TOKEN: "test-refresh",
    });

    expect(config).toEqual({
      profile: "work",
      baseUrl: "https://api.example.test/v2",
      timeoutMs: 2500,
      accessToken: "test-access",
      refreshToken: "test-refresh",
    });
  });

  it("ignores blank values", () => {
    const config = resolveConfig({ MECALLER_BASE_URL: "  ", MECALLER_PROFILE: "" });
    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.profile).toBeUndefined();
  });

  it("rejects a bad timeout", () => {
    expect(() => resolveConfig({ MECALLER_TIMEOUT_MS: "soon" })).toThrow(ValidationError);
    expect(() => resolveConfig({ MECALLER_TIMEOUT_MS: "soon" })).toThrow(/MECALLER_TIMEOUT_MS/);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.MECALLER_DEBUG;
  });

  it("prints debug lines only when MECALLER_DEBUG=1", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("session");

    delete process.env.MECALLER_DEBUG;
    logger.debug("hidden");
    process.env.MECALLER_DEBUG = "1";
    logger.debug("shown");
    logger.warn("always");

    expect(spy.mock.calls).toEqual([
      ["[mecaller] session: shown"],
      ["[mecaller] session: always"],
    ]);
  });

  it("treats any other MECALLER_DEBUG value as off", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.env.MECALLER_DEBUG = "true";

    createLogger("session").debug("hidden");

    expect(spy).not.toHaveBeenCalled();
  });
});
