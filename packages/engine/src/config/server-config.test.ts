import { describe, expect, it } from "vitest";
import { configFromEnv, defaultConfig } from "./server-config.js";

describe("defaultConfig", () => {
  it("serves one connection at a time on localhost:8080", () => {
    expect(defaultConfig()).toEqual({
      port: 8080,
      host: "127.0.0.1",
      quiet: false,
      connectionMode: "serial",
      enforceMethod: false,
      logLevel: "info",
    });
  });
});

describe("configFromEnv", () => {
  it("reads PORT and HOST", () => {
    const config = configFromEnv({ PORT: "9090", HOST: "0.0.0.0" });
    expect(config.port).toBe(9090);
    expect(config.host).toBe("0.0.0.0");
  });

  it("ignores empty values", () => {
    expect(configFromEnv({ PORT: "", HOST: "" })).toEqual(defaultConfig());
  });

  it("rejects an invalid PORT", () => {
    expect(() => configFromEnv({ PORT: "http" })).toThrow('Invalid PORT "http"');
    expect(() => configFromEnv({ PORT: "70000" })).toThrow(
      'Invalid PORT "70000"',
    );
  });
});
