import { describe, expect, it } from "vitest";

import { CORE_CONFIG, createConfig, loadConfigFromEnv, LOG_LEVEL_ENV, PRETTY_LOGS_ENV, setup } from "../configs/config.ts";
import { ValidationError } from "../errors.ts";

const envFrom = (values: Record<string, string>) => (key: string) => values[key];

describe("createConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(createConfig()).toEqual({ logLevel: "warning", prettyLogs: true });
    expect(createConfig()).toEqual(CORE_CONFIG);
  });

  it("applies overrides", () => {
    expect(createConfig({ logLevel: "debug", prettyLogs: false })).toEqual({ logLevel: "debug", prettyLogs: false });
  });

  it("skips undefined overrides", () => {
    expect(createConfig({ logLevel: undefined })).toEqual(CORE_CONFIG);
  });

  it("rejects unknown log levels", () => {
    expect(() => createConfig({ logLevel: "verbose" })).toThrow(ValidationError);
    expect(() => createConfig({ logLevel: "verbose" })).toThrow(/^Invalid core config: logLevel: /);
  });
});

describe("loadConfigFromEnv", () => {
  it("falls back to the defaults", () => {
    expect(loadConfigFromEnv(envFrom({}))).toEqual(CORE_CONFIG);
  });

  it("reads the log level and pretty flag", () => {
    const config = loadConfigFromEnv(envFrom({ [LOG_LEVEL_ENV]: " Info ", [PRETTY_LOGS_ENV]: "false" }));
    expect(config).toEqual({ logLevel: "info", prettyLogs: false });
  });

  it("accepts 1 and 0 as booleans", () => {
    expect(loadConfigFromEnv(envFrom({ [PRETTY_LOGS_ENV]: "0" })).prettyLogs).toBe(false);
    expect(loadConfigFromEnv(envFrom({ [PRETTY_LOGS_ENV]: "1" })).prettyLogs).toBe(true);
  });

  it("ignores an unrecognized pretty flag", () => {
    expect(loadConfigFromEnv(envFrom({ [PRETTY_LOGS_ENV]: "maybe" })).prettyLogs).toBe(true);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfigFromEnv(envFrom({ [LOG_LEVEL_ENV]: "loud" }))).toThrow(ValidationError);
  });
});

describe("setup", () => {
  it("configures logging and returns the config in effect", async () => {
    const config = createConfig({ logLevel: "fatal", prettyLogs: false });
    await expect(setup(config)).resolves.toBe(config);
  });
});
