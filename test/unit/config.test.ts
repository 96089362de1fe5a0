// Unit tests for config.ts
// Tests pure functions and mocked I/O

import { vi, describe, it, expect, beforeEach, afterEach } from "vitest";

// vi.mock calls are hoisted — must appear before imports of mocked modules
vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(),
  writeFile: vi.fn(),
}));

vi.mock("node:fs", () => ({
  existsSync: vi.fn(),
}));

import { readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import {
  readConfig,
  mergeConfig,
  setConfigValue,
  getConfigValue,
  resetConfig,
  isValidConfigKey,
  getDefaults,
  getConfigPath,
  coerceValue,
} from "../../src/config.js";

const mockReadFile = vi.mocked(readFile);
const mockWriteFile = vi.mocked(writeFile);
const mockExistsSync = vi.mocked(existsSync);

const SAVED_CONFIG_PATH = process.env.NLBROWSE_CONFIG;

beforeEach(() => {
  delete process.env.NLBROWSE_CONFIG;
});

afterEach(() => {
  if (SAVED_CONFIG_PATH === undefined) delete process.env.NLBROWSE_CONFIG;
  else process.env.NLBROWSE_CONFIG = SAVED_CONFIG_PATH;
});

function lastWritten(): Record<string, unknown> {
  return JSON.parse((mockWriteFile.mock.calls[0]?.[1] ?? "{}") as string) as Record<string, unknown>;
}

describe("isValidConfigKey", () => {
  it("accepts all valid keys", () => {
    for (const key of [
      "headless",
      "initial-tab",
      "default-timeout-ms",
      "navigation-timeout-ms",
      "screenshot-dir",
      "screenshot-full-page",
      "allow-private",
      "daemon-idle-timeout-m",
      "cdp-url",
      "executable-path",
    ]) {
      expect(isValidConfigKey(key)).toBe(true);
    }
  });

  it("rejects unknown keys", () => {
    expect(isValidConfigKey("foo")).toBe(false);
    expect(isValidConfigKey("")).toBe(false);
    expect(isValidConfigKey("allow_private")).toBe(false);
    expect(isValidConfigKey("HEADLESS")).toBe(false);
  });
});

describe("getDefaults", () => {
  it("returns separate object on each call (immutability)", () => {
    const d1 = getDefaults();
    const d2 = getDefaults();
    expect(d1).toEqual(d2);
    expect(d1).not.toBe(d2);
  });

  it("has expected default values", () => {
    expect(getDefaults()).toEqual({
      "headless": true,
      "initial-tab": true,
      "default-timeout-ms": 10000,
      "navigation-timeout-ms": 30000,
      "screenshot-dir": "/tmp",
      "screenshot-full-page": true,
      "allow-private": false,
      "daemon-idle-timeout-m": 30,
      "cdp-url": "",
      "executable-path": "",
    });
  });
});

describe("getConfigPath", () => {
  it("defaults to /tmp and honours NLBROWSE_CONFIG", () => {
    expect(getConfigPath()).toBe("/tmp/nlbrowse-config.json");
    process.env.NLBROWSE_CONFIG = "/tmp/other-config.json";
    expect(getConfigPath()).toBe("/tmp/other-config.json");
  });
});

describe("readConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns defaults when config file does not exist", async () => {
    mockExistsSync.mockReturnValue(false);
    expect(await readConfig()).toEqual(getDefaults());
    expect(mockReadFile).not.toHaveBeenCalled();
  });

  it("merges file config with defaults", async () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFile.mockResolvedValue(
      JSON.stringify({ "headless": false, "default-timeout-ms": 5000 }) as unknown as Buffer,
    );
    const config = await readConfig();
    expect(config["headless"]).toBe(false);
    expect(config["default-timeout-ms"]).toBe(5000);
    expect(config["navigation-timeout-ms"]).toBe(30000); // default preserved
  });

  it("returns defaults on JSON parse error", async () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFile.mockResolvedValue("invalid json" as unknown as Buffer);
    expect(await readConfig()).toEqual(getDefaults());
  });

  it("returns defaults on readFile error", async () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFile.mockRejectedValue(new Error("Permission denied"));
    expect(await readConfig()).toEqual(getDefaults());
  });
});

describe("mergeConfig", () => {
  it("drops unknown keys and values of the wrong type", () => {
    const config = mergeConfig({
      "bogus": 1,
      "allow-private": "yes",
      "default-timeout-ms": -5,
      "cdp-url": "http://127.0.0.1:9222",
    });
    expect(config).toEqual({ ...getDefaults(), "cdp-url": "http://127.0.0.1:9222" });
  });

  it("ignores non-object input", () => {
    expect(mergeConfig([1, 2])).toEqual(getDefaults());
    expect(mergeConfig(null)).toEqual(getDefaults());
    expect(mergeConfig("headless")).toEqual(getDefaults());
  });
});

describe("coerceValue", () => {
  it("parses booleans", () => {
    expect(coerceValue("headless", "true")).toBe(true);
    expect(coerceValue("headless", "1")).toBe(true);
    expect(coerceValue("headless", "false")).toBe(false);
    expect(coerceValue("headless", "0")).toBe(false);
    expect(() => coerceValue("headless", "yes")).toThrow(
      'Value for "headless" must be true/false, got "yes"',
    );
  });

  it("parses non-negative numbers", () => {
    expect(coerceValue("daemon-idle-timeout-m", "0")).toBe(0);
    expect(coerceValue("default-timeout-ms", "2500")).toBe(2500);
    expect(() => coerceValue("default-timeout-ms", "")).toThrow(
      'Value for "default-timeout-ms" must be a number, got ""',
    );
    expect(() => coerceValue("default-timeout-ms", "-1")).toThrow(
      'Value for "default-timeout-ms" must not be negative, got "-1"',
    );
  });

  it("keeps strings as given", () => {
    expect(coerceValue("screenshot-dir", "/var/shots")).toBe("/var/shots");
  });
});

describe("setConfigValue", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockExistsSync.mockReturnValue(false);
    mockWriteFile.mockResolvedValue(undefined as unknown as void);
  });

  it("sets boolean false", async () => {
    await setConfigValue("headless", "false");
    expect(mockWriteFile).toHaveBeenCalledOnce();
    expect(mockWriteFile.mock.calls[0]?.[0]).toBe("/tmp/nlbrowse-config.json");
    expect(lastWritten()["headless"]).toBe(false);
  });

  it("sets numeric value", async () => {
    await setConfigValue("navigation-timeout-ms", "45000");
    expect(lastWritten()["navigation-timeout-ms"]).toBe(45000);
  });

  it("sets string value", async () => {
    await setConfigValue("screenshot-dir", "/var/screenshots");
    expect(lastWritten()["screenshot-dir"]).toBe("/var/screenshots");
  });

  it("writes to the NLBROWSE_CONFIG path", async () => {
    process.env.NLBROWSE_CONFIG = "/tmp/nlbrowse-test-config.json";
    await setConfigValue("allow-private", "true");
    expect(mockWriteFile.mock.calls[0]?.[0]).toBe("/tmp/nlbrowse-test-config.json");
  });

  it("throws on invalid boolean value", async () => {
    await expect(setConfigValue("allow-private", "yes")).rejects.toThrow(
      'Value for "allow-private" must be true/false',
    );
    expect(mockWriteFile).not.toHaveBeenCalled();
  });

  it("throws on non-numeric value for number key", async () => {
    await expect(setConfigValue("daemon-idle-timeout-m", "abc")).rejects.toThrow(
      'Value for "daemon-idle-timeout-m" must be a number',
    );
    expect(mockWriteFile).not.toHaveBeenCalled();
  });
});

describe("getConfigValue", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reads one key from the merged config", async () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFile.mockResolvedValue(JSON.stringify({ "initial-tab": false }) as unknown as Buffer);
    expect(await getConfigValue("initial-tab")).toBe(false);
    expect(await getConfigValue("headless")).toBe(true);
  });
});

describe("resetConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockWriteFile.mockResolvedValue(undefined as unknown as void);
  });

  it("writes defaults to file", async () => {
    await resetConfig();
    expect(mockWriteFile).toHaveBeenCalledOnce();
    expect(lastWritten()).toEqual(getDefaults());
  });

  it("resets all 10 keys", async () => {
    await resetConfig();
    expect(Object.keys(lastWritten())).toHaveLength(10);
  });
});
