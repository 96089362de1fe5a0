// config.ts — Runtime configuration for the nlbrowse daemon
// Config file: /tmp/nlbrowse-config.json (NLBROWSE_CONFIG overrides the path)
// Keys and defaults define the contract; callers should use isValidConfigKey() before setConfigValue().

import { readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";

export function getConfigPath(): string {
  return process.env.NLBROWSE_CONFIG || "/tmp/nlbrowse-config.json";
}

export interface RuntimeConfig {
  "headless": boolean;
  // open one blank tab when the daemon starts
  "initial-tab": boolean;
  "default-timeout-ms": number;
  "navigation-timeout-ms": number;
  "screenshot-dir": string;
  "screenshot-full-page": boolean;
  // allow localhost / RFC1918 targets (cloud metadata hosts stay blocked)
  "allow-private": boolean;
  // 0 = never
  "daemon-idle-timeout-m": number;
  // attach to a running Chrome instead of launching one (empty = launch)
  "cdp-url": string;
  "executable-path": string;
}

export type ConfigKey = keyof RuntimeConfig;
export type ConfigValue = RuntimeConfig[ConfigKey];

const DEFAULTS: RuntimeConfig = {
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
};

const VALID_KEYS = new Set<string>(Object.keys(DEFAULTS));

export function isValidConfigKey(key: string): key is ConfigKey {
  return VALID_KEYS.has(key);
}

export function getDefaults(): RuntimeConfig {
  return { ...DEFAULTS };
}

export async function readConfig(): Promise<RuntimeConfig> {
  const path = getConfigPath();
  if (!existsSync(path)) return { ...DEFAULTS };
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch {
    return { ...DEFAULTS };
  }
  return mergeConfig(parsed);
}

/** Overlay the well-typed keys of a parsed file on the defaults; others are dropped. */
export function mergeConfig(parsed: unknown): RuntimeConfig {
  const config = { ...DEFAULTS };
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return config;
  for (const [key, value] of Object.entries(parsed)) {
    if (!isValidConfigKey(key)) continue;
    assignIfTyped(config, key, value);
  }
  return config;
}

function assignIfTyped(config: RuntimeConfig, key: ConfigKey, value: unknown): void {
  switch (key) {
    case "headless":
    case "initial-tab":
    case "screenshot-full-page":
    case "allow-private":
      if (typeof value === "boolean") config[key] = value;
      return;
    case "default-timeout-ms":
    case "navigation-timeout-ms":
    case "daemon-idle-timeout-m":
      if (typeof value === "number" && Number.isFinite(value) && value >= 0) config[key] = value;
      return;
    case "screenshot-dir":
    case "cdp-url":
    case "executable-path":
      if (typeof value === "string") config[key] = value;
      return;
  }
}

export async function writeRuntimeConfig(config: RuntimeConfig): Promise<void> {
  await writeFile(getConfigPath(), JSON.stringify(config, null, 2), "utf-8");
}

export async function getConfigValue(key: ConfigKey): Promise<ConfigValue> {
  const config = await readConfig();
  return config[key];
}

export async function setConfigValue(key: ConfigKey, rawValue: string): Promise<void> {
  const config = await readConfig();
  assignIfTyped(config, key, coerceValue(key, rawValue));
  await writeRuntimeConfig(config);
}

export async function resetConfig(): Promise<void> {
  await writeRuntimeConfig({ ...DEFAULTS });
}

export function coerceValue(key: ConfigKey, raw: string): ConfigValue {
  const defaultVal = DEFAULTS[key];
  if (typeof defaultVal === "boolean") {
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    throw new Error(`Value for "${key}" must be true/false, got "${raw}"`);
  }
  if (typeof defaultVal === "number") {
    const n = Number(raw);
    if (raw.trim() === "" || Number.isNaN(n)) {
      throw new Error(`Value for "${key}" must be a number, got "${raw}"`);
    }
    if (n < 0) throw new Error(`Value for "${key}" must not be negative, got "${raw}"`);
    return n;
  }
  return raw;
}
