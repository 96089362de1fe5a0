// Shared utilities: timeouts, URL and path guards, CLI output

import { resolve, sep, dirname, basename, join, isAbsolute } from "node:path";
import { realpathSync } from "node:fs";
import { tmpdir } from "node:os";
import { DriverError, ParseError, errorMessage } from "./errors.js";
import type { CommandResponse } from "./protocol.js";

export function normalizeTimeoutMs(timeoutMs: number | undefined, fallback: number) {
  return Math.max(500, Math.min(120_000, timeoutMs ?? fallback));
}

/** Reject with a DriverError "timeout" when `promise` has not settled within `ms`. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new DriverError("timeout", `${label} timed out after ${ms}ms`)),
      ms,
    );
  });
  try {
    return await Promise.race([promise, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/** Wait for `promise` to settle, giving up after `ms`. Resolves true when it settled in time. */
export async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true, () => true), expiry]);
  } finally {
    clearTimeout(timer);
  }
}

// --- Security: URL validation ---

const ALLOWED_SCHEMES = new Set(["http:", "https:", "about:"]);
const BLOCKED_HOSTS = [
  /^169\.254\.169\.254$/,         // AWS metadata
  /^metadata\.google\.internal$/, // GCP metadata
  /^100\.100\.100\.200$/,         // Alibaba metadata
];

function isPrivateIP(hostname: string): boolean {
  // localhost
  if (hostname === "localhost" || hostname === "[::1]" || hostname === "::1") return true;
  // 127.0.0.0/8
  if (/^127\./.test(hostname)) return true;
  // 10.0.0.0/8
  if (/^10\./.test(hostname)) return true;
  // 172.16.0.0/12
  const m172 = hostname.match(/^172\.(\d+)\./);
  if (m172?.[1] !== undefined && +m172[1] >= 16 && +m172[1] <= 31) return true;
  // 192.168.0.0/16
  if (/^192\.168\./.test(hostname)) return true;
  // 0.0.0.0
  if (hostname === "0.0.0.0") return true;
  return false;
}

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const OPAQUE_SCHEME = /^(?:about|data|javascript|file|chrome|blob|view-source):/i;

/** Prefix https:// to a target written without a scheme ("example.com/docs"). */
export function normalizeUrl(raw: string): string {
  const url = raw.trim();
  if (SCHEME.test(url) || OPAQUE_SCHEME.test(url)) return url;
  return `https://${url}`;
}

export function validateNavigationUrl(url: string, opts: { allowPrivate?: boolean } = {}): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new DriverError("navigation", `Invalid URL: "${url}"`);
  }

  if (!ALLOWED_SCHEMES.has(parsed.protocol)) {
    throw ParseError.blocked(
      url,
      `Blocked URL scheme "${parsed.protocol}" (only http:, https:, about: are allowed)`,
    );
  }

  for (const pattern of BLOCKED_HOSTS) {
    if (pattern.test(parsed.hostname)) {
      throw ParseError.blocked(
        url,
        `Blocked URL host "${parsed.hostname}": cloud metadata endpoints are not allowed`,
      );
    }
  }

  if (!opts.allowPrivate && isPrivateIP(parsed.hostname)) {
    throw ParseError.blocked(
      url,
      `Blocked private/local URL "${parsed.hostname}". ` +
        `Run 'nlbrowse config set allow-private true' to override.`,
    );
  }
}

// --- Security: Screenshot path validation ---

function resolveReal(p: string): string {
  try { return realpathSync(p); } catch { return resolve(p); }
}

/** Directories a screenshot may always be written under. */
export function defaultScreenshotDirs(): string[] {
  return unique([resolveReal(tmpdir()), resolveReal("/tmp")]);
}

function unique(dirs: string[]): string[] {
  return dirs.filter((v, i, a) => a.indexOf(v) === i);
}

/**
 * Resolve `outputPath` (relative to `cwd` when given) and check that it lies
 * under one of `allowedDirs`. Returns the resolved path.
 */
export function validateScreenshotPath(
  outputPath: string,
  opts: { cwd?: string; allowedDirs?: string[] } = {},
): string {
  // For new files, realpathSync fails. Resolve the parent dir (which exists) instead.
  const absPath = isAbsolute(outputPath) ? outputPath : resolve(opts.cwd ?? ".", outputPath);
  const parentDir = resolveReal(dirname(absPath));
  const resolved = join(parentDir, basename(absPath));
  const dirs = unique([...defaultScreenshotDirs(), ...(opts.allowedDirs ?? []).map(resolveReal)]);
  const allowed = dirs.some((dir) => resolved === dir || resolved.startsWith(dir + sep));
  if (!allowed) {
    throw ParseError.blocked(
      outputPath,
      `Screenshot path "${outputPath}" is outside allowed directories (${dirs.join(", ")})`,
    );
  }
  return resolved;
}

// --- CLI output ---

export function jsonOutput(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + "\n");
}

export function textOutput(text: string): void {
  process.stdout.write(text + "\n");
}

/** Envelope printed in --json mode. */
export type JsonSuccess = { ok: true; message?: string; data?: unknown };
export type JsonFailure = { ok: false; error: string; code?: number; data?: unknown };
export type JsonResult = JsonSuccess | JsonFailure;

export function toJsonResult(resp: CommandResponse): JsonResult {
  if (resp.status === "ok") {
    const out: JsonSuccess = { ok: true };
    if (resp.message !== undefined) out.message = resp.message;
    if (resp.data !== undefined) out.data = resp.data;
    return out;
  }
  const out: JsonFailure = { ok: false, error: resp.message ?? "Error" };
  if (resp.code !== undefined) out.code = resp.code;
  if (resp.data !== undefined) out.data = resp.data;
  return out;
}

/**
 * Print a command response.
 *
 * Without --json: message (and data, when present) to stdout; errors to stderr
 * With --json:    {"ok":true,"data":...} or {"ok":false,"error":"msg"} to stdout
 */
export function formatOutput(resp: CommandResponse, jsonMode: boolean): void {
  if (jsonMode) {
    process.stdout.write(JSON.stringify(toJsonResult(resp)) + "\n");
    return;
  }

  if (resp.status === "error") {
    process.stderr.write((resp.message ?? "Error") + "\n");
    return;
  }

  if (resp.message) process.stdout.write(resp.message + "\n");
  if (resp.data !== undefined) process.stdout.write(formatData(resp.data) + "\n");
}

export function formatData(data: unknown): string {
  if (typeof data === "string") return data;
  if (typeof data === "boolean" || typeof data === "number") return String(data);
  return JSON.stringify(data, null, 2);
}

/** Wrap an error in the --json error envelope. */
export function errorResult(error: unknown): JsonFailure {
  return { ok: false, error: errorMessage(error) };
}
