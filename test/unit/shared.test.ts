import { describe, it, expect, vi, afterEach } from "vitest";
import { join } from "node:path";
import { realpathSync } from "node:fs";
import { tmpdir } from "node:os";
import {
  normalizeTimeoutMs,
  withTimeout,
  settleWithin,
  normalizeUrl,
  validateNavigationUrl,
  validateScreenshotPath,
  defaultScreenshotDirs,
  toJsonResult,
  formatOutput,
  formatData,
  errorResult,
} from "../../src/shared.js";
import { DriverError, ParseError } from "../../src/errors.js";

const TMP = realpathSync(tmpdir());

afterEach(() => {
  vi.restoreAllMocks();
});

describe("normalizeTimeoutMs", () => {
  it("clamps to 500..120000 and falls back when undefined", () => {
    expect(normalizeTimeoutMs(undefined, 10_000)).toBe(10_000);
    expect(normalizeTimeoutMs(100, 10_000)).toBe(500);
    expect(normalizeTimeoutMs(500_000, 10_000)).toBe(120_000);
    expect(normalizeTimeoutMs(2_000, 10_000)).toBe(2_000);
  });
});

describe("withTimeout", () => {
  it("resolves with the value when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, "Op")).resolves.toBe(7);
  });

  it("rejects with a timeout DriverError", async () => {
    const never = new Promise<never>(() => {});
    const error: unknown = await withTimeout(never, 20, "Reading title").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DriverError);
    expect(error).toMatchObject({ kind: "timeout", message: "Reading title timed out after 20ms" });
  });

  it("passes the promise's own rejection through", async () => {
    await expect(withTimeout(Promise.reject(new Error("nope")), 1000, "Op")).rejects.toThrow("nope");
  });
});

describe("settleWithin", () => {
  it("reports a promise that settles in time, rejected or not", async () => {
    expect(await settleWithin(Promise.resolve(1), 1000)).toBe(true);
    expect(await settleWithin(Promise.reject(new Error("nope")), 1000)).toBe(true);
  });

  it("gives up on a promise that never settles", async () => {
    expect(await settleWithin(new Promise<never>(() => {}), 20)).toBe(false);
  });
});

describe("normalizeUrl", () => {
  it("adds https:// to scheme-less targets", () => {
    expect(normalizeUrl("example.com")).toBe("https://example.com");
    expect(normalizeUrl(" example.com/docs ")).toBe("https://example.com/docs");
  });

  it("keeps explicit and opaque schemes", () => {
    expect(normalizeUrl("http://example.com")).toBe("http://example.com");
    expect(normalizeUrl("about:blank")).toBe("about:blank");
    expect(normalizeUrl("javascript:alert(1)")).toBe("javascript:alert(1)");
  });
});

describe("validateNavigationUrl", () => {
  it("allows public http(s) and about:", () => {
    expect(() => validateNavigationUrl("https://example.com")).not.toThrow();
    expect(() => validateNavigationUrl("about:blank")).not.toThrow();
  });

  it("blocks other schemes", () => {
    expect(() => validateNavigationUrl("javascript:alert(1)")).toThrow(
      'Blocked URL scheme "javascript:" (only http:, https:, about: are allowed)',
    );
    expect(() => validateNavigationUrl("file:///etc/passwd")).toThrow(ParseError);
  });

  it("blocks cloud metadata hosts even when private hosts are allowed", () => {
    expect(() =>
      validateNavigationUrl("http://169.254.169.254/latest", { allowPrivate: true }),
    ).toThrow('Blocked URL host "169.254.169.254": cloud metadata endpoints are not allowed');
  });

  it("blocks private ranges unless allowed", () => {
    for (const url of [
      "http://localhost:8080",
      "http://127.0.0.1",
      "http://10.1.2.3",
      "http://172.20.0.1",
      "http://192.168.1.10",
      "http://0.0.0.0",
      "http://[::1]:3000",
    ]) {
      expect(() => validateNavigationUrl(url)).toThrow(ParseError);
      expect(() => validateNavigationUrl(url, { allowPrivate: true })).not.toThrow();
    }
    expect(() => validateNavigationUrl("http://172.32.0.1")).not.toThrow();
  });

  it("reports an unparseable URL as a navigation error", () => {
    let caught: unknown;
    try {
      validateNavigationUrl("not a url");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DriverError);
    expect(caught).toMatchObject({ kind: "navigation", message: 'Invalid URL: "not a url"' });
  });
});

describe("validateScreenshotPath", () => {
  it("includes the system temp directory", () => {
    expect(defaultScreenshotDirs()).toContain(TMP);
  });

  it("accepts a path under the temp directory", () => {
    const path = join(TMP, "shot.png");
    expect(validateScreenshotPath(path)).toBe(path);
  });

  it("resolves relative paths against cwd", () => {
    expect(validateScreenshotPath("shot.png", { cwd: TMP })).toBe(join(TMP, "shot.png"));
  });

  it("accepts extra allowed directories", () => {
    const cwd = realpathSync(process.cwd());
    expect(validateScreenshotPath(join(cwd, "shot.png"), { allowedDirs: [cwd] })).toBe(join(cwd, "shot.png"));
  });

  it("blocks paths outside the allowed directories", () => {
    expect(() => validateScreenshotPath("/etc/shot.png")).toThrow(ParseError);
    expect(() => validateScreenshotPath("/tmp/../etc/shot.png")).toThrow(ParseError);
  });
});

describe("toJsonResult", () => {
  it("maps ok responses", () => {
    expect(toJsonResult({ status: "ok", message: "Clicked #a" })).toEqual({ ok: true, message: "Clicked #a" });
  });

  it("maps error responses", () => {
    expect(toJsonResult({ status: "error", message: "no active tab", code: -32012 })).toEqual({
      ok: false,
      error: "no active tab",
      code: -32012,
    });
  });
});

describe("formatOutput", () => {
  it("prints the message and data in text mode", () => {
    const out = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    formatOutput({ status: "ok", message: "Text of #price", data: "$10" }, false);
    expect(out.mock.calls.map((c) => c[0])).toEqual(["Text of #price\n", "$10\n"]);
  });

  it("prints errors to stderr in text mode", () => {
    const err = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const out = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    formatOutput({ status: "error", message: "no active tab", code: -32012 }, false);
    expect(err.mock.calls.map((c) => c[0])).toEqual(["no active tab\n"]);
    expect(out).not.toHaveBeenCalled();
  });

  it("prints one JSON line in --json mode", () => {
    const out = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    formatOutput({ status: "error", message: "daemon not started" }, true);
    expect(out.mock.calls.map((c) => c[0])).toEqual(['{"ok":false,"error":"daemon not started"}\n']);
  });
});

describe("formatData / errorResult", () => {
  it("formats scalars plainly and objects as JSON", () => {
    expect(formatData("x")).toBe("x");
    expect(formatData(3)).toBe("3");
    expect(formatData(true)).toBe("true");
    expect(formatData({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it("wraps an error", () => {
    expect(errorResult(new Error("boom"))).toEqual({ ok: false, error: "boom" });
  });
});
