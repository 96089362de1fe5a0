import { describe, it, expect } from "vitest";
import { StatsRecorder } from "../../src/stats.js";

describe("StatsRecorder", () => {
  it("starts empty", () => {
    expect(new StatsRecorder().snapshot()).toEqual({
      total: 0,
      ok: 0,
      failed: 0,
      by_verb: {},
      by_code: {},
      success_rate: 0,
    });
  });

  it("counts outcomes, verbs and failure codes", () => {
    const stats = new StatsRecorder();
    stats.recordAction("navigate");
    stats.recordAction("click");
    stats.recordAction("click");
    stats.recordRequest(true);
    stats.recordRequest(true);
    stats.recordRequest(false, -32006);

    expect(stats.snapshot()).toEqual({
      total: 3,
      ok: 2,
      failed: 1,
      by_verb: { navigate: 1, click: 2 },
      by_code: { "-32006": 1 },
      success_rate: 67,
    });
  });

  it("counts a failure without a code only in the totals", () => {
    const stats = new StatsRecorder();
    stats.recordRequest(false);
    expect(stats.snapshot()).toMatchObject({ total: 1, failed: 1, by_code: {} });
  });

  it("returns copies that later records do not touch", () => {
    const stats = new StatsRecorder();
    stats.recordAction("scroll");
    const before = stats.snapshot();
    stats.recordAction("scroll");
    expect(before.by_verb).toEqual({ scroll: 1 });
  });
});
