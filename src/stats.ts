// stats.ts — Request statistics for daemon health output

export interface RequestStats {
  total: number;
  ok: number;
  failed: number;
  /** Executed actions, by verb. */
  by_verb: Record<string, number>;
  /** Failures, by JSON-RPC error code. */
  by_code: Record<string, number>;
}

export class StatsRecorder {
  private readonly stats: RequestStats = emptyStats();

  /** Called once per `command` request with its outcome. */
  recordRequest(ok: boolean, code?: number): void {
    this.stats.total++;
    if (ok) {
      this.stats.ok++;
      return;
    }
    this.stats.failed++;
    if (code !== undefined) {
      const key = String(code);
      this.stats.by_code[key] = (this.stats.by_code[key] ?? 0) + 1;
    }
  }

  /** Called for every action the dispatcher starts. */
  recordAction(verb: string): void {
    this.stats.by_verb[verb] = (this.stats.by_verb[verb] ?? 0) + 1;
  }

  snapshot(): RequestStats & { success_rate: number } {
    const s = this.stats;
    return {
      total: s.total,
      ok: s.ok,
      failed: s.failed,
      by_verb: { ...s.by_verb },
      by_code: { ...s.by_code },
      success_rate: s.total > 0 ? Math.round((s.ok / s.total) * 100) : 0,
    };
  }
}

function emptyStats(): RequestStats {
  return { total: 0, ok: 0, failed: 0, by_verb: {}, by_code: {} };
}
