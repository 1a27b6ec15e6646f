// In-memory progress for running encodes. FFmpeg reports several times a
// second; the repository only gets whole-percent changes.
export class ProgressStore {
  private readonly percent = new Map<string, number>();

  /**
   * Returns true when the whole-percent value went up. Lower values are
   * ignored so pollers never see progress move backwards.
   */
  set(jobId: string, value: number): boolean {
    if (!Number.isFinite(value)) return false;
    const next = Math.max(0, Math.min(99, Math.floor(value)));
    const current = this.percent.get(jobId);
    if (current !== undefined && next <= current) return false;
    this.percent.set(jobId, next);
    return true;
  }

  get(jobId: string): number | undefined {
    return this.percent.get(jobId);
  }

  clear(jobId: string): void {
    this.percent.delete(jobId);
  }
}

/**
 * Percent of `durationSeconds` covered by `outTimeSeconds`, capped below 100
 * so only a completed job ever reads 100.
 */
export function toPercent(outTimeSeconds: number, durationSeconds: number | null): number | null {
  if (!durationSeconds || durationSeconds <= 0 || outTimeSeconds < 0) return null;
  return Math.min(99, Math.floor((outTimeSeconds / durationSeconds) * 100));
}
