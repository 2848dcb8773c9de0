/**
 * Circuit breakers feeding the safety supervisor
 */

export interface DrawdownReading {
  peakEquity: number;
  equity: number;
  drawdownPct: number;
  tripped: boolean;
}

/**
 * Drawdown from the session's peak equity. The peak only ratchets up.
 */
export class DrawdownBreaker {
  private peakEquity: number | null = null;

  constructor(private readonly maxDrawdownPct: number) {}

  update(equity: number): DrawdownReading {
    if (this.peakEquity === null || equity > this.peakEquity) {
      this.peakEquity = equity;
    }
    const peak = this.peakEquity;
    const drawdownPct = peak > 0 ? ((peak - equity) / peak) * 100 : 100;
    return {
      peakEquity: peak,
      equity,
      drawdownPct,
      tripped: this.maxDrawdownPct > 0 && drawdownPct > this.maxDrawdownPct,
    };
  }

  getPeakEquity(): number | null {
    return this.peakEquity;
  }
}

/**
 * Counts exchange failures in a sliding window
 */
export class ApiErrorBurstBreaker {
  private timestamps: number[] = [];

  constructor(
    private readonly maxErrors: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  record(): void {
    this.timestamps.push(this.now());
    this.prune();
  }

  count(): number {
    this.prune();
    return this.timestamps.length;
  }

  isTripped(): boolean {
    return this.maxErrors > 0 && this.count() >= this.maxErrors;
  }

  reset(): void {
    this.timestamps = [];
  }

  private prune(): void {
    const cutoff = this.now() - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }
}
