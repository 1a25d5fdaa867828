export interface QueryOutcome {
  hydeUsed: boolean;
  fallbackTriggered: boolean;
  fallbackImproved: boolean;
}

export interface UsageSnapshot {
  totalQueries: number;
  hydeUsed: number;
  fallbackTriggered: number;
  fallbackImproved: number;
  hydeUsageRate: number;
  fallbackRate: number;
  improvementRate: number;
}

/**
 * Cross-query counters, injected into whoever finishes a query. One query's
 * outcome is applied in a single synchronous call, so concurrent queries on
 * the event loop never see a half-updated set of counters.
 */
export class UsageStats {
  private totalQueries = 0;
  private hydeUsed = 0;
  private fallbackTriggered = 0;
  private fallbackImproved = 0;

  record(outcome: QueryOutcome): void {
    this.totalQueries += 1;
    if (outcome.hydeUsed) this.hydeUsed += 1;
    if (outcome.fallbackTriggered) this.fallbackTriggered += 1;
    if (outcome.fallbackImproved) this.fallbackImproved += 1;
  }

  snapshot(): UsageSnapshot {
    const total = this.totalQueries;
    return {
      totalQueries: total,
      hydeUsed: this.hydeUsed,
      fallbackTriggered: this.fallbackTriggered,
      fallbackImproved: this.fallbackImproved,
      hydeUsageRate: total > 0 ? this.hydeUsed / total : 0,
      fallbackRate: total > 0 ? this.fallbackTriggered / total : 0,
      improvementRate: this.fallbackTriggered > 0 ? this.fallbackImproved / this.fallbackTriggered : 0,
    };
  }

  reset(): void {
    this.totalQueries = 0;
    this.hydeUsed = 0;
    this.fallbackTriggered = 0;
    this.fallbackImproved = 0;
  }
}
