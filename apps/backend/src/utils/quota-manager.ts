/**
 * API Quota Manager
 *
 * Tracks Quandl API usage against daily and hourly limits and warns when
 * usage approaches them. Counters live in process memory; Node runs the
 * increment synchronously, so check-and-reserve happens in one step.
 */

/**
 * Quota configuration
 */
export interface QuotaConfig {
  dailyLimit: number;
  hourlyLimit: number;
  alertThreshold: number;
}

/**
 * Quota state for the current UTC day/hour
 */
export interface QuotaState {
  date: string;
  dailyCalls: number;
  currentHour: number;
  hourlyCalls: number;
  lastUpdated: string;
}

/**
 * Result of reserving capacity for one upstream call
 */
export interface RecordCallResult {
  allowed: boolean;
  dailyRemaining: number;
  hourlyRemaining: number;
  shouldAlert: boolean;
  dailyCalls: number;
  hourlyCalls: number;
}

/**
 * Default quota configuration
 * Based on Quandl's authenticated-user limits
 */
const DEFAULT_CONFIG: QuotaConfig = {
  dailyLimit: 50000,
  hourlyLimit: 5000,
  alertThreshold: 0.8, // 80%
};

/**
 * Thrown when a call would exceed the configured quota
 */
export class QuotaExceededError extends Error {
  code = 'QUOTA_EXCEEDED';
  dailyCalls: number;
  hourlyCalls: number;

  constructor(dailyCalls: number, hourlyCalls: number) {
    super(
      `API rate limit reached: ${dailyCalls} calls today, ${hourlyCalls} this hour`,
    );
    this.name = 'QuotaExceededError';
    this.dailyCalls = dailyCalls;
    this.hourlyCalls = hourlyCalls;
  }
}

/**
 * Quota Manager class
 */
export class QuotaManager {
  private config: QuotaConfig;
  private state: QuotaState | null = null;

  constructor(config: Partial<QuotaConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Roll the counters over when the UTC day or hour changes
   */
  private ensureState(): QuotaState {
    const now = new Date();
    const today = now.toISOString().slice(0, 10);
    const currentHour = now.getUTCHours();

    if (!this.state || this.state.date !== today) {
      this.state = {
        date: today,
        dailyCalls: 0,
        currentHour,
        hourlyCalls: 0,
        lastUpdated: now.toISOString(),
      };
    } else if (this.state.currentHour !== currentHour) {
      this.state = {
        ...this.state,
        currentHour,
        hourlyCalls: 0,
        lastUpdated: now.toISOString(),
      };
    }

    return this.state;
  }

  /**
   * Get current quota state
   */
  getState(): QuotaState {
    return { ...this.ensureState() };
  }

  /**
   * Record an API call
   *
   * Counts the call only when it fits within both limits; a refused call
   * leaves the counters untouched.
   */
  recordCall(): RecordCallResult {
    const state = this.ensureState();

    const allowed =
      state.dailyCalls + 1 <= this.config.dailyLimit &&
      state.hourlyCalls + 1 <= this.config.hourlyLimit;

    if (allowed) {
      state.dailyCalls++;
      state.hourlyCalls++;
      state.lastUpdated = new Date().toISOString();
    }

    const dailyRemaining = this.config.dailyLimit - state.dailyCalls;
    const hourlyRemaining = this.config.hourlyLimit - state.hourlyCalls;
    const dailyPercentage = state.dailyCalls / this.config.dailyLimit;
    const shouldAlert = dailyPercentage >= this.config.alertThreshold;

    if (!allowed) {
      console.warn(
        `⚠️ [Quota] Limit reached, call refused. Daily: ${state.dailyCalls}/${this.config.dailyLimit}, ` +
          `Hourly: ${state.hourlyCalls}/${this.config.hourlyLimit}`,
      );
    } else if (shouldAlert) {
      console.warn(
        `⚠️ [Quota] Approaching limit! Daily usage: ${(dailyPercentage * 100).toFixed(1)}%`,
      );
    }

    return {
      allowed,
      dailyRemaining: Math.max(0, dailyRemaining),
      hourlyRemaining: Math.max(0, hourlyRemaining),
      shouldAlert,
      dailyCalls: state.dailyCalls,
      hourlyCalls: state.hourlyCalls,
    };
  }

  /**
   * Reserve a call or throw QuotaExceededError
   */
  reserveCall(): RecordCallResult {
    const result = this.recordCall();
    if (!result.allowed) {
      throw new QuotaExceededError(result.dailyCalls, result.hourlyCalls);
    }
    return result;
  }

  /**
   * Get current usage stats
   */
  getStats(): {
    dailyCalls: number;
    dailyLimit: number;
    dailyPercentage: number;
    hourlyCalls: number;
    hourlyLimit: number;
    hourlyPercentage: number;
  } {
    const state = this.ensureState();

    return {
      dailyCalls: state.dailyCalls,
      dailyLimit: this.config.dailyLimit,
      dailyPercentage: (state.dailyCalls / this.config.dailyLimit) * 100,
      hourlyCalls: state.hourlyCalls,
      hourlyLimit: this.config.hourlyLimit,
      hourlyPercentage: (state.hourlyCalls / this.config.hourlyLimit) * 100,
    };
  }
}

/**
 * Create a quota manager instance
 */
export const createQuotaManager = (config?: Partial<QuotaConfig>): QuotaManager => {
  return new QuotaManager(config);
};
