import { ReconnectConfig } from '../../config/configuration';

export const DEFAULT_RECONNECT: Readonly<ReconnectConfig> = {
  initialDelayMs: 5000,
  maxDelayMs: 60000,
  multiplier: 2,
};

/**
 * Capped exponential backoff: initial * multiplier^attempt, never above max.
 */
export class ReconnectPolicy {
  private readonly config: ReconnectConfig;

  constructor(config: Partial<ReconnectConfig> = {}) {
    this.config = { ...DEFAULT_RECONNECT, ...config };
  }

  delayFor(attempt: number): number {
    const { initialDelayMs, maxDelayMs, multiplier } = this.config;
    const delay = initialDelayMs * Math.pow(Math.max(multiplier, 1), Math.max(attempt, 0));
    return Math.round(Math.min(delay, maxDelayMs));
  }
}
