import { PerformanceMode } from '../services/crawler/interfaces/types';

/**
 * Concurrency and pacing fixed for the whole run by the performance mode
 */
export interface PerformanceSettings {
  workerCount: number;
  connectionCount: number;
  rateLimitDelayMs: number;
  requestTimeoutMs: number;
}

export const PERFORMANCE_PRESETS: Readonly<Record<PerformanceMode, PerformanceSettings>> = {
  [PerformanceMode.CONSERVATIVE]: {
    workerCount: 10,
    connectionCount: 1,
    rateLimitDelayMs: 1000,
    requestTimeoutMs: 30000
  },
  [PerformanceMode.BALANCED]: {
    workerCount: 20,
    connectionCount: 2,
    rateLimitDelayMs: 500,
    requestTimeoutMs: 30000
  },
  [PerformanceMode.AGGRESSIVE]: {
    workerCount: 50,
    connectionCount: 6,
    rateLimitDelayMs: 200,
    requestTimeoutMs: 20000
  },
  [PerformanceMode.MAXIMUM]: {
    workerCount: 100,
    connectionCount: 16,
    rateLimitDelayMs: 100,
    requestTimeoutMs: 15000
  }
};

/**
 * Resolve the settings for a mode, with individual values overridden where given
 */
export function getPerformanceSettings(
  mode: PerformanceMode,
  overrides: Partial<PerformanceSettings> = {}
): PerformanceSettings {
  const preset = PERFORMANCE_PRESETS[mode];
  return {
    workerCount: overrides.workerCount ?? preset.workerCount,
    connectionCount: overrides.connectionCount ?? preset.connectionCount,
    rateLimitDelayMs: overrides.rateLimitDelayMs ?? preset.rateLimitDelayMs,
    requestTimeoutMs: overrides.requestTimeoutMs ?? preset.requestTimeoutMs
  };
}
