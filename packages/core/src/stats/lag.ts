import type { LagSample, LagSummary } from "../types/index.js";

export const EMPTY_LAG_SUMMARY: LagSummary = Object.freeze({
  min: 0,
  avg: 0,
  max: 0,
  p95: 0,
  samples: 0,
  spikes: 0,
});

/** Nearest-rank percentile of an ascending array */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const rank = Math.ceil((p / 100) * sorted.length);
  const index = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[index] ?? 0;
}

/** Aggregate lag samples; computed on demand, not per sample */
export function summarizeLag(
  samples: readonly LagSample[],
  spikeThreshold: number
): LagSummary {
  if (samples.length === 0) {
    return { ...EMPTY_LAG_SUMMARY };
  }
  const lags = samples.map((sample) => sample.lag).sort((a, b) => a - b);
  const total = lags.reduce((sum, lag) => sum + lag, 0);
  return {
    min: lags[0] ?? 0,
    avg: total / lags.length,
    max: lags[lags.length - 1] ?? 0,
    p95: percentile(lags, 95),
    samples: lags.length,
    spikes: lags.filter((lag) => lag >= spikeThreshold).length,
  };
}
