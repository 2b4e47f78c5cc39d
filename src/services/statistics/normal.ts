// Standard normal helpers backed by jstat

import jStat from 'jstat';

export function standardNormalCdf(x: number): number {
  return jStat.normal.cdf(x, 0, 1);
}

export function standardNormalQuantile(p: number): number {
  return jStat.normal.inv(p, 0, 1);
}

// Two-sided critical value, e.g. 1.959964 for 0.95
export function criticalValue(confidence: number): number {
  const alpha = 1 - confidence;
  return standardNormalQuantile(1 - alpha / 2);
}
