// Statistics types

export interface RateEstimate {
  rate: number;
  ci_lower: number;
  ci_upper: number;
}

export interface GroupStat extends RateEstimate {
  sessions: number;
  conversions: number;
}

export interface GroupCounts {
  conversions: number;
  sessions: number;
}

export interface SignificanceResult {
  z_statistic: number;
  p_value: number;
  is_significant: boolean;
}

export interface LiftInterval {
  lower: number;
  upper: number;
  method: 'fixed_band';
}
