export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = values.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation (n - 1). 0 for fewer than two values. */
export function sampleStddev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const ss = values.reduce((s, v) => s + (v - m) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}

export interface LinearFit {
  slope: number;
  intercept: number;
  /** Standard error of the residuals, sqrt(SSR / (n - 2)) */
  residualStddev: number;
  predict(x: number): number;
}

/**
 * Ordinary least squares fit of y on x.
 * When every x is identical the slope is 0 and the intercept is mean(y).
 */
export function linearFit(xs: readonly number[], ys: readonly number[]): LinearFit {
  const n = Math.min(xs.length, ys.length);
  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    sxx += (xs[i] - mx) ** 2;
    sxy += (xs[i] - mx) * (ys[i] - my);
  }

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = my - slope * mx;

  let ssr = 0;
  for (let i = 0; i < n; i++) {
    ssr += (ys[i] - (intercept + slope * xs[i])) ** 2;
  }
  const dof = n - 2;
  const residualStddev = dof > 0 ? Math.sqrt(ssr / dof) : 0;

  return {
    slope,
    intercept,
    residualStddev,
    predict: (x: number) => intercept + slope * x,
  };
}
