export interface LinearFit {
  slope: number;
  intercept: number;
  /** Coefficient of determination; 0 for a constant dependent variable */
  r2: number;
  predicted: number[];
}

/**
 * Ordinary least squares for y ≈ slope·x + intercept, using sums centred on
 * the means. Callers guarantee at least two points and equal lengths.
 */
export function fitLine(xs: readonly number[], ys: readonly number[]): LinearFit {
  const n = xs.length;
  const first = ys[0];

  if (ys.every((y) => y === first)) {
    return { slope: 0, intercept: first, r2: 0, predicted: ys.map(() => first) };
  }

  const xMean = xs.reduce((s, v) => s + v, 0) / n;
  const yMean = ys.reduce((s, v) => s + v, 0) / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - xMean;
    sxx += dx * dx;
    sxy += dx * (ys[i] - yMean);
  }

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = yMean - slope * xMean;
  const predicted = xs.map((x) => slope * x + intercept);

  let ssRes = 0;
  let ssTot = 0;
  for (let i = 0; i < n; i++) {
    ssRes += (ys[i] - predicted[i]) ** 2;
    ssTot += (ys[i] - yMean) ** 2;
  }

  const r2 = ssTot === 0 ? 0 : clamp01(1 - ssRes / ssTot);
  return { slope, intercept, r2, predicted };
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
