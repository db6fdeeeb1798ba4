/**
 * Rolling-window numeric kernels
 *
 * Every kernel returns a series as long as its input. A window that holds a
 * missing value produces a missing output, and recursive kernels restart after
 * a gap. Standard deviation is the population form (divide by the window).
 */
import { Sample, Series } from '../spec/types';

// ============================================================================
// Helpers
// ============================================================================

export function isPresent(value: Sample | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function missingSeries(length: number): Sample[] {
  return new Array<Sample>(length).fill(null);
}

/**
 * Number of leading missing positions
 */
export function leadingMissing(series: Series): number {
  let count = 0;
  while (count < series.length && !isPresent(series[count])) {
    count++;
  }
  return count;
}

function assertWindow(window: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Window must be a positive integer, got ${window}`);
  }
}

interface DefinedRun {
  start: number;
  values: number[];
}

/**
 * Split a series into maximal runs of consecutive present values
 */
function definedRuns(series: Series): DefinedRun[] {
  const runs: DefinedRun[] = [];
  let current: DefinedRun | null = null;

  for (let i = 0; i < series.length; i++) {
    const value = series[i];
    if (isPresent(value)) {
      if (!current) {
        current = { start: i, values: [] };
        runs.push(current);
      }
      current.values.push(value);
    } else {
      current = null;
    }
  }

  return runs;
}

/**
 * Apply a windowed transform to every run long enough to fill a window.
 * The transform returns one value per full window, first window first.
 */
function overDefinedRuns(
  series: Series,
  window: number,
  transform: (values: number[]) => number[]
): Sample[] {
  const out = missingSeries(series.length);

  for (const run of definedRuns(series)) {
    if (run.values.length < window) continue;

    const result = transform(run.values);
    const expected = run.values.length - window + 1;
    if (result.length !== expected) {
      throw new Error(`Kernel produced ${result.length} values for ${expected} windows`);
    }

    for (let j = 0; j < result.length; j++) {
      const value = result[j];
      out[run.start + window - 1 + j] = Number.isFinite(value) ? value : null;
    }
  }

  return out;
}

/**
 * Element-wise combination of two aligned series; missing when either side is
 * missing or the result is not finite
 */
export function zipWith(
  left: Series,
  right: Series,
  combine: (a: number, b: number) => number
): Sample[] {
  if (left.length !== right.length) {
    throw new RangeError(`Series length mismatch: ${left.length} vs ${right.length}`);
  }

  return left.map((a, i) => {
    const b = right[i];
    if (!isPresent(a) || !isPresent(b)) return null;
    const value = combine(a, b);
    return Number.isFinite(value) ? value : null;
  });
}

export function mapPresent(series: Series, transform: (value: number, index: number) => number): Sample[] {
  return series.map((value, i) => {
    if (!isPresent(value)) return null;
    const result = transform(value, i);
    return Number.isFinite(result) ? result : null;
  });
}

// ============================================================================
// Moving averages
// ============================================================================

/**
 * Simple moving average, summed afresh for each window
 */
export function sma(series: Series, window: number): Sample[] {
  assertWindow(window);
  return overDefinedRuns(series, window, (values) => {
    const result: number[] = [];
    for (let start = 0; start + window <= values.length; start++) {
      result.push(mean(values, start, window));
    }
    return result;
  });
}

/**
 * Exponential moving average with alpha = 2 / (window + 1), seeded by the
 * simple average of the first full window
 */
export function ema(series: Series, window: number): Sample[] {
  assertWindow(window);
  const alpha = 2 / (window + 1);

  return overDefinedRuns(series, window, (values) => {
    let current = mean(values, 0, window);
    const result = [current];
    for (let i = window; i < values.length; i++) {
      current = (values[i] - current) * alpha + current;
      result.push(current);
    }
    return result;
  });
}

/**
 * Wilder smoothing: seeded by the simple average of the first full window,
 * then prev * (window - 1) / window + value / window
 */
export function wilderSmooth(series: Series, window: number): Sample[] {
  assertWindow(window);

  return overDefinedRuns(series, window, (values) => {
    let current = mean(values, 0, window);
    const result = [current];
    for (let i = window; i < values.length; i++) {
      current = (current * (window - 1) + values[i]) / window;
      result.push(current);
    }
    return result;
  });
}

function mean(values: number[], start: number, count: number): number {
  let sum = 0;
  for (let i = start; i < start + count; i++) {
    sum += values[i];
  }
  return sum / count;
}

// ============================================================================
// Rolling extrema
// ============================================================================

/**
 * Monotonic-queue sliding extremum; `dominates(a, b)` is true when a should
 * evict b from the back of the queue
 */
function rollingExtreme(
  values: number[],
  window: number,
  dominates: (a: number, b: number) => boolean
): number[] {
  const result: number[] = [];
  const queue: number[] = [];
  let head = 0;

  for (let i = 0; i < values.length; i++) {
    while (queue.length > head && dominates(values[i], values[queue[queue.length - 1]])) {
      queue.pop();
    }
    queue.push(i);

    if (queue[head] <= i - window) {
      head++;
    }

    if (i >= window - 1) {
      result.push(values[queue[head]]);
    }
  }

  return result;
}

export function rollingMax(series: Series, window: number): Sample[] {
  assertWindow(window);
  return overDefinedRuns(series, window, (values) => rollingExtreme(values, window, (a, b) => a >= b));
}

export function rollingMin(series: Series, window: number): Sample[] {
  assertWindow(window);
  return overDefinedRuns(series, window, (values) => rollingExtreme(values, window, (a, b) => a <= b));
}

// ============================================================================
// Dispersion
// ============================================================================

/**
 * Population standard deviation over the trailing window, computed in two
 * passes per window on deviations from the window's first value
 */
export function rollingStd(series: Series, window: number): Sample[] {
  assertWindow(window);

  return overDefinedRuns(series, window, (values) => {
    const result: number[] = [];
    for (let start = 0; start + window <= values.length; start++) {
      const shift = values[start];
      let sum = 0;
      for (let i = start; i < start + window; i++) {
        sum += values[i] - shift;
      }
      const offset = sum / window;

      let squares = 0;
      for (let i = start; i < start + window; i++) {
        const deviation = values[i] - shift - offset;
        squares += deviation * deviation;
      }
      result.push(Math.sqrt(squares / window));
    }
    return result;
  });
}

// ============================================================================
// Price-range kernels
// ============================================================================

/**
 * max(high - low, |high - prev close|, |low - prev close|); missing at row 0
 */
export function trueRange(high: Series, low: Series, close: Series): Sample[] {
  if (high.length !== low.length || high.length !== close.length) {
    throw new RangeError('high, low and close must have the same length');
  }

  const out = missingSeries(high.length);
  for (let i = 1; i < high.length; i++) {
    const h = high[i];
    const l = low[i];
    const prevClose = close[i - 1];
    if (!isPresent(h) || !isPresent(l) || !isPresent(prevClose)) continue;
    out[i] = Math.max(h - l, Math.abs(h - prevClose), Math.abs(l - prevClose));
  }
  return out;
}

/**
 * 100 * (close - lowest) / (highest - lowest); a zero range is missing
 */
export function percentOfRange(close: Series, highest: Series, lowest: Series): Sample[] {
  if (close.length !== highest.length || close.length !== lowest.length) {
    throw new RangeError('close, highest and lowest must have the same length');
  }

  return close.map((c, i) => {
    const hh = highest[i];
    const ll = lowest[i];
    if (!isPresent(c) || !isPresent(hh) || !isPresent(ll)) return null;
    const range = hh - ll;
    if (range === 0) return null;
    return (100 * (c - ll)) / range;
  });
}

export function stochasticK(high: Series, low: Series, close: Series, window: number): Sample[] {
  return percentOfRange(close, rollingMax(high, window), rollingMin(low, window));
}

// ============================================================================
// Momentum and trend
// ============================================================================

export function diff(series: Series, lag = 1): Sample[] {
  assertWindow(lag);
  return series.map((value, i) => {
    if (i < lag) return null;
    const previous = series[i - lag];
    if (!isPresent(value) || !isPresent(previous)) return null;
    return value - previous;
  });
}

/**
 * Relative strength index from Wilder-smoothed gains and losses
 */
export function rsi(close: Series, window: number): Sample[] {
  const changes = diff(close);
  const avgGain = wilderSmooth(mapPresent(changes, (change) => Math.max(change, 0)), window);
  const avgLoss = wilderSmooth(mapPresent(changes, (change) => Math.max(-change, 0)), window);

  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (!isPresent(gain) || !isPresent(loss)) return null;
    if (loss === 0) return gain === 0 ? 50 : 100;
    return 100 - 100 / (1 + gain / loss);
  });
}

/**
 * Least-squares slope against row position over the trailing window
 */
export function linearRegressionSlope(series: Series, window: number): Sample[] {
  assertWindow(window);
  if (window < 2) {
    throw new RangeError(`Regression window must be at least 2, got ${window}`);
  }

  const xMean = (window - 1) / 2;
  let xVariance = 0;
  for (let x = 0; x < window; x++) {
    xVariance += (x - xMean) * (x - xMean);
  }

  return overDefinedRuns(series, window, (values) => {
    const result: number[] = [];
    for (let end = window - 1; end < values.length; end++) {
      const start = end - window + 1;
      const yMean = mean(values, start, window);
      let covariance = 0;
      for (let x = 0; x < window; x++) {
        covariance += (x - xMean) * (values[start + x] - yMean);
      }
      result.push(covariance / xVariance);
    }
    return result;
  });
}
