import {
  diff,
  ema,
  leadingMissing,
  linearRegressionSlope,
  percentOfRange,
  rollingMax,
  rollingMin,
  rollingStd,
  rsi,
  sma,
  stochasticK,
  trueRange,
  wilderSmooth,
  zipWith,
} from './kernels';

const ramp = (count: number, start = 1) => Array.from({ length: count }, (_, i) => start + i);

// ============================================================================
// Moving Averages
// ============================================================================

describe('sma', () => {
  it('should leave the first window - 1 positions missing', () => {
    expect(sma(ramp(10), 3)).toEqual([null, null, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('should return the input for a window of 1', () => {
    expect(sma([4, 8, 15], 1)).toEqual([4, 8, 15]);
  });

  it('should be all missing when the series is shorter than the window', () => {
    expect(sma([1, 2], 3)).toEqual([null, null]);
  });

  it('should not average across a missing value', () => {
    expect(sma([1, 2, null, 4, 5, 6], 2)).toEqual([null, 1.5, null, null, 4.5, 5.5]);
  });

  it('should not carry a large value into later windows', () => {
    expect(sma([1e16, 1, 1, 1], 2)).toEqual([null, 5e15, 1, 1]);
    expect(sma([1e9, 1.1, 1.2, 1.3], 2)[2]).toBeCloseTo(1.15, 12);
  });

  it('should treat NaN as missing', () => {
    expect(sma([1, Number.NaN, 3, 5], 2)).toEqual([null, null, null, 4]);
  });

  it('should reject a non-positive window', () => {
    expect(() => sma([1, 2, 3], 0)).toThrow(RangeError);
    expect(() => sma([1, 2, 3], 2.5)).toThrow(RangeError);
  });
});

describe('ema', () => {
  it('should seed with the simple average of the first window', () => {
    // alpha = 2 / (3 + 1) = 0.5; seed = (1 + 2 + 3) / 3 = 2
    expect(ema([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it('should stay flat on a constant series', () => {
    expect(ema([5, 5, 5, 5], 3)).toEqual([null, null, 5, 5]);
  });

  it('should stay at zero on a zero series', () => {
    expect(ema([0, 0, 0, 0], 2)).toEqual([null, 0, 0, 0]);
  });

  it('should re-seed after a gap', () => {
    expect(ema([1, 2, 3, 4, null, 10, 20, 30, 40], 3)).toEqual([
      null, null, 2, 3, null, null, null, 20, 30,
    ]);
  });
});

describe('wilderSmooth', () => {
  it('should blend the previous average with weight (window - 1) / window', () => {
    // seed = (2 + 4) / 2 = 3; then (3 * 1 + 6) / 2 = 4.5
    expect(wilderSmooth([2, 4, 6], 2)).toEqual([null, 3, 4.5]);
  });
});

// ============================================================================
// Rolling Extrema
// ============================================================================

describe('rollingMax / rollingMin', () => {
  const values = [3, 1, 4, 1, 5, 9, 2, 6];

  it('should track the trailing maximum', () => {
    expect(rollingMax(values, 3)).toEqual([null, null, 4, 4, 5, 9, 9, 9]);
  });

  it('should track the trailing minimum', () => {
    expect(rollingMin(values, 3)).toEqual([null, null, 1, 1, 1, 1, 2, 2]);
  });

  it('should drop an extreme once it leaves the window', () => {
    expect(rollingMax([5, 4, 3, 2, 1], 2)).toEqual([null, 5, 4, 3, 2]);
    expect(rollingMin([1, 2, 3, 4, 5], 2)).toEqual([null, 1, 2, 3, 4]);
  });

  it('should handle series that are entirely negative', () => {
    expect(rollingMax([-5, -3, -4, -8], 2)).toEqual([null, -3, -3, -4]);
    expect(rollingMin([-5, -3, -4, -8], 2)).toEqual([null, -5, -4, -8]);
  });
});

// ============================================================================
// Dispersion
// ============================================================================

describe('rollingStd', () => {
  it('should compute the population standard deviation', () => {
    const result = rollingStd([2, 4, 4, 4, 5, 5, 7, 9], 8);
    expect(result.slice(0, 7)).toEqual([null, null, null, null, null, null, null]);
    expect(result[7]).toBeCloseTo(2, 10);
  });

  it('should slide the window', () => {
    expect(rollingStd([1, 2, 3, 4], 2)).toEqual([null, 0.5, 0.5, 0.5]);
  });

  it('should be exactly zero on a constant window', () => {
    expect(rollingStd([3, 3, 3, 3], 2)).toEqual([null, 0, 0, 0]);
  });

  it('should return to exactly zero once a spike leaves the window', () => {
    const result = rollingStd([1, 100, 5, 5, 5, 5], 3);

    expect(result[2]).toBeCloseTo(Math.sqrt(56526 / 27), 10);
    expect(result.slice(4)).toEqual([0, 0]);
  });
});

// ============================================================================
// Price-Range Kernels
// ============================================================================

describe('trueRange', () => {
  it('should be missing at the first row', () => {
    expect(trueRange([10, 12, 11], [8, 9, 7], [9, 11, 8])).toEqual([null, 3, 4]);
  });

  it('should use the gap to the previous close when it is larger', () => {
    expect(trueRange([10, 12, 11], [8, 9, 10], [9, 15, 10])).toEqual([null, 3, 5]);
  });

  it('should reject misaligned inputs', () => {
    expect(() => trueRange([1, 2], [1], [1, 2])).toThrow(RangeError);
  });
});

describe('stochasticK', () => {
  it('should place close within the rolling range', () => {
    const high = [5, 6, 7, 8];
    const low = [1, 2, 3, 4];
    const close = [3, 4, 5, 6];
    expect(stochasticK(high, low, close, 2)).toEqual([null, 60, 60, 60]);
  });

  it('should be missing where the range is zero', () => {
    const high = [10, 10, 12, 12];
    const low = [10, 10, 8, 8];
    const close = [10, 10, 10, 11];
    // row 1: high == low over the window; rows 2-3: range 12 - 8 = 4
    expect(stochasticK(high, low, close, 2)).toEqual([null, null, 50, 75]);
  });

  it('should be all missing for a constant series', () => {
    const flat = Array.from({ length: 6 }, () => 10);
    expect(stochasticK(flat, flat, flat, 3)).toEqual([null, null, null, null, null, null]);
  });
});

describe('percentOfRange', () => {
  it('should propagate missing extrema', () => {
    expect(percentOfRange([5, 5], [null, 10], [null, 0])).toEqual([null, 50]);
  });
});

// ============================================================================
// Momentum and Trend
// ============================================================================

describe('diff', () => {
  it('should subtract the previous value', () => {
    expect(diff([1, 3, 6, null, 10])).toEqual([null, 2, 3, null, null]);
  });
});

describe('rsi', () => {
  it('should be 100 when every change is a gain', () => {
    expect(rsi([1, 2, 3, 4, 5], 2)).toEqual([null, null, 100, 100, 100]);
  });

  it('should be 50 on a flat series', () => {
    expect(rsi([7, 7, 7, 7], 2)).toEqual([null, null, 50, 50]);
  });

  it('should weigh smoothed gains against smoothed losses', () => {
    // gains [1, 0, 1] -> 0.5, 0.75; losses [0, 1, 0] -> 0.5, 0.25
    expect(rsi([1, 2, 1, 2], 2)).toEqual([null, null, 50, 75]);
  });
});

describe('linearRegressionSlope', () => {
  it('should recover a constant rate of change', () => {
    const close = Array.from({ length: 20 }, (_, i) => i * 1.02);
    const result = linearRegressionSlope(close, 14);

    expect(leadingMissing(result)).toBe(13);
    for (const value of result.slice(13)) {
      expect(value).toBeCloseTo(1.02, 10);
    }
  });

  it('should reject a window below 2', () => {
    expect(() => linearRegressionSlope([1, 2, 3], 1)).toThrow(RangeError);
  });
});

// ============================================================================
// Helpers
// ============================================================================

describe('zipWith', () => {
  it('should be missing where the combination is not finite', () => {
    expect(zipWith([1, 2, null], [0, 4, 1], (a, b) => a / b)).toEqual([null, 0.5, null]);
  });

  it('should reject series of different lengths', () => {
    expect(() => zipWith([1], [1, 2], (a, b) => a + b)).toThrow(RangeError);
  });
});

describe('leadingMissing', () => {
  it('should count missing values before the first present one', () => {
    expect(leadingMissing([null, null, 1, null])).toBe(2);
    expect(leadingMissing([null, null])).toBe(2);
    expect(leadingMissing([])).toBe(0);
  });
});
