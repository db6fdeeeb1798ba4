/**
 * Technical indicator compute functions
 *
 * Each function reads base columns and shared sub-dependency results from the
 * compute context and returns its named outputs. Window math lives in
 * ./kernels; shared rolling extrema and averages arrive as dependencies.
 */
import { IndicatorComputeContext, IndicatorOutputs } from '../spec/types';
import {
  ema,
  linearRegressionSlope,
  percentOfRange,
  rollingMax,
  rollingMin,
  rollingStd,
  rsi,
  sma,
  trueRange,
  wilderSmooth,
  zipWith,
} from './kernels';

// ============================================================================
// Single-column windows
// ============================================================================

export function computeSMA(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: sma(ctx.input('close'), ctx.params[0]) };
}

export function computeEMA(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: ema(ctx.input('close'), ctx.params[0]) };
}

export function computeHighest(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: rollingMax(ctx.input('high'), ctx.params[0]) };
}

export function computeLowest(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: rollingMin(ctx.input('low'), ctx.params[0]) };
}

export function computeStdDev(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: rollingStd(ctx.input('close'), ctx.params[0]) };
}

export function computeRSI(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: rsi(ctx.input('close'), ctx.params[0]) };
}

export function computeTrend(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: linearRegressionSlope(ctx.input('close'), ctx.params[0]) };
}

// ============================================================================
// True range family
// ============================================================================

export function computeTrueRange(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: trueRange(ctx.input('high'), ctx.input('low'), ctx.input('close')) };
}

// Dependencies: [tr]
export function computeATR(ctx: IndicatorComputeContext): IndicatorOutputs {
  return { value: wilderSmooth(ctx.dependency(0), ctx.params[0]) };
}

// ============================================================================
// Range oscillators
// ============================================================================

// Dependencies: [highest_p, lowest_p]
export function computeStochasticK(ctx: IndicatorComputeContext): IndicatorOutputs {
  return {
    value: percentOfRange(ctx.input('close'), ctx.dependency(0), ctx.dependency(1)),
  };
}

// Dependencies: [stochk_p]
export function computeStochasticD(ctx: IndicatorComputeContext): IndicatorOutputs {
  const [, smooth] = ctx.params;
  return { value: sma(ctx.dependency(0), smooth) };
}

/**
 * Low / high price ratio over the window
 * Dependencies: [lowest_p, highest_p]
 */
export function computeHighLowRatio(ctx: IndicatorComputeContext): IndicatorOutputs {
  return {
    value: zipWith(ctx.dependency(0), ctx.dependency(1), (low, high) =>
      high === 0 ? Number.NaN : low / high
    ),
  };
}

// ============================================================================
// Bands and convergence
// ============================================================================

// Dependencies: [sma_p, std_p]
export function computeBollingerBands(ctx: IndicatorComputeContext): IndicatorOutputs {
  const [, multiplier] = ctx.params;
  const middle = ctx.dependency(0);
  const deviation = ctx.dependency(1);

  return {
    upper: zipWith(middle, deviation, (m, sd) => m + multiplier * sd),
    middle,
    lower: zipWith(middle, deviation, (m, sd) => m - multiplier * sd),
  };
}

// Dependencies: [ema_fast, ema_slow]
export function computeMACD(ctx: IndicatorComputeContext): IndicatorOutputs {
  const [, , signalPeriod] = ctx.params;
  const line = zipWith(ctx.dependency(0), ctx.dependency(1), (fast, slow) => fast - slow);
  const signal = ema(line, signalPeriod);

  return {
    macd: line,
    signal,
    hist: zipWith(line, signal, (m, s) => m - s),
  };
}
