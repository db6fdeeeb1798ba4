/**
 * Indicator registry and the standard catalogue
 */
import { IndicatorDescriptor, ParamSpec, Specifier } from '../spec/types';
import { DescriptorShapeSchema, formatZodIssues } from '../spec/schema';
import {
  DuplicateKindError,
  InvalidDescriptorError,
  RegistryFrozenError,
  UnknownKindError,
} from '../spec/errors';
import { loadConfig } from '../config/config';
import {
  computeATR,
  computeBollingerBands,
  computeEMA,
  computeHighest,
  computeHighLowRatio,
  computeLowest,
  computeMACD,
  computeRSI,
  computeSMA,
  computeStdDev,
  computeStochasticD,
  computeStochasticK,
  computeTrend,
  computeTrueRange,
} from './indicators';

// ============================================================================
// Indicator Registry
// ============================================================================

export class IndicatorRegistry {
  private descriptors: Map<string, IndicatorDescriptor> = new Map();
  private frozen = false;

  register(descriptor: IndicatorDescriptor): void {
    const kind = descriptor.kind.toLowerCase();
    if (this.frozen) {
      throw new RegistryFrozenError(kind);
    }

    const shape = DescriptorShapeSchema.safeParse(descriptor);
    if (!shape.success) {
      throw new InvalidDescriptorError(descriptor.kind, formatZodIssues(shape.error));
    }
    if (new Set(descriptor.outputs).size !== descriptor.outputs.length) {
      throw new InvalidDescriptorError(kind, 'output names must be unique');
    }
    if (this.descriptors.has(kind)) {
      throw new DuplicateKindError(kind);
    }

    this.descriptors.set(kind, descriptor);
  }

  lookup(kind: string, specifier?: string): IndicatorDescriptor {
    const descriptor = this.descriptors.get(kind.toLowerCase());
    if (!descriptor) {
      throw new UnknownKindError(kind, specifier, this.kinds());
    }
    return descriptor;
  }

  has(kind: string): boolean {
    return this.descriptors.has(kind.toLowerCase());
  }

  /**
   * Registered kinds, sorted
   */
  kinds(): string[] {
    return Array.from(this.descriptors.keys()).sort();
  }

  /**
   * Stop accepting registrations; the registry is read-only from here on
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }
}

// ============================================================================
// Standard Registry with Common Indicators
// ============================================================================

const spec = (kind: string, ...params: number[]): Specifier => ({ kind, params });

export function createStandardRegistry(maxWindow: number = loadConfig().maxWindow): IndicatorRegistry {
  const registry = new IndicatorRegistry();

  const window = (name: string, fallback: number, min = 1): ParamSpec => ({
    name,
    type: 'integer',
    default: fallback,
    min,
    max: maxWindow,
  });

  const windowMinusOne = (params: readonly number[]) => params[0] - 1;

  // SMA (Simple Moving Average of close)
  registry.register({
    kind: 'sma',
    description: 'Simple moving average of close',
    params: [window('period', 14)],
    requiredInputs: ['close'],
    outputs: ['value'],
    warmup: windowMinusOne,
    compute: computeSMA,
  });

  // EMA (Exponential Moving Average of close)
  registry.register({
    kind: 'ema',
    description: 'Exponential moving average of close, seeded by the first SMA',
    params: [window('period', 14)],
    requiredInputs: ['close'],
    outputs: ['value'],
    warmup: windowMinusOne,
    compute: computeEMA,
  });

  // Rolling high / low extrema, shared by stochastics and hilo
  registry.register({
    kind: 'highest',
    description: 'Rolling maximum of high',
    params: [window('period', 14)],
    requiredInputs: ['high'],
    outputs: ['value'],
    warmup: windowMinusOne,
    compute: computeHighest,
  });

  registry.register({
    kind: 'lowest',
    description: 'Rolling minimum of low',
    params: [window('period', 14)],
    requiredInputs: ['low'],
    outputs: ['value'],
    warmup: windowMinusOne,
    compute: computeLowest,
  });

  // Population standard deviation of close
  registry.register({
    kind: 'std',
    description: 'Rolling population standard deviation of close',
    params: [window('period', 20)],
    requiredInputs: ['close'],
    outputs: ['value'],
    warmup: windowMinusOne,
    compute: computeStdDev,
  });

  // True range and its Wilder average
  registry.register({
    kind: 'tr',
    description: 'True range',
    params: [],
    requiredInputs: ['high', 'low', 'close'],
    outputs: ['value'],
    warmup: () => 1,
    compute: computeTrueRange,
  });

  registry.register({
    kind: 'atr',
    description: 'Average true range (Wilder smoothing)',
    params: [window('period', 14)],
    requiredInputs: [],
    outputs: ['value'],
    dependencies: () => [spec('tr')],
    warmup: (params) => params[0],
    compute: computeATR,
  });

  // Stochastic oscillator
  registry.register({
    kind: 'stochk',
    description: 'Stochastic %K',
    params: [window('period', 14)],
    requiredInputs: ['close'],
    outputs: ['value'],
    dependencies: (params) => [spec('highest', params[0]), spec('lowest', params[0])],
    warmup: windowMinusOne,
    compute: computeStochasticK,
  });

  registry.register({
    kind: 'stochd',
    description: 'Stochastic %D (SMA of %K)',
    params: [window('period', 14), window('smooth', 3)],
    requiredInputs: [],
    outputs: ['value'],
    dependencies: (params) => [spec('stochk', params[0])],
    warmup: (params) => params[0] + params[1] - 2,
    compute: computeStochasticD,
  });

  // High / low price ratio
  registry.register({
    kind: 'hilo',
    description: 'Rolling low / rolling high ratio',
    params: [window('period', 14)],
    requiredInputs: [],
    outputs: ['value'],
    dependencies: (params) => [spec('lowest', params[0]), spec('highest', params[0])],
    warmup: windowMinusOne,
    compute: computeHighLowRatio,
  });

  // Bollinger Bands
  registry.register({
    kind: 'bbands',
    description: 'Bollinger Bands around the SMA of close',
    params: [
      window('period', 20),
      { name: 'mult', type: 'number', default: 2, min: 0 },
    ],
    requiredInputs: [],
    outputs: ['upper', 'middle', 'lower'],
    dependencies: (params) => [spec('sma', params[0]), spec('std', params[0])],
    validate: (params) => (params[1] > 0 ? null : 'mult must be greater than 0'),
    warmup: windowMinusOne,
    compute: computeBollingerBands,
  });

  // MACD - line, signal and histogram
  registry.register({
    kind: 'macd',
    description: 'Moving average convergence divergence',
    params: [window('fast', 12), window('slow', 26, 2), window('signal', 9)],
    requiredInputs: [],
    outputs: ['macd', 'signal', 'hist'],
    dependencies: (params) => [spec('ema', params[0]), spec('ema', params[1])],
    validate: ([fast, slow]) => (fast < slow ? null : `fast (${fast}) must be less than slow (${slow})`),
    // the signal EMA starts once the line has a full window of its own
    warmup: ([, slow, signal], output) => (output === 'macd' ? slow - 1 : slow + signal - 2),
    compute: computeMACD,
  });

  // RSI (Relative Strength Index)
  registry.register({
    kind: 'rsi',
    description: 'Relative strength index (Wilder smoothing)',
    params: [window('period', 14)],
    requiredInputs: ['close'],
    outputs: ['value'],
    warmup: (params) => params[0],
    compute: computeRSI,
  });

  // Linear regression slope of close
  registry.register({
    kind: 'trend',
    description: 'Least-squares slope of close per row',
    params: [window('period', 14, 2)],
    requiredInputs: ['close'],
    outputs: ['value'],
    warmup: windowMinusOne,
    compute: computeTrend,
  });

  return registry;
}

let defaultRegistry: IndicatorRegistry | null = null;

/**
 * Standard catalogue, built once per process and frozen
 */
export function getDefaultRegistry(): IndicatorRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createStandardRegistry().freeze();
  }
  return defaultRegistry;
}
