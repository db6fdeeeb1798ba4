import * as fs from 'fs';
import * as path from 'path';
import {
  InvalidIndicatorSetError,
  InvalidParameterError,
  MissingColumnError,
} from '../spec/errors';
import { IndicatorCompiler } from './compile';

describe('IndicatorCompiler', () => {
  const compiler = new IndicatorCompiler();

  describe('compileFromYAML', () => {
    it('should compile an indicator set', () => {
      const compiled = compiler.compileFromYAML(
        ['name: bands', 'indicators:', '  - bbands_10', '  - atr_5'].join('\n')
      );

      expect(compiled.name).toBe('bands');
      expect(compiled.columns).toEqual([
        'bbands_10_2_upper',
        'bbands_10_2_middle',
        'bbands_10_2_lower',
        'atr_5',
      ]);
      expect(compiled.requiredColumns).toEqual(['close', 'high', 'low']);
      expect(compiled.plan.nodes.map((node) => node.key)).toEqual([
        'sma_10',
        'std_10',
        'bbands_10_2',
        'tr',
        'atr_5',
      ]);
    });

    it('should compile the bundled momentum set', () => {
      const source = fs.readFileSync(
        path.join(__dirname, '..', 'indicator-sets', 'momentum.yaml'),
        'utf-8'
      );
      const compiled = compiler.compileFromYAML(source);

      expect(compiled.name).toBe('momentum');
      expect(compiled.columns).toEqual([
        'sma_20',
        'ema_50',
        'stochk_14',
        'stochd_14_3',
        'hilo_14',
        'macd_12_26_9_macd',
        'macd_12_26_9_signal',
        'macd_12_26_9_hist',
        'rsi_14',
      ]);
      expect(compiled.requiredColumns).toEqual(['close', 'high', 'low']);
    });

    it('should reject text that is not YAML', () => {
      expect(() => compiler.compileFromYAML('indicators: [sma_3')).toThrow(InvalidIndicatorSetError);
      expect(() => compiler.compileFromYAML('indicators: [sma_3')).toThrow(
        'Indicator set is not valid YAML'
      );
    });
  });

  describe('compileFromDSL', () => {
    it('should reject a set without indicators', () => {
      expect(() => compiler.compileFromDSL({ name: 'empty' })).toThrow(InvalidIndicatorSetError);
      expect(() => compiler.compileFromDSL({ indicators: [] })).toThrow(InvalidIndicatorSetError);
    });

    it('should name the invalid field', () => {
      expect(() => compiler.compileFromDSL({ indicators: ['sma_3', 7] })).toThrow(
        'Invalid indicator set: indicators.1:'
      );
    });

    it('should surface specifier errors unchanged', () => {
      expect(() => compiler.compileFromDSL({ indicators: ['sma_0'] })).toThrow(InvalidParameterError);
    });
  });

  describe('validateColumns', () => {
    it('should accept a table with every required column', () => {
      const compiled = compiler.compile(['stochk_5']);
      expect(() =>
        compiler.validateColumns(compiled, new Set(['high', 'low', 'close', 'volume']))
      ).not.toThrow();
    });

    it('should reject a table without a required column', () => {
      const compiled = compiler.compile(['stochk_5']);
      expect(() => compiler.validateColumns(compiled, new Set(['close']))).toThrow(MissingColumnError);
    });
  });
});
