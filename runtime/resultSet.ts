/**
 * Per-call store of computed indicator outputs, keyed by canonical specifier.
 * Each key is written once and read-only afterwards.
 */
import { IndicatorOutputs, Series } from '../spec/types';
import { PlanInvariantError } from '../spec/errors';

export class ResultSet {
  private results: Map<string, IndicatorOutputs> = new Map();

  set(key: string, outputs: IndicatorOutputs): void {
    if (this.results.has(key)) {
      throw new PlanInvariantError(`Result for "${key}" was already written`, key);
    }
    const frozen = Object.entries(outputs).map(([name, series]) => [name, Object.freeze([...series])]);
    this.results.set(key, Object.freeze(Object.fromEntries(frozen)));
  }

  has(key: string): boolean {
    return this.results.has(key);
  }

  get(key: string): IndicatorOutputs {
    const outputs = this.results.get(key);
    if (!outputs) {
      throw new PlanInvariantError(`No result for "${key}"; it was not computed before use`, key);
    }
    return outputs;
  }

  series(key: string, output: string): Series {
    const series = this.get(key)[output];
    if (!series) {
      throw new PlanInvariantError(`"${key}" has no output named "${output}"`, key);
    }
    return series;
  }

  keys(): string[] {
    return Array.from(this.results.keys());
  }

  get size(): number {
    return this.results.size;
  }
}
