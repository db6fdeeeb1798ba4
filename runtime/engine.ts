/**
 * Indicator computation engine
 * Runs a plan node by node over a column source and exposes the requested
 * indicators as named output columns
 */
import {
  ColumnSource,
  ComputedColumns,
  ExecutionPlan,
  IndicatorComputeContext,
  IndicatorOutputs,
  PlanNode,
  Series,
  Specifier,
} from '../spec/types';
import { PlanInvariantError, InvalidTableError, isIndicatorError } from '../spec/errors';
import { IndicatorRegistry, getDefaultRegistry } from '../features/registry';
import { parseSpecifier } from '../compiler/specifier';
import { assertPlanInvariants, buildPlan, checkRequiredColumns } from '../compiler/planner';
import { Logger, LoggerFactory } from '../logging/logger';
import { ResultSet } from './resultSet';
import { InMemoryTable } from './table';

export interface IndicatorEngineOptions {
  registry?: IndicatorRegistry;
  logger?: Logger;
}

// ============================================================================
// Runtime Engine
// ============================================================================

export class IndicatorEngine {
  private readonly registry: IndicatorRegistry;
  private readonly logger: Logger;

  constructor(options: IndicatorEngineOptions = {}) {
    this.registry = options.registry ?? getDefaultRegistry();
    this.logger = options.logger ?? LoggerFactory.getLogger('IndicatorEngine');
  }

  parse(text: string): Specifier {
    return parseSpecifier(text, this.registry);
  }

  plan(requests: readonly Specifier[]): ExecutionPlan {
    const plan = buildPlan(requests, this.registry);
    this.logger.debug('Plan built', {
      nodes: plan.nodes.length,
      requested: plan.requested.length,
      order: plan.nodes.map((node) => node.key),
    });
    return plan;
  }

  /**
   * Execute every plan node in order. Required base columns are checked
   * before any node runs.
   */
  execute(plan: ExecutionPlan, table: ColumnSource): ResultSet {
    assertPlanInvariants(plan);
    checkRequiredColumns(plan, table.columnNames());

    const rowCount = table.rowCount();
    const nodesByKey = new Map(plan.nodes.map((node) => [node.key, node]));
    const results = new ResultSet();

    for (const node of plan.nodes) {
      const startedAt = Date.now();
      const ctx = this.buildContext(node, table, rowCount, results, nodesByKey);
      const outputs = node.descriptor.compute(ctx);
      this.checkOutputs(node, outputs, rowCount);

      results.set(node.key, outputs);
      node.status = 'computed';

      this.logger.logIndicator('debug', 'Indicator computed', node.key, {
        durationMs: Date.now() - startedAt,
      });
    }

    return results;
  }

  /**
   * Parse, plan and execute; returns the requested columns in request order
   */
  compute(requested: readonly string[], table: ColumnSource): ComputedColumns {
    const startedAt = Date.now();

    try {
      const specifiers = requested.map((text) => this.parse(text));
      const plan = this.plan(specifiers);
      const results = this.execute(plan, table);
      const columns = collectColumns(plan, results);

      this.logger.info('Indicators computed', {
        columns: Array.from(columns.keys()),
        rows: table.rowCount(),
        nodes: plan.nodes.length,
        durationMs: Date.now() - startedAt,
      });
      return columns;
    } catch (e) {
      if (isIndicatorError(e) && !e.fatal) {
        this.logger.warn('Indicator computation aborted', {
          errorCode: e.code,
          specifier: e.specifier,
          reason: e.message,
        });
      } else {
        this.logger.error('Indicator computation failed', e, { requested });
      }
      throw e;
    }
  }

  /**
   * Compute and merge the requested columns into a new in-memory table
   */
  attach(table: InMemoryTable, requested: readonly string[]): InMemoryTable {
    return table.withColumns(this.compute(requested, table));
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private buildContext(
    node: PlanNode,
    table: ColumnSource,
    rowCount: number,
    results: ResultSet,
    nodesByKey: Map<string, PlanNode>
  ): IndicatorComputeContext {
    return {
      specifier: node.specifier,
      params: node.specifier.params,
      rowCount,
      input: (name: string): Series => {
        if (!node.inputs.includes(name)) {
          throw new PlanInvariantError(`"${node.key}" read undeclared column "${name}"`, node.key);
        }
        const series = table.getColumn(name);
        if (series.length !== rowCount) {
          throw new InvalidTableError(
            `Column "${name}" has ${series.length} rows, table has ${rowCount}`
          );
        }
        return series;
      },
      dependency: (index: number, output?: string): Series => {
        const key = node.dependsOn[index];
        const dependency = key === undefined ? undefined : nodesByKey.get(key);
        if (key === undefined || !dependency) {
          throw new PlanInvariantError(`"${node.key}" has no dependency at index ${index}`, node.key);
        }
        return results.series(key, output ?? dependency.descriptor.outputs[0]);
      },
    };
  }

  private checkOutputs(node: PlanNode, outputs: IndicatorOutputs, rowCount: number): void {
    for (const name of node.descriptor.outputs) {
      const series = outputs[name];
      if (!series) {
        throw new PlanInvariantError(`"${node.key}" did not produce output "${name}"`, node.key);
      }
      if (series.length !== rowCount) {
        throw new PlanInvariantError(
          `"${node.key}" output "${name}" has ${series.length} rows, expected ${rowCount}`,
          node.key
        );
      }
    }
  }
}

/**
 * Map each requested indicator's outputs to its column names, in request order
 */
export function collectColumns(plan: ExecutionPlan, results: ResultSet): ComputedColumns {
  const columns: ComputedColumns = new Map();
  for (const request of plan.requested) {
    for (const column of request.columns) {
      columns.set(column.name, results.series(request.key, column.output));
    }
  }
  return columns;
}
