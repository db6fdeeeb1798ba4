/**
 * Compiler: indicator set → execution plan
 * Orchestrates validation, specifier parsing and dependency planning
 */
import YAML from 'yaml';
import { IndicatorSetSchema, formatZodIssues } from '../spec/schema';
import { ExecutionPlan } from '../spec/types';
import { InvalidIndicatorSetError } from '../spec/errors';
import { IndicatorRegistry, getDefaultRegistry } from '../features/registry';
import { Logger, LoggerFactory } from '../logging/logger';
import { parseSpecifier } from './specifier';
import { buildPlan, checkRequiredColumns, requiredColumns } from './planner';

export interface CompiledIndicatorSet {
  name?: string;
  plan: ExecutionPlan;
  /** Output column names in request order */
  columns: string[];
  /** Base columns the source table must provide */
  requiredColumns: string[];
}

// ============================================================================
// Compiler
// ============================================================================

export class IndicatorCompiler {
  constructor(
    private registry: IndicatorRegistry = getDefaultRegistry(),
    private logger: Logger = LoggerFactory.getLogger('IndicatorCompiler')
  ) {}

  /**
   * Compile from YAML string
   */
  compileFromYAML(yamlSource: string): CompiledIndicatorSet {
    let parsed: unknown;
    try {
      parsed = YAML.parse(yamlSource);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new InvalidIndicatorSetError(`Indicator set is not valid YAML: ${reason}`);
    }
    return this.compileFromDSL(parsed);
  }

  /**
   * Compile from a parsed indicator-set object
   */
  compileFromDSL(input: unknown): CompiledIndicatorSet {
    const result = IndicatorSetSchema.safeParse(input);
    if (!result.success) {
      throw new InvalidIndicatorSetError(
        `Invalid indicator set: ${formatZodIssues(result.error)}`,
        result.error.issues
      );
    }
    return this.compile(result.data.indicators, result.data.name);
  }

  compile(specifiers: readonly string[], name?: string): CompiledIndicatorSet {
    const parsed = specifiers.map((text) => parseSpecifier(text, this.registry));
    const plan = buildPlan(parsed, this.registry);
    const columns = plan.requested.flatMap((request) => request.columns.map((column) => column.name));

    this.logger.debug('Indicator set compiled', {
      name,
      nodes: plan.nodes.length,
      columns: columns.length,
    });

    return { name, plan, columns, requiredColumns: requiredColumns(plan) };
  }

  /**
   * Check that a table offering `available` columns can run the compiled set
   */
  validateColumns(compiled: CompiledIndicatorSet, available: ReadonlySet<string>): void {
    checkRequiredColumns(compiled.plan, available);
  }
}
