/**
 * Indicator engine
 * Main entry point and public API
 */

// ============================================================================
// Core Types
// ============================================================================
export type {
  Sample,
  Series,
  BaseColumn,
  ColumnSource,
  Specifier,
  ParamSpec,
  ParamType,
  IndicatorDescriptor,
  IndicatorComputeContext,
  IndicatorOutputs,
  PlanNode,
  PlanNodeStatus,
  ExecutionPlan,
  RequestedIndicator,
  OutputColumn,
  ComputedColumns,
} from './spec/types';

// ============================================================================
// Errors & Schemas
// ============================================================================
export {
  IndicatorError,
  MalformedSpecifierError,
  UnknownKindError,
  InvalidParameterError,
  MissingColumnError,
  DuplicateKindError,
  InvalidDescriptorError,
  RegistryFrozenError,
  CyclicDependencyError,
  PlanInvariantError,
  InvalidTableError,
  InvalidIndicatorSetError,
  isIndicatorError,
} from './spec/errors';
export type { IndicatorErrorCode } from './spec/errors';
export { BASE_COLUMNS, IndicatorSetSchema, paramValueSchema } from './spec/schema';
export type { IndicatorSet } from './spec/schema';

// ============================================================================
// Compiler
// ============================================================================
export { parseSpecifier, normalizeSpecifier, formatSpecifier, specifiersEqual, outputColumns } from './compiler/specifier';
export {
  buildPlan,
  assertPlanInvariants,
  checkRequiredColumns,
  requiredColumns,
  describePlan,
  warmupByOutput,
} from './compiler/planner';
export { IndicatorCompiler } from './compiler/compile';
export type { CompiledIndicatorSet } from './compiler/compile';

// ============================================================================
// Features
// ============================================================================
export { IndicatorRegistry, createStandardRegistry, getDefaultRegistry } from './features/registry';
export * as kernels from './features/kernels';

// ============================================================================
// Runtime
// ============================================================================
export { IndicatorEngine, collectColumns } from './runtime/engine';
export type { IndicatorEngineOptions } from './runtime/engine';
export { ResultSet } from './runtime/resultSet';
export { InMemoryTable } from './runtime/table';
export type { TableRow } from './runtime/table';

// ============================================================================
// Logging & Config
// ============================================================================
export { Logger, LoggerFactory } from './logging/logger';
export { loadConfig } from './config/config';
export type { EngineConfig } from './config/config';
