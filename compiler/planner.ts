/**
 * Dependency planner: expand sub-dependencies depth-first, dedup by
 * canonical specifier and emit nodes in post-order (dependencies first)
 */
import { ExecutionPlan, PlanNode, RequestedIndicator, Specifier } from '../spec/types';
import {
  CyclicDependencyError,
  InvalidDescriptorError,
  MissingColumnError,
  PlanInvariantError,
  isIndicatorError,
} from '../spec/errors';
import { IndicatorRegistry } from '../features/registry';
import { formatSpecifier, normalizeSpecifier, outputColumns } from './specifier';

// ============================================================================
// Planner
// ============================================================================

export function buildPlan(requests: readonly Specifier[], registry: IndicatorRegistry): ExecutionPlan {
  const requested: RequestedIndicator[] = [];
  const requestedKeys = new Set<string>();

  for (const request of requests) {
    const specifier = normalizeSpecifier(request, registry);
    const key = formatSpecifier(specifier);
    if (requestedKeys.has(key)) continue;

    requestedKeys.add(key);
    requested.push({
      key,
      specifier,
      columns: outputColumns(specifier, registry.lookup(specifier.kind, key)),
    });
  }

  const nodes: PlanNode[] = [];
  const placed = new Set<string>();
  const visiting = new Set<string>();
  const path: string[] = [];

  const visit = (specifier: Specifier) => {
    const key = formatSpecifier(specifier);
    if (placed.has(key)) return;
    if (visiting.has(key)) {
      throw new CyclicDependencyError([...path.slice(path.indexOf(key)), key]);
    }

    const descriptor = registry.lookup(specifier.kind, key);
    const dependencies = declaredDependencies(specifier, registry);

    visiting.add(key);
    path.push(key);
    for (const dependency of dependencies) {
      visit(dependency);
    }
    path.pop();
    visiting.delete(key);

    placed.add(key);
    nodes.push({
      key,
      specifier,
      descriptor,
      inputs: [...descriptor.requiredInputs],
      dependsOn: dependencies.map(formatSpecifier),
      requested: requestedKeys.has(key),
      status: 'pending',
    });
  };

  for (const request of requested) {
    visit(request.specifier);
  }

  return { nodes, requested };
}

/**
 * Canonical sub-dependencies of one specifier; a dependency that does not
 * resolve is a registry misconfiguration
 */
function declaredDependencies(specifier: Specifier, registry: IndicatorRegistry): Specifier[] {
  const descriptor = registry.lookup(specifier.kind);
  const declared = descriptor.dependencies?.(specifier.params) ?? [];

  return declared.map((dependency) => {
    try {
      return normalizeSpecifier(dependency, registry);
    } catch (e) {
      if (isIndicatorError(e) && !e.fatal) {
        throw new InvalidDescriptorError(
          descriptor.kind,
          `dependency "${formatSpecifier(dependency)}" does not resolve: ${e.message}`
        );
      }
      throw e;
    }
  });
}

// ============================================================================
// Plan helpers
// ============================================================================

/**
 * Verify that keys are unique and every dependency precedes its dependents
 */
export function assertPlanInvariants(plan: ExecutionPlan): void {
  const seen = new Set<string>();

  for (const node of plan.nodes) {
    if (seen.has(node.key)) {
      throw new PlanInvariantError(`Plan contains "${node.key}" more than once`, node.key);
    }
    for (const dependency of node.dependsOn) {
      if (!seen.has(dependency)) {
        throw new PlanInvariantError(
          `"${node.key}" is planned before its dependency "${dependency}"`,
          node.key
        );
      }
    }
    seen.add(node.key);
  }

  for (const request of plan.requested) {
    if (!seen.has(request.key)) {
      throw new PlanInvariantError(`Requested "${request.key}" has no plan node`, request.key);
    }
  }
}

/**
 * Fail with MissingColumn for the first node input the table does not offer
 */
export function checkRequiredColumns(plan: ExecutionPlan, available: ReadonlySet<string>): void {
  for (const node of plan.nodes) {
    for (const input of node.inputs) {
      if (!available.has(input)) {
        throw new MissingColumnError(input, node.key);
      }
    }
  }
}

/**
 * Base columns the plan reads, in first-use order
 */
export function requiredColumns(plan: ExecutionPlan): string[] {
  const columns: string[] = [];
  for (const node of plan.nodes) {
    for (const input of node.inputs) {
      if (!columns.includes(input)) columns.push(input);
    }
  }
  return columns;
}

/**
 * Leading missing positions of each output of a node, in output order
 */
export function warmupByOutput(node: PlanNode): Record<string, number> {
  return Object.fromEntries(
    node.descriptor.outputs.map((output) => [output, node.descriptor.warmup(node.specifier.params, output)])
  );
}

/**
 * One line per node: order, key, requested marker, dependencies, inputs, warm-up
 */
export function describePlan(plan: ExecutionPlan): string {
  return plan.nodes
    .map((node, i) => {
      const marker = node.requested ? '*' : ' ';
      const deps = node.dependsOn.length > 0 ? node.dependsOn.join(', ') : '-';
      const inputs = node.inputs.length > 0 ? node.inputs.join(', ') : '-';
      const warmups = Object.entries(warmupByOutput(node));
      const warmup =
        warmups.length === 1
          ? String(warmups[0][1])
          : `[${warmups.map(([output, count]) => `${output}=${count}`).join(', ')}]`;
      return `${i + 1}. ${marker} ${node.key}  deps=[${deps}] inputs=[${inputs}] warmup=${warmup}`;
    })
    .join('\n');
}
