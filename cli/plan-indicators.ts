#!/usr/bin/env tsx
/**
 * Inspect an indicator plan
 * Parses specifiers (or a YAML indicator set) and prints the execution order
 * without touching any data
 */

import * as fs from 'fs';
import { IndicatorCompiler, CompiledIndicatorSet } from '../compiler/compile';
import { describePlan } from '../compiler/planner';
import { isIndicatorError } from '../spec/errors';
import { LoggerFactory } from '../logging/logger';

const logger = LoggerFactory.getLogger('cli');

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error('Usage: npm run plan -- <indicator-set.yaml | specifier...>');
    console.error('');
    console.error('Examples:');
    console.error('  npm run plan -- ./indicator-sets/momentum.yaml');
    console.error('  npm run plan -- sma_20 stochk_14 stochd_14_3');
    process.exit(1);
  }

  const compiler = new IndicatorCompiler();

  try {
    let compiled: CompiledIndicatorSet;
    if (args.length === 1 && fs.existsSync(args[0])) {
      console.log(`Reading indicator set from file: ${args[0]}\n`);
      compiled = compiler.compileFromYAML(fs.readFileSync(args[0], 'utf-8'));
    } else {
      compiled = compiler.compile(args);
    }

    if (compiled.name) console.log(`Indicator set: ${compiled.name}`);
    console.log('=== Plan (* = requested) ===');
    console.log(describePlan(compiled.plan));
    console.log('\n=== Summary ===');
    console.log(`Nodes: ${compiled.plan.nodes.length}`);
    console.log(`Output columns: ${compiled.columns.join(', ')}`);
    console.log(`Required base columns: ${compiled.requiredColumns.join(', ') || '-'}`);
    LoggerFactory.closeAll();
    process.exit(0);
  } catch (error) {
    if (isIndicatorError(error)) {
      logger.error('Plan failed', error, { code: error.code, specifier: error.specifier });
      console.error(`${error.code}: ${error.message}`);
    } else {
      logger.error('Plan failed', error);
      console.error(error instanceof Error ? error.stack ?? error.message : String(error));
    }
    process.exit(1);
  }
}

main();
