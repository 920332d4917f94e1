#!/usr/bin/env npx tsx
/**
 * SQL Debug Script - inspect each pipeline stage
 *
 * Loads a layer stack from a configuration directory, then prints the
 * requested stage for a metrics request.
 *
 * Usage:
 *   npx tsx scripts/sql-debug.ts <config-dir> <platform> <metric,metric,...> [options]
 *   npx tsx scripts/sql-debug.ts --plan tests/fixtures/config-repo desktop days_of_use,active_hours
 *   npx tsx scripts/sql-debug.ts --all tests/fixtures/config-repo desktop days_of_use --experiment onboarding-test
 *
 * Output Modes:
 *   --config    Show the merged configuration
 *   --validate  Show merge and validation errors
 *   --joins     Show the composition plan of every block
 *   --plan      Show the query plan
 *   --sql       Show the generated SQL (default)
 *   --all       Show all stages
 *
 * Options:
 *   --app <slug>               app layer
 *   --experiment <slug>        experiment layer and experiment.slug
 *   --group-by <name=expr>     grouping dimension (repeatable)
 *   --where <predicate>        predicate for every block
 *   --dataset <name>           value for {dataset}
 *   --start-date <YYYY-MM-DD>  experiment start date
 *   --enrollment-period <days> experiment enrollment period
 *   --segments                 compile the names as segments instead of metrics
 */

import {
  createMetricCompiler,
  printCompositionPlan,
  printConfiguration,
  printQueryPlan,
  type CompileResult,
  type ExperimentContext,
  type MetricCompiler,
} from '../packages/index.js';

const MODES = ['config', 'validate', 'joins', 'plan', 'sql', 'all'] as const;
type OutputMode = (typeof MODES)[number];

function isMode(value: string): value is OutputMode {
  return MODES.some(mode => mode === value);
}

interface DebugArgs {
  mode: OutputMode;
  root: string;
  platform: string;
  names: string[];
  app?: string;
  experiment?: string;
  groupBy: Record<string, string>;
  where?: string;
  dataset?: string;
  startDate?: string;
  enrollmentPeriod?: number;
  segments: boolean;
}

// ============================================================
// CLI Parsing
// ============================================================

function fail(message: string): never {
  console.error(`Error: ${message}`);
  printUsage();
  process.exit(1);
}

function parseArgs(): DebugArgs {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    printUsage();
    process.exit(1);
  }

  let mode: OutputMode = 'sql';
  const requested = args[0].substring(2);
  if (args[0].startsWith('--') && isMode(requested)) {
    mode = requested;
    args.shift();
  }

  const positional: string[] = [];
  const parsed: Omit<DebugArgs, 'mode' | 'root' | 'platform' | 'names'> = { groupBy: {}, segments: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    if (arg === '--segments') {
      parsed.segments = true;
      continue;
    }

    const value = args[++i];
    if (value === undefined) fail(`${arg} requires a value`);

    switch (arg) {
      case '--app':
        parsed.app = value;
        break;
      case '--experiment':
        parsed.experiment = value;
        break;
      case '--group-by': {
        const eq = value.indexOf('=');
        if (eq <= 0) fail(`--group-by expects name=expression, got '${value}'`);
        parsed.groupBy[value.slice(0, eq)] = value.slice(eq + 1);
        break;
      }
      case '--where':
        parsed.where = value;
        break;
      case '--dataset':
        parsed.dataset = value;
        break;
      case '--start-date':
        parsed.startDate = value;
        break;
      case '--enrollment-period': {
        const days = Number.parseInt(value, 10);
        if (Number.isNaN(days)) fail(`--enrollment-period expects a number of days, got '${value}'`);
        parsed.enrollmentPeriod = days;
        break;
      }
      default:
        fail(`Unknown option: ${arg}`);
    }
  }

  const [root, platform, names] = positional;
  if (!root || !platform || !names) {
    fail('config directory, platform and names are required');
  }

  return {
    ...parsed,
    mode,
    root,
    platform,
    names: names.split(',').filter(name => name.length > 0),
  };
}

function printUsage() {
  console.log(`
SQL Debug Script - inspect each pipeline stage

Usage:
  npx tsx scripts/sql-debug.ts [--mode] <config-dir> <platform> <metric,metric,...> [options]

Modes:
  --config    Show the merged configuration
  --validate  Show merge and validation errors
  --joins     Show the composition plan of every block
  --plan      Show the query plan
  --sql       Show the generated SQL (default)
  --all       Show all stages

Options:
  --app <slug>  --experiment <slug>  --group-by <name=expr>  --where <predicate>
  --dataset <name>  --start-date <YYYY-MM-DD>  --enrollment-period <days>  --segments

Examples:
  npx tsx scripts/sql-debug.ts tests/fixtures/config-repo desktop days_of_use
  npx tsx scripts/sql-debug.ts --all tests/fixtures/config-repo desktop days_of_use,active_hours --group-by os=normalized_os
`);
}

// ============================================================
// Output Formatters
// ============================================================

function printValidation(compiler: MetricCompiler) {
  console.log('=== Configuration Errors ===');
  if (compiler.errors.length === 0) {
    console.log('(none)');
  }
  for (const error of compiler.errors) {
    console.log(`${error.kind}: ${error.message}`);
  }
}

function printJoins(result: CompileResult) {
  console.log('=== Composition Plans ===');
  for (const block of result.plan.blocks) {
    console.log(printCompositionPlan(block.composition));
  }
}

function printPlan(result: CompileResult) {
  console.log('=== QueryPlan ===');
  console.log(printQueryPlan(result.plan));
  for (const entity of result.excluded) {
    console.log(`excluded ${entity.section}.${entity.slug} (${entity.kind}): ${entity.reason}`);
  }
  for (const warning of result.warnings) {
    console.log(`warning: ${warning}`);
  }
}

function printSql(result: CompileResult) {
  console.log('=== SQL ===');
  console.log(result.sql ?? '(nothing to compute)');
}

// ============================================================
// Main
// ============================================================

async function main() {
  const args = parseArgs();

  console.log(`Config: ${args.root} (${args.platform}${args.app ? `/${args.app}` : ''})`);
  console.log(`Mode: ${args.mode}\n`);

  try {
    const compiler = await createMetricCompiler(args.root, {
      platform: args.platform,
      app: args.app,
      experiment: args.experiment,
    });

    const context: ExperimentContext | undefined = args.experiment
      ? {
          slug: args.experiment,
          startDate: args.startDate,
          enrollmentPeriod: args.enrollmentPeriod,
          appName: args.app ?? args.platform,
        }
      : undefined;

    const options = { groupBy: args.groupBy, where: args.where, dataset: args.dataset };
    const result = args.segments
      ? compiler.compileSegments({ ...options, segments: args.names }, context)
      : compiler.compile({ ...options, metrics: args.names }, context);

    switch (args.mode) {
      case 'config':
        console.log(printConfiguration(compiler.config));
        break;

      case 'validate':
        printValidation(compiler);
        break;

      case 'joins':
        printJoins(result);
        break;

      case 'plan':
        printPlan(result);
        break;

      case 'sql':
        printSql(result);
        break;

      case 'all':
        console.log(printConfiguration(compiler.config));
        console.log('\n');
        printValidation(compiler);
        console.log('\n');
        printJoins(result);
        console.log('\n');
        printPlan(result);
        console.log('\n');
        printSql(result);
        break;
    }
  } catch (error) {
    console.error('ERROR:', error);
    if (error instanceof Error && error.stack) {
      console.error('\nStack trace:');
      console.error(error.stack.split('\n').slice(1, 8).join('\n'));
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
