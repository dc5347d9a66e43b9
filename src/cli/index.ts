#!/usr/bin/env node
/**
 * vendorscore CLI
 *
 * Commands:
 * - vendorscore rank          — Rank vendors with risk flags and a summary
 * - vendorscore vendor <id>   — Detail for one vendor
 * - vendorscore weights       — Show current scoring weights
 * - vendorscore weights:set   — Update and persist scoring weights
 * - vendorscore recompute     — Recompute every vendor score
 * - vendorscore snapshot      — Append score snapshots for every scored vendor
 * - vendorscore import <file> — Import vendor and part records from JSON
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { createVendorStore } from '../db/index';
import { createScoringEngine } from '../scoring/engine';
import { handleVendorScoringTool, VERSION } from '../scoring/index';
import type { ToolResult } from '../scoring/index';
import { loadConfig, saveWeights } from '../utils/config';
import { ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  process.exitCode = 1;
});

interface GlobalOptions {
  config?: string;
}

async function runTool(toolName: string, input: unknown = {}): Promise<ToolResult> {
  const { config: configPath } = program.opts<GlobalOptions>();
  const config = await loadConfig(configPath);
  const store = await createVendorStore({ path: config.database.path, autoSave: config.database.autoSave });
  try {
    const engine = createScoringEngine({ config });
    const result = handleVendorScoringTool({ store, engine }, toolName, input);

    if (result.success && toolName === 'update_weights') {
      saveWeights(engine.weights.get(), configPath);
    }
    return result;
  } finally {
    store.close();
  }
}

function print(result: ToolResult): void {
  if (result.success) {
    console.log(JSON.stringify(result.data, null, 2));
  } else {
    console.error(`Error: ${result.error ?? 'unknown error'}`);
    process.exitCode = 1;
  }
}

function parseNumber(label: string): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ValidationError(`${label} must be a number (got ${value})`);
    }
    return parsed;
  };
}

program
  .name('vendorscore')
  .description('Vendor comparison scoring and risk flagging')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file (default: ~/.vendorscore/vendorscore.json)');

// ============================================================================
// rank
// ============================================================================
program
  .command('rank')
  .description('Rank vendors by final score or a single pillar')
  .option('-s, --sort <key>', 'final_score | total_cost | total_time | reliability | capacity')
  .option('--component <name>', 'Component name substring')
  .option('--region <code>', 'Vendor region code')
  .option('--mode <mode>', 'Air | Ocean | Ground (any case)')
  .option('-l, --limit <n>', 'Max vendors returned', parseNumber('limit'))
  .action(async (options: { sort?: string; component?: string; region?: string; mode?: string; limit?: number }) => {
    print(await runTool('rank_vendors', options));
  });

// ============================================================================
// vendor <id>
// ============================================================================
program
  .command('vendor <id>')
  .description('Scores, parts, risk flags and history for one vendor')
  .option('--history <n>', 'Snapshots to show', parseNumber('history'))
  .action(async (id: string, options: { history?: number }) => {
    print(await runTool('vendor_detail', { vendor_id: id, history_limit: options.history }));
  });

// ============================================================================
// weights
// ============================================================================
program
  .command('weights')
  .description('Show current scoring weights')
  .action(async () => {
    print(await runTool('get_weights'));
  });

program
  .command('weights:set')
  .description('Update scoring weights and save them to the config file')
  .option('--cost <w>', 'Total cost weight', parseNumber('cost'))
  .option('--time <w>', 'Total time weight', parseNumber('time'))
  .option('--reliability <w>', 'Reliability weight', parseNumber('reliability'))
  .option('--capacity <w>', 'Capacity weight', parseNumber('capacity'))
  .option('--normalize', 'Rescale the weights to sum to 1')
  .action(async (options: { cost?: number; time?: number; reliability?: number; capacity?: number; normalize?: boolean }) => {
    print(
      await runTool('update_weights', {
        weights: {
          total_cost: options.cost,
          total_time: options.time,
          reliability: options.reliability,
          capacity: options.capacity,
        },
        normalize: options.normalize ?? false,
      }),
    );
  });

// ============================================================================
// recompute / snapshot
// ============================================================================
program
  .command('recompute')
  .description('Recompute every vendor score with the current weights')
  .action(async () => {
    print(await runTool('recompute_scores'));
  });

program
  .command('snapshot')
  .description('Append one score snapshot per scored vendor')
  .action(async () => {
    print(await runTool('save_snapshots'));
  });

// ============================================================================
// import <file>
// ============================================================================
program
  .command('import <file>')
  .description('Import vendors and parts from a JSON file ({ "vendors": [...], "parts": [...] })')
  .action(async (file: string) => {
    let records: unknown;
    try {
      records = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (err) {
      print({ success: false, error: `Cannot read ${file}: ${errorMessage(err)}` });
      return;
    }
    print(await runTool('import_records', records));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
