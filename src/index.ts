#!/usr/bin/env node

/**
 * CLI entry point for the archiver
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { runTargets, type TargetResult } from './core/runner';
import { HistoryStore } from './core/historyStore';
import { loadInteractionTable } from './config/interactions';
import { launchPlaywrightRenderer, rendererOptionsFromEnv } from './render/playwrightRenderer';
import { errorMessage } from './utils/errors';
import { logger, setVerbose } from './utils/logger';

// Load environment variables
dotenv.config();

const runOptionsSchema = z.object({
  config: z.array(z.string()).nonempty(),
  debug: z.boolean().optional(),
});

const historyOptionsSchema = z.object({
  limit: z.coerce.number().int().positive(),
});

const program = new Command();

program
  .name('portal-archiver')
  .description('Archive every page reachable from a portal as PDF, once per URL')
  .version('1.0.0');

program
  .command('run')
  .description('Crawl the portals described by one or more YAML config files')
  .requiredOption('-c, --config <paths...>', 'Target config file(s), processed in order')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (rawOptions: unknown) => {
    try {
      const options = runOptionsSchema.parse(rawOptions);
      const results = await run(options.config, Boolean(options.debug));
      if (results.some((result) => result.status !== 'completed')) {
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Archiver failed');
      process.exitCode = 1;
    }
  });

program
  .command('history')
  .description('Show what a history file has recorded')
  .argument('<path>', 'History JSON file')
  .option('-n, --limit <number>', 'Most recent entries to list', '10')
  .action(async (historyPath: string, rawOptions: unknown) => {
    try {
      const options = historyOptionsSchema.parse(rawOptions);
      await showHistory(historyPath, options.limit);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Cannot read history');
      process.exitCode = 1;
    }
  });

/**
 * Crawl every target, one browser per target
 */
async function run(configPaths: string[], debug: boolean): Promise<TargetResult[]> {
  setVerbose(debug);

  const interactions = await loadInteractionTable();
  const rendererOptions = rendererOptionsFromEnv();

  const results = await runTargets(configPaths, {
    interactions,
    debug,
    createRenderer: () => launchPlaywrightRenderer(rendererOptions),
  });

  displaySummary(results);
  return results;
}

async function showHistory(historyPath: string, limit: number): Promise<void> {
  const history = new HistoryStore(historyPath);
  await history.load();

  console.log(`\n${history.size.toLocaleString()} URLs recorded in ${historyPath}\n`);
  for (const record of history.entries().slice(0, limit)) {
    console.log(`  ${record.savedAt.toISOString()}  ${record.url}`);
    console.log(`      -> ${record.filename}`);
  }
  console.log('');
}

/**
 * Display run summary
 */
function displaySummary(results: TargetResult[]) {
  console.log('\n' + '='.repeat(60));
  console.log('Archive Run Complete');
  console.log('='.repeat(60));

  for (const result of results) {
    console.log(`\n${result.configPath}`);
    if (result.status !== 'completed') {
      console.log(`  ${result.status}: ${result.error}`);
      continue;
    }

    const { stats } = result;
    const durationSec = Math.round((stats.durationMs ?? 0) / 1000);
    console.log(`  Run ID:             ${result.runId}`);
    console.log(`  Links discovered:   ${stats.linksDiscovered.toLocaleString()}`);
    console.log(`  Pages archived:     ${stats.pagesArchived.toLocaleString()}`);
    console.log(`  Unrecorded:         ${stats.pagesUnrecorded.toLocaleString()}`);
    console.log(`  Robots disallowed:  ${stats.pagesDisallowed.toLocaleString()}`);
    console.log(`  Failed:             ${stats.pagesFailed.toLocaleString()}`);
    console.log(`  Reveal attempts:    ${stats.revealAttempts.toLocaleString()}`);
    console.log(`  Duration:           ${Math.floor(durationSec / 60)}m ${durationSec % 60}s`);
  }

  console.log('\n' + '='.repeat(60) + '\n');
}

// Parse CLI arguments
program.parseAsync().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Fatal error');
  process.exit(1);
});
