#!/usr/bin/env node
/**
 * Backtest CLI
 * Runs a DSL strategy against OHLCV bars from a CSV file
 *
 *   npm run backtest -- <dsl-file-or-content> <bars.csv> [initial-capital]
 *   npm run backtest -- --nl "<natural language rules>" <bars.csv> [initial-capital]
 */

import * as fs from 'fs';
import { StrategyPipeline, PipelineResult } from '../pipeline/StrategyPipeline';
import { ChatCompletionTranslator } from '../translate/StrategyTranslator';
import { loadBarsCsv } from '../data/csv';
import { formatResults } from '../backtest/report';
import { StrategyError, describeError } from '../compiler/errors';
import { configureLogging, loadConfig, loadEnvFile } from '../config';
import { LoggerFactory } from '../logging/logger';

function usage(): number {
  console.error('Usage: npm run backtest -- <dsl-file-or-content> <bars.csv> [initial-capital]');
  console.error('       npm run backtest -- --nl "<rules>" <bars.csv> [initial-capital]');
  return 1;
}

function printStages(result: PipelineResult): void {
  if (result.json) {
    console.log('=== JSON ===');
    console.log(JSON.stringify(result.json, null, 2));
    console.log('');
  }
  console.log('=== DSL ===');
  console.log(result.dsl);
  console.log('');
  console.log(`Indicators: ${result.indicators.join(', ') || '(none)'}`);
  console.log(`Bars: ${result.backtest.barsProcessed}`);
  console.log('');
  console.log(formatResults(result.backtest));
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const naturalLanguage = args[0] === '--nl';
  const [source, csvPath, capitalArg] = naturalLanguage ? args.slice(1) : args;

  if (!source || !csvPath) {
    return usage();
  }

  loadEnvFile();
  const config = loadConfig();
  configureLogging(config);
  const logger = LoggerFactory.getLogger('BacktestCli');

  const initialCapital = capitalArg === undefined ? config.initialCapital : Number(capitalArg);

  try {
    const bars = loadBarsCsv(csvPath);

    let result: PipelineResult;
    if (naturalLanguage) {
      const pipeline = new StrategyPipeline({
        initialCapital,
        translator: new ChatCompletionTranslator(config.translator),
      });
      result = await pipeline.run(source, bars);
    } else {
      const dsl = fs.existsSync(source) ? fs.readFileSync(source, 'utf-8') : source;
      result = new StrategyPipeline({ initialCapital }).runFromDsl(dsl, bars);
    }

    printStages(result);
    return 0;
  } catch (error) {
    logger.error('Backtest failed', error);
    console.error(
      error instanceof StrategyError ? `${error.code}: ${error.message}` : describeError(error)
    );
    return 1;
  } finally {
    LoggerFactory.closeAll();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(describeError(error));
    process.exit(1);
  });
