#!/usr/bin/env node
/**
 * Test Strategy Compiler
 * Parses and validates DSL text without running it, then prints the AST
 * and the indicator plan
 */

import * as fs from 'fs';
import { StrategyCompiler } from '../compiler/compile';
import { StrategyError, describeError } from '../compiler/errors';
import { configureLogging, loadConfig, loadEnvFile } from '../config';

function main(): number {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error('Usage: npm run test:compile -- <dsl-file-or-content>');
    console.error('');
    console.error('Examples:');
    console.error('  npm run test:compile -- ./strategies/breakout.dsl');
    console.error('  npm run test:compile -- "ENTRY: close > sma(close, 20) EXIT: rsi(close, 14) < 30"');
    return 1;
  }

  loadEnvFile();
  configureLogging(loadConfig());

  const input = args[0];
  let dsl: string;

  // Input is either a file path or raw DSL text
  if (fs.existsSync(input)) {
    console.log(`📄 Reading strategy from file: ${input}\n`);
    dsl = fs.readFileSync(input, 'utf-8');
  } else {
    console.log(`📝 Parsing inline DSL\n`);
    dsl = input;
  }

  console.log('=== DSL ===');
  console.log(dsl);
  console.log('\n=== Compilation ===\n');

  try {
    const compiled = new StrategyCompiler().compile(dsl);

    console.log('✅ Compilation successful!\n');
    console.log('=== AST ===');
    console.log(JSON.stringify(compiled.strategy, null, 2));
    console.log('\n=== Summary ===');
    console.log(`Entry: ${compiled.strategy.entry.type}`);
    console.log(`Exit: ${compiled.strategy.exit.type}`);
    console.log(`Indicators: ${compiled.indicators.join(', ') || '(none)'}`);
    return 0;
  } catch (error) {
    console.error('❌ Compilation failed!\n');
    if (error instanceof StrategyError) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      console.error('Error:', describeError(error));
      if (error instanceof Error && error.stack) {
        console.error('\nStack trace:');
        console.error(error.stack);
      }
    }
    return 1;
  }
}

process.exit(main());
