#!/usr/bin/env node
/**
 * Sprig interpreter CLI entry point.
 *
 * Usage: sprig <file.sprig>
 *        sprig run <file.sprig>
 *        sprig check <file.sprig> [...]
 *        sprig ast <file.sprig>
 *        sprig repl
 *        sprig --eval "<code>"
 *
 * Any command accepts `--max-depth <n>`; SPRIG_MAX_CALL_DEPTH sets the
 * same option from the environment.
 */

import * as fs from 'fs';
import * as path from 'path';
import { nodeToString } from './ast';
import { InterpreterOptionsInput, optionsFromEnv, resolveOptions } from './config';
import { SprigError } from './errors';
import { Interpreter } from './interpreter';
import { formatParseError, parseSource } from './parser';
import { startRepl } from './repl';
import { valueToString } from './values';

function main(): void {
  const { args, options } = extractOptions(process.argv.slice(2));

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    process.exit(0);
  }

  if (args[0] === 'check') {
    const files = args.slice(1);
    if (files.length === 0) {
      console.error('Error: check requires at least one file argument');
      process.exit(1);
    }
    process.exit(runCheck(files));
  }

  if (args[0] === 'ast') {
    if (args.length < 2) {
      console.error('Error: ast requires a file argument');
      process.exit(1);
    }
    process.exit(printAst(args[1]));
  }

  if (args[0] === 'repl') {
    startRepl(options);
    return; // REPL runs its own event loop
  }

  let source: string;
  let filename: string;

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) {
      console.error('Error: --eval requires a code argument');
      process.exit(1);
    }
    source = args[1];
    filename = '<eval>';
  } else if (args[0] === 'run' && args.length >= 2) {
    filename = args[1];
    source = readFile(filename);
  } else {
    filename = args[0];
    source = readFile(filename);
  }

  const result = parseSource(source);
  if (result.hasErrors) {
    console.error(`Parse errors in ${filename}:`);
    for (const err of result.errors) {
      console.error(`  ${formatParseError(err)}`);
    }
    process.exit(1);
  }

  const interpreter = new Interpreter(options);
  const value = interpreter.run(result.program);
  if (value.kind === 'error') {
    console.error(valueToString(value));
    process.exit(1);
  }
  console.log(valueToString(value));
}

/**
 * Pull `--max-depth <n>` out of the argument list and merge it over the
 * environment's settings. The merged options are validated here so a bad
 * value is reported before anything runs.
 */
function extractOptions(argv: string[]): { args: string[]; options: InterpreterOptionsInput } {
  const options: InterpreterOptionsInput = { ...optionsFromEnv(process.env) };
  const args: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--max-depth') {
      options.maxCallDepth = Number(argv[++i]);
    } else {
      args.push(argv[i]);
    }
  }

  resolveOptions(options);
  return { args, options };
}

/**
 * Parse one or more files without running them.
 * Returns 0 if all files are clean, 1 if any have errors.
 */
function runCheck(files: string[]): number {
  let hasAnyErrors = false;

  for (const filepath of files) {
    const resolved = path.resolve(filepath);
    if (!fs.existsSync(resolved)) {
      console.error(`Error: File not found: ${resolved}`);
      hasAnyErrors = true;
      continue;
    }

    const result = parseSource(fs.readFileSync(resolved, 'utf-8'));

    if (result.hasErrors) {
      hasAnyErrors = true;
      const count = result.errors.length;
      console.log(`✗ ${filepath} — ${count} parse error${count === 1 ? '' : 's'}`);
      for (const err of result.errors) {
        console.log(`  ${formatParseError(err)}`);
      }
    } else {
      console.log(`✓ ${filepath} — no errors`);
    }
  }

  return hasAnyErrors ? 1 : 0;
}

function printAst(filepath: string): number {
  const result = parseSource(readFile(filepath));
  for (const err of result.errors) {
    console.error(`  ${formatParseError(err)}`);
  }
  if (result.hasErrors) return 1;
  for (const statement of result.program.statements) {
    console.log(nodeToString(statement));
  }
  return 0;
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    process.exit(1);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log('Sprig v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  sprig <file.sprig>                 Run a Sprig file');
  console.log('  sprig run <file.sprig>             Run a Sprig file');
  console.log('  sprig check <file.sprig> [...]     Check files for parse errors');
  console.log('  sprig ast <file.sprig>             Print the parsed program, fully parenthesised');
  console.log('  sprig repl                         Start interactive REPL');
  console.log('  sprig --eval "<code>"              Evaluate inline code');
  console.log('  sprig --help                       Show this help');
  console.log('');
  console.log('Options:');
  console.log('  --max-depth <n>                    Maximum nested call depth (default 300)');
}

try {
  main();
} catch (e) {
  if (e instanceof SprigError) {
    console.error(e.message);
    process.exit(1);
  }
  throw e;
}
