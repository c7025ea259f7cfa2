/**
 * Sprig REPL — Interactive read-eval-print loop.
 *
 * Usage: sprig repl
 *
 * Features:
 *   - Persistent global environment across inputs
 *   - Multi-line input (detects unclosed braces/parens)
 *   - Special commands: :help, :quit, :env, :type, :ast, :clear, :reset
 *   - Parse errors are printed and the input is not evaluated
 *   - Prints result of each input (unless it ends in a `let`)
 */

import * as readline from 'readline';
import { nodeToString, Program } from './ast';
import { InterpreterOptionsInput } from './config';
import { Environment } from './environment';
import { SprigError } from './errors';
import { Interpreter } from './interpreter';
import { formatParseError, parseSource } from './parser';
import { SprigValue, typeName, valueToString } from './values';

const VERSION = '0.1.0';

/**
 * Start the Sprig REPL.
 */
export function startRepl(options: InterpreterOptionsInput = {}): void {
  const interpreter = new Interpreter(options);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'sprig> ',
    terminal: true,
  });

  console.log(`Sprig REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  let buffer = '';
  let multiLine = false;

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();

    if (!multiLine && trimmed.startsWith(':')) {
      handleCommand(trimmed, interpreter, rl);
      rl.prompt();
      return;
    }

    buffer += (buffer ? '\n' : '') + line;

    if (hasUnclosedDelimiters(buffer)) {
      multiLine = true;
      process.stdout.write('  ... ');
      return;
    }

    multiLine = false;
    const input = buffer.trim();
    buffer = '';

    if (input === '') {
      rl.prompt();
      return;
    }

    for (const out of evalInput(input, interpreter)) {
      if (out.stream === 'stderr') console.error(out.text);
      else console.log(out.text);
    }

    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    process.exit(0);
  });
}

export interface ReplOutput {
  stream: 'stdout' | 'stderr';
  text: string;
}

/**
 * Parse and evaluate one complete REPL input against the interpreter's
 * global environment, returning the lines to print.
 */
export function evalInput(input: string, interpreter: Interpreter): ReplOutput[] {
  const result = parseSource(input);
  if (result.hasErrors) {
    return result.errors.map((err): ReplOutput => ({ stream: 'stderr', text: `  Parse error ${formatParseError(err)}` }));
  }

  try {
    const value = interpreter.run(result.program);
    return formatResult(value, result.program);
  } catch (e) {
    if (e instanceof SprigError) {
      return [{ stream: 'stderr', text: `  ${e.message}` }];
    }
    throw e;
  }
}

/**
 * Check whether the input has unclosed braces or parentheses.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let braces = 0;
  let parens = 0;

  for (const ch of input) {
    switch (ch) {
      case '{': braces++; break;
      case '}': braces--; break;
      case '(': parens++; break;
      case ')': parens--; break;
    }
  }

  return braces > 0 || parens > 0;
}

/**
 * Handle a REPL special command.
 */
function handleCommand(cmd: string, interpreter: Interpreter, rl: readline.Interface): void {
  const parts = cmd.split(/\s+/);
  const command = parts[0];
  const rest = parts.slice(1).join(' ').trim();

  switch (command) {
    case ':help':
    case ':h':
      console.log('');
      console.log('REPL Commands:');
      console.log('  :help, :h       Show this help message');
      console.log('  :quit, :q       Exit the REPL');
      console.log('  :env            Show the global bindings');
      console.log('  :type <expr>    Show the runtime type of an expression');
      console.log('  :ast <expr>     Show how an expression parses');
      console.log('  :clear          Clear the screen');
      console.log('  :reset          Drop all global bindings');
      console.log('');
      console.log('Tips:');
      console.log('  - Multi-line input: leave braces/parens unclosed');
      console.log('  - The result of each input is printed automatically');
      console.log('  - Bindings persist between inputs');
      console.log('');
      break;

    case ':quit':
    case ':q':
    case ':exit':
      rl.close();
      break;

    case ':env':
      for (const line of formatEnvironment(interpreter.getGlobalEnv())) console.log(line);
      break;

    case ':type':
      if (!rest) {
        console.log('Usage: :type <expression>');
        break;
      }
      try {
        console.log(typeName(interpreter.evalSource(rest)));
      } catch (e) {
        if (!(e instanceof SprigError)) throw e;
        console.error(`  ${e.message}`);
      }
      break;

    case ':ast': {
      if (!rest) {
        console.log('Usage: :ast <expression>');
        break;
      }
      const result = parseSource(rest);
      for (const err of result.errors) console.error(`  Parse error ${formatParseError(err)}`);
      if (!result.hasErrors) console.log(nodeToString(result.program));
      break;
    }

    case ':clear':
      console.clear();
      break;

    case ':reset':
      interpreter.reset();
      console.log('Interpreter state reset.');
      break;

    default:
      console.log(`Unknown command: ${command}. Type :help for available commands.`);
      break;
  }
}

function formatResult(value: SprigValue, program: Program): ReplOutput[] {
  const last = program.statements[program.statements.length - 1];
  if (value.kind === 'error') {
    return [{ stream: 'stderr', text: `  ${valueToString(value)}` }];
  }
  if (last === undefined || last.type === 'let_statement') return [];
  return [{ stream: 'stdout', text: `=> ${valueToString(value)}` }];
}

/**
 * Describe the bindings of one scope, one line each. Only the scope's own
 * names are listed, and function values print as source, so closures that
 * capture this scope are not followed.
 */
export function formatEnvironment(env: Environment): string[] {
  const names = env.localNames();
  if (names.length === 0) {
    return ['  (no bindings defined)'];
  }

  const lines: string[] = [];
  for (const name of names) {
    const value = env.get(name);
    if (value === undefined) continue;
    const preview = valueToString(value);
    const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
    lines.push(`  ${name}: ${typeName(value)} = ${truncated}`);
  }
  return lines;
}
