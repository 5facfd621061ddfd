/**
 * Sprig REPL: interactive read-eval-print loop.
 *
 * Features:
 *   - Persistent interpreter state across inputs
 *   - Multi-line input (detects unclosed parens and strings)
 *   - Special commands: :help, :quit, :env, :type, :reset
 *   - Errors are printed and the loop continues; stack exhaustion ends it
 *   - Prints the result of each input (unless nil)
 */

import * as readline from 'readline';
import { parse } from './parser';
import { Interpreter, InterpreterOptions } from './interpreter';
import { SprigError } from './errors';
import { Value, valueToRepr, kindName } from './values';

export const VERSION = '0.1.0';

export interface ReplResponse {
  /** Lines to show the user, without trailing newlines. */
  output: string[];
  /** Which prompt to show next. */
  prompt: 'primary' | 'continuation';
  /** Set once the user asked to leave. */
  exit?: boolean;
}

/**
 * Line-oriented REPL state machine, independent of any terminal.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private options: InterpreterOptions;
  private buffer = '';

  constructor(options: InterpreterOptions = {}) {
    this.options = options;
    this.interpreter = new Interpreter(options);
  }

  getInterpreter(): Interpreter {
    return this.interpreter;
  }

  submit(line: string): ReplResponse {
    const trimmed = line.trim();

    // Commands are only recognised at a primary prompt.
    if (this.buffer === '' && trimmed.startsWith(':')) {
      return this.handleCommand(trimmed);
    }

    this.buffer += (this.buffer ? '\n' : '') + line;
    if (hasUnclosedDelimiters(this.buffer)) {
      return { output: [], prompt: 'continuation' };
    }

    const input = this.buffer.trim();
    this.buffer = '';
    if (input === '') {
      return { output: [], prompt: 'primary' };
    }

    return this.evaluate(input, printResult);
  }

  private evaluate(input: string, show: (value: Value) => string[]): ReplResponse {
    try {
      const value = this.interpreter.evaluateProgram(parse(input));
      return { output: show(value), prompt: 'primary' };
    } catch (e) {
      if (e instanceof SprigError) {
        return { output: [`  ${e.message}`], prompt: 'primary' };
      }
      if (e instanceof RangeError) {
        // The interpreter's state is unknown after an unwound stack.
        return { output: ['  fatal: maximum call stack size exceeded'], prompt: 'primary', exit: true };
      }
      throw e;
    }
  }

  private handleCommand(cmd: string): ReplResponse {
    const parts = cmd.split(/\s+/);
    const command = parts[0];
    const done = (output: string[]): ReplResponse => ({ output, prompt: 'primary' });

    switch (command) {
      case ':help':
      case ':h':
        return done([
          '',
          'REPL Commands:',
          '  :help, :h       Show this help message',
          '  :quit, :q       Exit the REPL',
          '  :env            Show user-defined global bindings',
          '  :type <expr>    Show the runtime kind of an expression',
          '  :reset          Start over with a fresh global environment',
          '',
          'Tips:',
          '  - Multi-line input: leave parentheses unclosed',
          '  - Bindings made with let persist between inputs',
          '',
        ]);

      case ':quit':
      case ':q':
      case ':exit':
        return { output: [], prompt: 'primary', exit: true };

      case ':env':
        return done(describeEnvironment(this.interpreter));

      case ':type': {
        const expr = parts.slice(1).join(' ').trim();
        if (!expr) return done(['Usage: :type <expression>']);
        return this.evaluate(expr, (value) => [kindName(value)]);
      }

      case ':reset':
        this.interpreter = new Interpreter(this.options);
        return done(['Interpreter state reset.']);

      default:
        return done([`Unknown command: ${command}. Type :help for available commands.`]);
    }
  }
}

/**
 * Check whether the input has unclosed parentheses or an open string.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === ';') {
      while (i < input.length && input[i] !== '\n') i++;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
    }
  }

  return inString || depth > 0;
}

/**
 * Print a value result, suppressing nil.
 */
function printResult(value: Value): string[] {
  if (value.kind === 'nil') return [];
  return [`=> ${valueToRepr(value)}`];
}

function describeEnvironment(interpreter: Interpreter): string[] {
  const lines: string[] = [];
  for (const [name, value] of interpreter.getGlobalEnv().entries()) {
    // Skip builtins for readability
    if (value.kind === 'function' && value.callable.kind === 'builtin') continue;
    const preview = valueToRepr(value);
    const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
    lines.push(`  ${name}: ${kindName(value)} = ${truncated}`);
  }
  if (lines.length === 0) {
    return ['  (no user-defined bindings)'];
  }
  return lines;
}

export interface StartReplOptions extends InterpreterOptions {
  prompt?: string;
  input?: NodeJS.ReadableStream;
  terminalOutput?: NodeJS.WritableStream;
}

/**
 * Start the Sprig REPL on a terminal.
 */
export function startRepl(options: StartReplOptions = {}): readline.Interface {
  const input = options.input ?? process.stdin;
  const terminalOutput = options.terminalOutput ?? process.stdout;
  const primary = options.prompt ?? 'sprig> ';
  const continuation = ' '.repeat(Math.max(primary.length - 4, 0)) + '... ';

  const session = new ReplSession({
    output: options.output ?? ((text) => { terminalOutput.write(text); }),
    stdlib: options.stdlib,
  });

  const rl = readline.createInterface({
    input,
    output: terminalOutput,
    prompt: primary,
    terminal: input === process.stdin && process.stdin.isTTY === true,
  });

  terminalOutput.write(`Sprig REPL v${VERSION}\n`);
  terminalOutput.write('Type :help for commands, :quit to exit.\n\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    const response = session.submit(line);
    for (const out of response.output) {
      terminalOutput.write(out + '\n');
    }
    if (response.exit) {
      rl.close();
      return;
    }
    rl.setPrompt(response.prompt === 'primary' ? primary : continuation);
    rl.prompt();
  });

  rl.on('close', () => {
    terminalOutput.write('\nGoodbye!\n');
  });

  return rl;
}
