/**
 * Interactive read-eval-print loop for sprig.
 *
 * Features:
 *   - Multi-line input while parentheses are left open
 *   - Bindings made with `let` persist between inputs
 *   - Special commands: :help, :quit, :env, :reset, :trace
 */

import * as readline from 'readline';
import { Lexer } from './lexer/lexer';
import { Token, TokenType } from './lexer/tokens';
import { SprigError } from './runtime/errors';
import { Interpreter } from './runtime/interpreter';

export const DEFAULT_PROMPT = 'sprig> ';
export const CONTINUATION_PROMPT = '... ';
export const REPL_SOURCE_NAME = '<repl>';

const HELP = [
  'REPL Commands:',
  '  :help, :h       Show this help message',
  '  :quit, :exit    Exit the REPL',
  '  :env            List every bound name',
  '  :reset          Forget all bindings made so far',
  '  :trace          Toggle pipeline tracing',
  '',
  'Tips:',
  '  - Multi-line input: leave a parenthesis open',
  '  - `let` bindings persist between inputs',
];

export interface ReplResponse {
  /** Lines meant for stdout. */
  lines: string[];
  /** Lines meant for stderr. */
  errors: string[];
  /** The session asked to stop. */
  done: boolean;
}

/**
 * Line handling for the REPL, independent of any terminal. Feed it one
 * line at a time and print what it returns.
 */
export class ReplSession {
  private buffer: string[] = [];

  constructor(
    private readonly interpreter: Interpreter = new Interpreter(),
    private readonly basePrompt: string = DEFAULT_PROMPT,
  ) {}

  /** Whether an unfinished expression is being accumulated. */
  get continuing(): boolean {
    return this.buffer.length > 0;
  }

  prompt(): string {
    return this.continuing ? CONTINUATION_PROMPT : this.basePrompt;
  }

  feed(line: string): ReplResponse {
    const response: ReplResponse = { lines: [], errors: [], done: false };

    if (!this.continuing) {
      const trimmed = line.trim();
      if (trimmed === '') return response;
      if (trimmed.startsWith(':')) {
        this.command(trimmed, response);
        return response;
      }
    }

    this.buffer.push(line);
    const source = this.buffer.join('\n');
    if (hasOpenStatements(source)) {
      return response;
    }
    this.buffer = [];

    try {
      const result = this.interpreter.interpret(source, REPL_SOURCE_NAME);
      if (result.ok) {
        response.lines.push(`=> ${result.text}`);
      } else {
        response.errors.push(...result.text.split('\n'));
      }
    } catch (e) {
      if (e instanceof Error) {
        response.errors.push(`Error: ${e.message}`);
      } else {
        response.errors.push(`Unknown error: ${String(e)}`);
      }
    }
    return response;
  }

  private command(input: string, response: ReplResponse): void {
    const command = input.split(/\s+/)[0];

    switch (command) {
      case ':help':
      case ':h':
        response.lines.push(...HELP);
        break;

      case ':quit':
      case ':q':
      case ':exit':
        response.done = true;
        break;

      case ':env':
        for (const name of this.interpreter.getScope().names()) {
          response.lines.push(`  ${name}`);
        }
        break;

      case ':reset':
        this.interpreter.reset();
        response.lines.push('Interpreter state reset.');
        break;

      case ':trace':
        this.interpreter.setTrace(!this.interpreter.isTracing());
        response.lines.push(`Tracing ${this.interpreter.isTracing() ? 'on' : 'off'}.`);
        break;

      default:
        response.errors.push(`Unknown command: ${command}. Type :help for available commands.`);
        break;
    }
  }
}

/**
 * Whether `source` opens more statements than it closes. Input that does
 * not lex is complete: evaluating it reports the problem.
 */
export function hasOpenStatements(source: string): boolean {
  let tokens: Token[];
  try {
    tokens = new Lexer(source, REPL_SOURCE_NAME).tokenize();
  } catch (e) {
    if (e instanceof SprigError) return false;
    throw e;
  }

  let depth = 0;
  for (const token of tokens) {
    if (token.type === TokenType.START_STATEMENT) depth++;
    else if (token.type === TokenType.END_STATEMENT) depth--;
  }
  return depth > 0;
}

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  interpreter?: Interpreter;
  prompt?: string;
}

/**
 * Run a session on a readline interface. Resolves once input ends or the
 * user quits.
 */
export function startRepl(options: ReplOptions = {}): Promise<void> {
  const session = new ReplSession(options.interpreter, options.prompt);
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    prompt: session.prompt(),
  });

  console.log('sprig REPL. Type :help for commands, :quit to exit.');
  rl.prompt();

  return new Promise(resolve => {
    rl.on('line', (line: string) => {
      const response = session.feed(line);
      response.lines.forEach(text => console.log(text));
      response.errors.forEach(text => console.error(text));
      if (response.done) {
        rl.close();
        return;
      }
      rl.setPrompt(session.prompt());
      rl.prompt();
    });

    rl.on('close', () => {
      console.log('Goodbye!');
      resolve();
    });
  });
}
