#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { describeToken } from './lexer/tokens';
import { describeStatement } from './parser/ast';
import { startRepl } from './repl';
import { SprigConfig, loadConfig, loadConfigForScript, traceEnabled } from './runtime/config';
import { SprigError } from './runtime/errors';
import { Interpreter } from './runtime/interpreter';

export const VERSION = '0.1.0';

export const USAGE = `
sprig - The Sprig Language Runtime v${VERSION}

Usage:
  sprig <file.sprig>              Run a sprig script
  sprig -c <source>               Run source given on the command line
  sprig                           Start the interactive REPL
  sprig --parse <file.sprig>      Parse and print the statement tree
  sprig --lex <file.sprig>        Tokenize and print tokens

Options:
  -c, --command <source>  Program text to run instead of a file
  -d, --dump, --parse     Parse only (print the statement tree)
  --lex                   Tokenize only (print token stream)
  --trace                 Enable pipeline tracing
  --config <path>         Path to sprig.config.json (auto-detected by default)
  -h, --help              Show this help message
  -v, --version           Show the version

Environment Variables:
  SPRIG_TRACE    Set to "1" to enable tracing by default

Examples:
  sprig -c "(+ 1 2)"
  sprig -c 'print $ + 1 2'
  sprig --trace examples/hello.sprig
  sprig --dump examples/hello.sprig
`;

const FLAGS_WITH_VALUES = new Set(['-c', '--command', '--config']);
const KNOWN_FLAGS = new Set([
  ...FLAGS_WITH_VALUES,
  '-d', '--dump', '--parse', '--lex', '--trace', '-h', '--help', '-v', '--version',
]);

function getArg(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx !== -1 && idx + 1 < args.length) {
      return args[idx + 1];
    }
  }
  return undefined;
}

interface Input {
  source: string;
  sourceName: string;
}

/**
 * Run the command line. Returns the process exit code.
 */
export async function main(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }
  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return 0;
  }

  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('-') && arg.length > 1) {
      if (!KNOWN_FLAGS.has(arg)) {
        console.error(`Error: Unknown option "${arg}".`);
        console.log(USAGE);
        return 1;
      }
      if (FLAGS_WITH_VALUES.has(arg)) {
        if (i + 1 >= args.length) {
          console.error(`Error: ${arg} requires a value.`);
          return 1;
        }
        i++; // Skip the value
      }
      continue;
    }
    files.push(arg);
  }

  const flags = new Set(args.filter(a => KNOWN_FLAGS.has(a)));
  const command = getArg(args, '-c', '--command');

  if (files.length > 1 || (files.length > 0 && command !== undefined)) {
    console.error('Error: Give either one file or -c <source>, not both.');
    return 1;
  }

  let config: SprigConfig;
  try {
    const explicit = getArg(args, '--config');
    config = (explicit || files.length === 0) ? loadConfig(explicit) : loadConfigForScript(files[0]);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const interpreter = new Interpreter({ trace: flags.has('--trace') || traceEnabled(config) });

  let input: Input;
  if (command !== undefined) {
    input = { source: command, sourceName: config.sourceName ?? '<provided>' };
  } else if (files.length > 0) {
    const filePath = path.resolve(files[0]);
    if (!fs.existsSync(filePath)) {
      console.error(`Error: File not found: ${filePath}`);
      return 1;
    }
    input = { source: fs.readFileSync(filePath, 'utf-8'), sourceName: files[0] };
  } else {
    await startRepl({ interpreter, prompt: config.prompt });
    return 0;
  }

  try {
    // Lex-only mode
    if (flags.has('--lex')) {
      for (const token of new Lexer(input.source, input.sourceName).tokenize()) {
        const { line, column } = token.location;
        console.log(`${line}:${column}\t${token.type} ${describeToken(token)}`);
      }
      return 0;
    }

    // Parse-only mode
    if (flags.has('--parse') || flags.has('--dump') || flags.has('-d')) {
      console.log(describeStatement(interpreter.parse(input.source, input.sourceName)));
      return 0;
    }

    console.log(interpreter.run(input.source, input.sourceName).toString());
    return 0;
  } catch (error) {
    if (error instanceof SprigError) {
      console.error(error.diagnostics.render());
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    },
  );
}
