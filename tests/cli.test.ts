/**
 * Command line tests
 *
 * Drives main() the way the binary does and asserts on what it writes to
 * stdout and stderr and on the exit code it returns.
 */

import * as fs from 'fs';
import * as path from 'path';
import { USAGE, VERSION, main } from '../src/cli';

const TEST_DIR = path.join(__dirname, '__cli_test_tmp__');

function writeFixture(name: string, content: string): string {
  const filePath = path.join(TEST_DIR, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

describe('CLI', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeAll(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterAll(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {});
    error = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
    error.mockRestore();
  });

  function stdout(): string[] {
    return log.mock.calls.map(call => String(call[0]));
  }

  function stderr(): string[] {
    return error.mock.calls.map(call => String(call[0]));
  }

  describe('running source', () => {
    it('should print the value of a -c program', async () => {
      expect(await main(['-c', '(+ 1 2)'])).toBe(0);
      expect(stdout()).toEqual(['3']);
    });

    it('should accept --command', async () => {
      expect(await main(['--command', '* 6 7'])).toBe(0);
      expect(stdout()).toEqual(['42']);
    });

    it('should print output before the result', async () => {
      expect(await main(['-c', 'print $ + 1 2'])).toBe(0);
      expect(stdout()).toEqual(['3', '0']);
    });

    it('should run a file', async () => {
      const file = writeFixture('answer.sprig', '// the answer\n(* 6 7)\n');
      expect(await main([file])).toBe(0);
      expect(stdout()).toEqual(['42']);
    });

    it('should report diagnostics against the file name', async () => {
      const file = writeFixture('broken.sprig', '(+ 1 nope)\n');
      expect(await main([file])).toBe(1);
      expect(stderr()).toEqual([`${file}:1:6 - Unknown identifier \`nope\`!`]);
      expect(stdout()).toEqual([]);
    });

    it('should report diagnostics for -c programs', async () => {
      expect(await main(['-c', '(+ 1 "a")'])).toBe(1);
      expect(stderr()).toEqual([
        '<provided>:1:2 - Incompatible types for `+`: expected Integer, found String `a`!\n\tNOTE: `+` only works on integers.',
      ]);
    });

    it('should fail on a missing file', async () => {
      const missing = path.join(TEST_DIR, 'missing.sprig');
      expect(await main([missing])).toBe(1);
      expect(stderr()).toEqual([`Error: File not found: ${missing}`]);
    });
  });

  describe('inspection modes', () => {
    it('should print tokens with --lex', async () => {
      expect(await main(['--lex', '-c', '(+ 1 2)'])).toBe(0);
      expect(stdout()).toEqual([
        '1:1\tSTART_STATEMENT (',
        '1:2\tIDENTIFIER +',
        '1:4\tLITERAL 1',
        '1:6\tLITERAL 2',
        '1:7\tEND_STATEMENT )',
      ]);
    });

    it('should print the statement tree with --dump', async () => {
      expect(await main(['--dump', '-c', '(+ 1 (* 2 3))'])).toBe(0);
      expect(stdout()).toEqual(['(+) @ <provided>:1:2\n  1\n  (*) @ <provided>:1:7\n    2\n    3']);
    });

    it('should treat -d and --parse like --dump', async () => {
      expect(await main(['-d', '-c', '(+ 1 2)'])).toBe(0);
      expect(await main(['--parse', '-c', '(+ 1 2)'])).toBe(0);
      expect(stdout()).toEqual(['(+) @ <provided>:1:2\n  1\n  2', '(+) @ <provided>:1:2\n  1\n  2']);
    });

    it('should not evaluate when dumping', async () => {
      expect(await main(['--dump', '-c', '(print "hi")'])).toBe(0);
      expect(stdout()).toEqual(['(print) @ <provided>:1:2\n  "hi"']);
    });

    it('should print trace lines with --trace', async () => {
      expect(await main(['--trace', '-c', '(+ 1 2)'])).toBe(0);
      expect(stdout()).toEqual([
        '  [trace] Tokenized <provided>: 5 token(s).',
        '  [trace] Parsed statement at <provided>:1:2.',
        '  [trace] Resolved <provided>:1:2 to 3.',
        '3',
      ]);
    });
  });

  describe('configuration', () => {
    it('should name -c input after the configured source name', async () => {
      const config = writeFixture('named.json', JSON.stringify({ sourceName: 'inline' }));
      expect(await main(['--config', config, '-c', '(nope)'])).toBe(1);
      expect(stderr()).toEqual(['inline:1:2 - Unknown identifier `nope`!']);
    });

    it('should fail on an invalid config file', async () => {
      const config = writeFixture('bad.json', JSON.stringify({ trace: 'always' }));
      expect(await main(['--config', config, '-c', '(+ 1 2)'])).toBe(1);
      expect(stderr()).toEqual([`Error: Invalid "trace" in ${config}: must be a boolean`]);
    });
  });

  describe('arguments', () => {
    it('should print usage with --help', async () => {
      expect(await main(['--help'])).toBe(0);
      expect(stdout()).toEqual([USAGE]);
    });

    it('should print the version', async () => {
      expect(await main(['-v'])).toBe(0);
      expect(stdout()).toEqual([VERSION]);
    });

    it('should reject unknown options', async () => {
      expect(await main(['--bogus'])).toBe(1);
      expect(stderr()).toEqual(['Error: Unknown option "--bogus".']);
    });

    it('should require a value for -c', async () => {
      expect(await main(['-c'])).toBe(1);
      expect(stderr()).toEqual(['Error: -c requires a value.']);
    });

    it('should refuse both a file and -c', async () => {
      expect(await main(['script.sprig', '-c', '(+ 1 2)'])).toBe(1);
      expect(stderr()).toEqual(['Error: Give either one file or -c <source>, not both.']);
    });
  });
});
