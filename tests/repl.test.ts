import { PassThrough } from 'stream';
import { CONTINUATION_PROMPT, DEFAULT_PROMPT, ReplSession, hasOpenStatements, startRepl } from '../src/repl';
import { Interpreter } from '../src/runtime/interpreter';

describe('REPL', () => {
  let output: jest.Mock;
  let session: ReplSession;

  beforeEach(() => {
    output = jest.fn();
    session = new ReplSession(new Interpreter({ output }));
  });

  describe('ReplSession', () => {
    it('should print the value of each input', () => {
      expect(session.feed('(+ 1 2)')).toEqual({ lines: ['=> 3'], errors: [], done: false });
    });

    it('should send print output to the interpreter sink', () => {
      expect(session.feed('print "hi"').lines).toEqual(['=> 0']);
      expect(output).toHaveBeenCalledWith('hi');
    });

    it('should ignore blank lines', () => {
      expect(session.feed('   ')).toEqual({ lines: [], errors: [], done: false });
    });

    it('should continue while a parenthesis is open', () => {
      expect(session.prompt()).toBe(DEFAULT_PROMPT);
      expect(session.feed('(+ 1')).toEqual({ lines: [], errors: [], done: false });
      expect(session.continuing).toBe(true);
      expect(session.prompt()).toBe(CONTINUATION_PROMPT);

      expect(session.feed('2)').lines).toEqual(['=> 3']);
      expect(session.continuing).toBe(false);
    });

    it('should keep bindings between inputs', () => {
      expect(session.feed('(let ((x 5)) + x 1)').lines).toEqual(['=> 6']);
      expect(session.feed('(* x 2)').lines).toEqual(['=> 10']);
    });

    it('should print diagnostics line by line', () => {
      expect(session.feed('(+ 1 "a")').errors).toEqual([
        '<repl>:1:2 - Incompatible types for `+`: expected Integer, found String `a`!',
        '\tNOTE: `+` only works on integers.',
      ]);
    });

    it('should report an unterminated string instead of waiting for more input', () => {
      expect(session.feed('(print "abc').errors).toEqual([
        '<repl>:1:8 - Unterminated string literal!',
        '\tNOTE: Add a closing `"`.',
      ]);
      expect(session.continuing).toBe(false);
    });

    it('should use a custom prompt', () => {
      expect(new ReplSession(new Interpreter({ output }), 'calc> ').prompt()).toBe('calc> ');
    });
  });

  describe('commands', () => {
    it('should list bound names with :env', () => {
      session.feed('(let ((x 5)) + x 1)');
      expect(session.feed(':env').lines).toEqual(['  *', '  +', '  -', '  print', '  x']);
    });

    it('should forget bindings with :reset', () => {
      session.feed('(let ((x 5)) + x 1)');
      expect(session.feed(':reset').lines).toEqual(['Interpreter state reset.']);
      expect(session.feed('(+ x 1)').errors).toEqual(['<repl>:1:4 - Unknown identifier `x`!']);
    });

    it('should toggle tracing with :trace', () => {
      expect(session.feed(':trace').lines).toEqual(['Tracing on.']);
      expect(session.feed(':trace').lines).toEqual(['Tracing off.']);
    });

    it('should stop on :quit and :exit', () => {
      expect(session.feed(':quit').done).toBe(true);
      expect(session.feed(':exit').done).toBe(true);
    });

    it('should print help', () => {
      expect(session.feed(':help').lines[0]).toBe('REPL Commands:');
    });

    it('should reject unknown commands', () => {
      expect(session.feed(':frob').errors).toEqual(['Unknown command: :frob. Type :help for available commands.']);
    });
  });

  describe('hasOpenStatements()', () => {
    it('should count start and end markers', () => {
      expect(hasOpenStatements('(+ 1 (')).toBe(true);
      expect(hasOpenStatements('(+ 1 2)')).toBe(false);
      expect(hasOpenStatements(')')).toBe(false);
    });

    it('should treat closed wraps as complete', () => {
      expect(hasOpenStatements('print $ + 1 2')).toBe(false);
    });
  });

  describe('startRepl()', () => {
    let log: jest.SpyInstance;
    let error: jest.SpyInstance;

    beforeEach(() => {
      log = jest.spyOn(console, 'log').mockImplementation(() => {});
      error = jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      log.mockRestore();
      error.mockRestore();
    });

    it('should evaluate lines until input ends', async () => {
      const input = new PassThrough();
      const done = startRepl({ input, output: new PassThrough(), interpreter: new Interpreter({ output }) });

      input.write('(+ 2 3)\n');
      input.write('(nope)\n');
      input.end();
      await done;

      expect(log).toHaveBeenCalledWith('=> 5');
      expect(error).toHaveBeenCalledWith('<repl>:1:2 - Unknown identifier `nope`!');
      expect(log).toHaveBeenLastCalledWith('Goodbye!');
    });

    it('should stop at :quit', async () => {
      const input = new PassThrough();
      const done = startRepl({ input, output: new PassThrough(), interpreter: new Interpreter({ output }) });

      input.write(':quit\n');
      await done;

      expect(log).toHaveBeenLastCalledWith('Goodbye!');
    });
  });
});
