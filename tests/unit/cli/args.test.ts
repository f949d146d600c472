import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../../../src/cli/args';

describe('parseCliArgs', () => {
  it('should parse a check command with inline text', () => {
    expect(parseCliArgs(['check', 'Some text.'])).toEqual({
      help: false,
      command: 'check',
      text: 'Some text.',
      file: undefined,
      output: undefined,
      correct: false,
      verbose: false,
    });
  });

  it('should parse short and long options', () => {
    expect(parseCliArgs(['correct', '-f', 'in.txt', '--output', 'out.txt', '-v'])).toEqual({
      help: false,
      command: 'correct',
      text: undefined,
      file: 'in.txt',
      output: 'out.txt',
      correct: false,
      verbose: true,
    });
  });

  it('should accept options before the command', () => {
    const parsed = parseCliArgs(['--correct', 'check', '--file', 'doc.txt']);

    expect(parsed).toMatchObject({ help: false, command: 'check', file: 'doc.txt', correct: true });
  });

  it('should return help whenever -h or --help appears', () => {
    expect(parseCliArgs(['check', '--help'])).toEqual({ help: true });
    expect(parseCliArgs(['-h'])).toEqual({ help: true });
  });

  it.each([
    [[], 'Missing command (expected "check" or "correct")'],
    [['lint', 'x'], 'Invalid command: lint (expected "check" or "correct")'],
    [['check', '--file'], 'Option --file requires a value'],
    [['check', '-o', '--verbose'], 'Option -o requires a value'],
    [['check', '--fast'], 'Unknown option: --fast'],
    [['check', 'one', 'two'], 'Unexpected argument: two'],
  ])('should reject %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new CliUsageError(message));
  });
});
