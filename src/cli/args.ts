export type CliCommand = 'check' | 'correct';

export interface CliOptions {
  command: CliCommand;
  text?: string;
  file?: string;
  output?: string;
  correct: boolean;
  verbose: boolean;
}

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions);

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: prosecheck <check|correct> [text] [options]

Grammar, style and readability checker

Options:
  -f, --file <path>     File to check
  -o, --output <path>   Output file for corrected text
      --correct         Auto-correct grammar issues (check command)
  -v, --verbose         Verbose output
  -h, --help            Show this help

Examples:
  prosecheck check "Your text here"
  prosecheck check --file document.txt
  prosecheck check --file document.txt --correct
  prosecheck check --file document.txt --output corrected.txt`;

const isCommand = (value: string): value is CliCommand => value === 'check' || value === 'correct';

export function parseCliArgs(argv: string[]): ParsedArgs {
  if (argv.some((arg) => arg === '-h' || arg === '--help')) {
    return { help: true };
  }

  const positional: string[] = [];
  let file: string | undefined;
  let output: string | undefined;
  let correct = false;
  let verbose = false;

  const valueFor = (flag: string, index: number): string => {
    const next = argv[index + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new CliUsageError(`Option ${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-f':
      case '--file':
        file = valueFor(arg, i);
        i++;
        break;
      case '-o':
      case '--output':
        output = valueFor(arg, i);
        i++;
        break;
      case '--correct':
        correct = true;
        break;
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [command, text, ...rest] = positional;
  if (command === undefined) {
    throw new CliUsageError('Missing command (expected "check" or "correct")');
  }
  if (!isCommand(command)) {
    throw new CliUsageError(`Invalid command: ${command} (expected "check" or "correct")`);
  }
  if (rest.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${rest[0]}`);
  }

  return { help: false, command, text, file, output, correct, verbose };
}
