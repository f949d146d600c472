/**
 * CLI runner: resolves input text, runs the requested command against a
 * freshly created grammar capability and always releases it before returning.
 */

import { readFile, writeFile } from 'fs/promises';
import { WritingAnalyzer } from '../services/analysis/writing-analyzer.service';
import { withGrammarCapability, type GrammarCapability } from '../services/grammar';
import { CliUsageError, USAGE, parseCliArgs, type CliOptions, type ParsedArgs } from './args';
import { SEPARATOR, formatAnalysisReport, formatClosingLine, type ScoreColorizer } from './report-formatter';

export interface CliIO {
  print: (line: string) => void;
  printError: (line: string) => void;
}

export interface CliDeps extends CliIO {
  createGrammar: () => GrammarCapability;
  colorize?: ScoreColorizer;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

async function resolveText(options: CliOptions, io: CliIO): Promise<string | null> {
  if (options.file) {
    try {
      return await readFile(options.file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        io.printError(`Error: File '${options.file}' not found`);
        return null;
      }
      throw error;
    }
  }
  if (options.text) {
    return options.text;
  }
  io.printError('Error: Please provide text or use --file option');
  io.print(USAGE);
  return null;
}

async function emitCorrection(corrected: string, options: CliOptions, io: CliIO): Promise<void> {
  if (options.output) {
    await writeFile(options.output, corrected, 'utf-8');
    io.print(`✓ Corrected text saved to: ${options.output}`);
  } else {
    io.print(corrected);
  }
}

/** Returns the process exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      deps.printError(`Error: ${error.message}`);
      deps.print(USAGE);
      return 1;
    }
    throw error;
  }

  if (parsed.help) {
    deps.print(USAGE);
    return 0;
  }

  const options: CliOptions = parsed;
  const text = await resolveText(options, deps);
  if (text === null) return 1;

  deps.print('Initializing grammar checker...');

  return withGrammarCapability(deps.createGrammar(), async (grammar) => {
    const analyzer = new WritingAnalyzer({ grammar });

    if (options.command === 'correct') {
      deps.print('Correcting text...');
      const corrected = await analyzer.correctText(text);
      if (!options.output) {
        deps.print(SEPARATOR);
        deps.print('CORRECTED TEXT:');
        deps.print(SEPARATOR);
      }
      await emitCorrection(corrected, options, deps);
      return 0;
    }

    deps.print('Analyzing text...');
    const result = await analyzer.analyze(text);
    formatAnalysisReport(result, { verbose: options.verbose, colorize: deps.colorize }).forEach(deps.print);

    if (options.correct) {
      deps.print(SEPARATOR);
      deps.print('AUTO-CORRECTED TEXT');
      deps.print(SEPARATOR);
      await emitCorrection(await analyzer.correctText(text), options, deps);
    }

    deps.print(SEPARATOR);
    deps.print(formatClosingLine(result));
    return 0;
  });
}
