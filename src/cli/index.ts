import { languageToolConfig } from '../config/languagetool.config';
import { logger } from '../lib/logger';
import { LanguageToolClient } from '../services/grammar';
import { runCli } from './run';

runCli(process.argv.slice(2), {
  createGrammar: () => new LanguageToolClient(languageToolConfig),
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('prosecheck failed', error);
    process.exitCode = 1;
  });
