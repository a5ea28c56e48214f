#!/usr/bin/env node
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { parseArgs } from 'util';
import { loadConfig } from './config/index.js';
import { NanoClock } from './lib/clock.js';
import { errorMessage } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import { OpenRouterRelatedWords } from './services/ai.js';
import { AudioStore } from './services/audio.js';
import { AzureClient } from './services/azure.js';
import { processRows, readInputRows } from './services/batch.js';
import { CardBuilder } from './services/cards.js';
import { serializePrompt, terminalCorrectionPrompt } from './services/correction.js';
import { createDeck } from './services/deck.js';
import { openDictionary } from './services/dictionary.js';
import { writePackage } from './services/package.js';
import { PhoneticReconciler } from './services/phonetics.js';

const USAGE = `Usage: mandarin-anki [options]

Build an Anki deck from a CSV of Mandarin words and sentences.

Options:
  -i, --input <file>      input CSV (default: input.csv)
  -o, --output <file>     output package (default: output.apkg)
      --trace-log <file>  full-verbosity log file (default: trace.log)
  -v, --verbose           log debug output to the console
  -h, --help              show this help
`;

/**
 * Run the generator. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'input': { type: 'string', short: 'i', default: 'input.csv' },
      'output': { type: 'string', short: 'o', default: 'output.apkg' },
      'trace-log': { type: 'string', default: 'trace.log' },
      'verbose': { type: 'boolean', short: 'v', default: false },
      'help': { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const { logger, close } = createLogger({
    consoleLevel: values.verbose ? 'debug' : 'info',
    traceFile: values['trace-log'],
  });

  let audioDir: string | undefined;
  try {
    const config = loadConfig();
    const dictionary = openDictionary(config.dictionary.path, config.dictionary.cacheSize);

    try {
      const rows = await readInputRows(resolve(process.cwd(), values.input));
      logger.info(`Read ${rows.length} rows from ${values.input}`);

      audioDir = await mkdtemp(join(tmpdir(), 'mandarin-anki-audio-'));

      const azure = new AzureClient(config, logger);
      const builder = new CardBuilder(
        {
          reconciler: new PhoneticReconciler(
            config.mandarin.reading,
            dictionary,
            azure,
            serializePrompt(terminalCorrectionPrompt),
            logger
          ),
          translator: azure,
          speech: azure,
          relatedWords: new OpenRouterRelatedWords(config, dictionary, logger),
          audio: new AudioStore(audioDir, logger),
          clock: new NanoClock(),
        },
        logger
      );

      const cards = await processRows(rows, { dictionary, builder, logger });

      const deck = createDeck(config.anki);
      for (const card of cards) {
        deck.addCard(card);
      }

      const outputPath = resolve(process.cwd(), values.output);
      await writePackage(deck, outputPath);
      logger.info(`Wrote ${deck.notes.length} notes to ${outputPath}`);
    } finally {
      dictionary.close();
    }

    return 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  } finally {
    if (audioDir) {
      await rm(audioDir, { recursive: true, force: true });
    }
    await close();
  }
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error('Fatal error:', err);
      process.exitCode = 1;
    }
  );
}
