import { parse } from 'csv-parse/sync';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { InputError, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { Card, DictionaryLookup, InputRow } from '../types/index.js';
import type { CardBuilder } from './cards.js';
import { buildSentence } from './tokenizer.js';

const CsvRowsSchema = z.array(z.array(z.string()));

/**
 * Parse the input CSV. No header row; the first column is the Mandarin
 * text and the optional second column overrides the definition.
 */
export function parseInputRows(content: string): InputRow[] {
  const records = CsvRowsSchema.parse(
    parse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    })
  );

  return records
    .filter(record => record.length > 0 && record[0].length > 0)
    .map(record => {
      const definition = record[1];
      return definition ? { hanzi: record[0], definition } : { hanzi: record[0] };
    });
}

export async function readInputRows(path: string): Promise<InputRow[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputError(`Could not read input file ${path}: ${errorMessage(error)}`);
  }
  return parseInputRows(content);
}

export interface BatchContext {
  dictionary: DictionaryLookup;
  builder: Pick<CardBuilder, 'buildWordCard' | 'buildSentenceCard'>;
  logger: Logger;
}

/**
 * Build one card per usable row. Rows run concurrently; a row that fails
 * is logged and left out without affecting the others.
 */
export async function processRows(rows: readonly InputRow[], context: BatchContext): Promise<Card[]> {
  const { dictionary, builder, logger } = context;

  const tasks = rows.map(async (row): Promise<Card | null> => {
    const sentence = buildSentence(row.hanzi, dictionary);

    switch (sentence.tokens.length) {
      case 0:
        return null;
      case 1:
        logger.info(`Found Word: ${row.hanzi}`);
        return builder.buildWordCard(sentence.tokens[0], row.definition);
      default:
        logger.info(`Found Sentence: ${row.hanzi}`);
        return builder.buildSentenceCard(sentence, row.definition);
    }
  });

  const results = await Promise.allSettled(tasks);

  const cards: Card[] = [];
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      logger.error(`Failed to build a card for "${rows[index].hanzi}": ${errorMessage(result.reason)}`);
    } else if (result.value) {
      cards.push(result.value);
    }
  });
  return cards;
}
