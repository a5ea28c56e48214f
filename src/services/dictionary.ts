import Database from 'better-sqlite3';
import { LRUCache } from 'lru-cache';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import type {
  DictionaryEntry,
  DictionaryLookup,
  DictionaryRow,
  ScriptClassification,
} from '../types/index.js';

// CJK Unified Ideographs, Extension A and Compatibility Ideographs
const HAN_CHAR_REGEX = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/;
const HAN_RUN_REGEX = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]+/g;

const DefinitionsSchema = z.array(z.string());

/**
 * Check if a string contains Chinese characters
 */
export function containsChinese(text: string): boolean {
  return HAN_CHAR_REGEX.test(text);
}

/**
 * Convert a database row to a DictionaryEntry
 */
function rowToEntry(row: DictionaryRow): DictionaryEntry {
  return Object.freeze({
    id: row.id,
    simplified: row.simplified,
    traditional: row.traditional,
    pinyin: row.pinyin,
    definitions: DefinitionsSchema.parse(JSON.parse(row.definitions)),
  });
}

/**
 * CC-CEDICT backed dictionary.
 *
 * Owns the database connection and the entry cache; callers only ever get
 * frozen entries back, so tokens can hold on to them without copying.
 */
export class CedictDictionary implements DictionaryLookup {
  private readonly lookupStmt: Database.Statement<[string, string], DictionaryRow>;
  private readonly lookupCache: LRUCache<string, readonly DictionaryEntry[]>;
  // Separate cache for segmentation of Han runs
  private readonly segmentCache: LRUCache<string, string[]>;
  private readonly maxWordLength: number;

  constructor(private readonly db: Database.Database, cacheSize = 5000) {
    // Query for both simplified and traditional matches
    // Use UNION to avoid duplicates when simplified === traditional
    this.lookupStmt = db.prepare<[string, string], DictionaryRow>(`
      SELECT * FROM entries WHERE simplified = ?
      UNION
      SELECT * FROM entries WHERE traditional = ?
      ORDER BY id
    `);

    this.lookupCache = new LRUCache({ max: cacheSize });
    this.segmentCache = new LRUCache({ max: cacheSize });

    const longest = db
      .prepare<[], { len: number | null }>('SELECT MAX(LENGTH(simplified)) AS len FROM entries')
      .get();
    this.maxWordLength = Math.max(1, longest?.len ?? 1);
  }

  /**
   * Look up a word in the dictionary.
   * Returns all matching entries (by simplified OR traditional).
   * Results are cached, including misses.
   */
  lookup(text: string): readonly DictionaryEntry[] {
    const cached = this.lookupCache.get(text);
    if (cached !== undefined) {
      return cached;
    }

    const entries = Object.freeze(this.lookupStmt.all(text, text).map(rowToEntry));
    this.lookupCache.set(text, entries);
    return entries;
  }

  /**
   * Split text into the dictionary words it contains, in order.
   * Anything that is not a Han character is skipped; a Han character
   * the dictionary does not know becomes a segment of its own.
   *
   * Example: "你好嗎？OK" -> ["你好", "嗎"]
   */
  segment(text: string): string[] {
    const segments: string[] = [];
    for (const run of text.match(HAN_RUN_REGEX) ?? []) {
      segments.push(...this.segmentRun(run));
    }
    return segments;
  }

  classifyScript(text: string): ScriptClassification {
    return containsChinese(text) ? 'mandarin' : 'other';
  }

  close(): void {
    this.db.close();
  }

  /**
   * Greedy longest-prefix-first segmentation of a run of Han characters
   */
  private segmentRun(run: string): string[] {
    const cached = this.segmentCache.get(run);
    if (cached !== undefined) {
      return cached;
    }

    const result = this.segmentRunImpl(run);
    this.segmentCache.set(run, result);
    return result;
  }

  private segmentRunImpl(run: string): string[] {
    if (run.length === 0) {
      return [];
    }

    for (let splitSize = Math.min(run.length, this.maxWordLength); splitSize >= 1; splitSize--) {
      const left = run.slice(0, splitSize);
      if (this.lookup(left).length > 0) {
        return [left, ...this.segmentRun(run.slice(splitSize))];
      }
    }

    // No dictionary match for any prefix - take the first character on its own
    return [run[0], ...this.segmentRun(run.slice(1))];
  }
}

/**
 * Open the dictionary database built by `npm run import-cedict`
 */
export function openDictionary(path: string, cacheSize?: number): CedictDictionary {
  const dbPath = resolve(process.cwd(), path);
  if (!existsSync(dbPath)) {
    throw new ConfigError([
      `Dictionary database not found at ${dbPath}. Run \`npm run import-cedict\` first.`,
    ]);
  }
  return new CedictDictionary(new Database(dbPath, { readonly: true, fileMustExist: true }), cacheSize);
}
