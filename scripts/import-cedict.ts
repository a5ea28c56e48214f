import Database from 'better-sqlite3';
import { readFileSync, existsSync, renameSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { parseArgs } from 'util';

// Regex to parse CC-CEDICT line format:
// Traditional Simplified [pinyin] /def1/def2/.../
const LINE_REGEX = /^(.+?) (.+?) \[(.+?)\] \/(.+)\/$/;

export interface ParsedEntry {
  traditional: string;
  simplified: string;
  pinyin: string;
  definitions: string[];
}

/**
 * Parse a single CC-CEDICT line into a structured entry.
 * Returns null for comments, empty lines, or unparseable lines.
 */
export function parseLine(line: string): ParsedEntry | null {
  // Normalize line endings (handle Windows CRLF)
  const normalizedLine = line.replace(/\r$/, '');

  if (!normalizedLine || normalizedLine.trim() === '') {
    return null;
  }

  if (normalizedLine.startsWith('#')) {
    return null;
  }

  const match = normalizedLine.match(LINE_REGEX);
  if (!match) {
    return null;
  }

  const [, traditional, simplified, pinyin, rawDefs] = match;
  const definitions = rawDefs.split('/').filter(Boolean);

  return {
    traditional,
    simplified,
    pinyin,
    definitions,
  };
}

/**
 * Parse the whole dictionary file, counting what was skipped
 */
export function parseCedict(content: string): {
  entries: ParsedEntry[];
  skippedLines: number;
  commentLines: number;
  emptyLines: number;
} {
  const entries: ParsedEntry[] = [];
  let skippedLines = 0;
  let commentLines = 0;
  let emptyLines = 0;

  for (const line of content.split('\n')) {
    if (line.trim() === '') {
      emptyLines++;
      continue;
    }

    if (line.startsWith('#')) {
      commentLines++;
      continue;
    }

    const parsed = parseLine(line);
    if (parsed) {
      entries.push(parsed);
    } else {
      skippedLines++;
      console.warn(`Warning: Could not parse line: ${line.substring(0, 80)}...`);
    }
  }

  return { entries, skippedLines, commentLines, emptyLines };
}

/**
 * Create the entries table and load it in a single transaction
 */
export function populateDatabase(db: Database.Database, entries: ParsedEntry[]): void {
  db.exec(`
    CREATE TABLE entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      simplified TEXT NOT NULL,
      traditional TEXT NOT NULL,
      pinyin TEXT NOT NULL,
      definitions TEXT NOT NULL
    );
  `);

  const insert = db.prepare(`
    INSERT INTO entries (simplified, traditional, pinyin, definitions)
    VALUES (?, ?, ?, ?)
  `);

  const insertMany = db.transaction((rows: ParsedEntry[]) => {
    for (const entry of rows) {
      insert.run(
        entry.simplified,
        entry.traditional,
        entry.pinyin,
        JSON.stringify(entry.definitions)
      );
    }
  });

  insertMany(entries);

  db.exec(`
    CREATE INDEX idx_simplified ON entries(simplified);
    CREATE INDEX idx_traditional ON entries(traditional);
  `);
}

/**
 * Main import function - reads CC-CEDICT and creates SQLite database
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const startTime = Date.now();

  const { values } = parseArgs({
    args: argv,
    options: {
      source: { type: 'string', short: 's', default: 'cedict_ts.u8' },
      output: { type: 'string', short: 'o', default: process.env.CEDICT_DB_PATH || 'data/cedict.sqlite' },
    },
    strict: true,
  });

  const cedictPath = resolve(process.cwd(), values.source);
  const dbPath = resolve(process.cwd(), values.output);
  const dataDir = dirname(dbPath);
  const backupPath = `${dbPath}.backup`;

  if (!existsSync(cedictPath)) {
    console.error(`Error: CC-CEDICT file not found at ${cedictPath}`);
    console.error('Please download cedict_ts.u8 from https://www.mdbg.net/chinese/dictionary?page=cc-cedict');
    process.exit(1);
  }

  if (!existsSync(dataDir)) {
    console.log(`Creating data directory: ${dataDir}`);
    mkdirSync(dataDir, { recursive: true });
  }

  if (existsSync(dbPath)) {
    console.log(`Backing up existing database to ${backupPath}`);
    renameSync(dbPath, backupPath);
  }

  console.log(`Reading CC-CEDICT from ${cedictPath}...`);
  const content = readFileSync(cedictPath, 'utf-8');
  const { entries, skippedLines, commentLines, emptyLines } = parseCedict(content);
  console.log(`Parsed ${entries.length} entries (skipped ${skippedLines} unparseable, ${commentLines} comments, ${emptyLines} empty)`);

  console.log(`Creating database at ${dbPath}...`);
  const db = new Database(dbPath);
  populateDatabase(db, entries);

  const count = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM entries').get();
  console.log(`Database contains ${count?.count ?? 0} entries`);

  db.close();

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log(`\nImport completed in ${elapsed}s`);
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Import failed:', err);
    process.exit(1);
  });
}
