import Database from 'better-sqlite3';
import JSZip from 'jszip';
import { createHash } from 'crypto';
import { readFileSync } from 'fs';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { Deck, NoteModel } from './deck.js';

const DEFAULT_DECK_ID = 1;
const FIELD_SEPARATOR = '\x1f';

const CollectionDefaultsSchema = z.object({
  conf: z.record(z.unknown()),
  deck: z.record(z.unknown()),
  dconf: z.record(z.unknown()),
  latexPre: z.string(),
  latexPost: z.string(),
});

// Collection-level settings Anki expects to find in a new collection
const COLLECTION_DEFAULTS = CollectionDefaultsSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/anki-collection.json', import.meta.url), 'utf-8'))
);

const SCHEMA = `
  CREATE TABLE col (
    id integer primary key,
    crt integer not null,
    mod integer not null,
    scm integer not null,
    ver integer not null,
    dty integer not null,
    usn integer not null,
    ls integer not null,
    conf text not null,
    models text not null,
    decks text not null,
    dconf text not null,
    tags text not null
  );
  CREATE TABLE notes (
    id integer primary key,
    guid text not null,
    mid integer not null,
    mod integer not null,
    usn integer not null,
    tags text not null,
    flds text not null,
    sfld integer not null,
    csum integer not null,
    flags integer not null,
    data text not null
  );
  CREATE TABLE cards (
    id integer primary key,
    nid integer not null,
    did integer not null,
    ord integer not null,
    mod integer not null,
    usn integer not null,
    type integer not null,
    queue integer not null,
    due integer not null,
    ivl integer not null,
    factor integer not null,
    reps integer not null,
    lapses integer not null,
    left integer not null,
    odue integer not null,
    odid integer not null,
    flags integer not null,
    data text not null
  );
  CREATE TABLE revlog (
    id integer primary key,
    cid integer not null,
    usn integer not null,
    ease integer not null,
    ivl integer not null,
    lastIvl integer not null,
    factor integer not null,
    time integer not null,
    type integer not null
  );
  CREATE TABLE graves (
    usn integer not null,
    oid integer not null,
    type integer not null
  );
  CREATE INDEX ix_notes_usn on notes (usn);
  CREATE INDEX ix_cards_usn on cards (usn);
  CREATE INDEX ix_revlog_usn on revlog (usn);
  CREATE INDEX ix_cards_nid on cards (nid);
  CREATE INDEX ix_cards_sched on cards (did, queue, due);
  CREATE INDEX ix_revlog_cid on revlog (cid);
  CREATE INDEX ix_notes_csum on notes (csum);
`;

function stripHtml(text: string): string {
  return text.replace(/<[^>]*>/g, '');
}

/**
 * Anki's note checksum: first 8 hex digits of the SHA-1 of the stripped sort field
 */
export function fieldChecksum(field: string): number {
  const digest = createHash('sha1').update(stripHtml(field)).digest('hex');
  return parseInt(digest.slice(0, 8), 16);
}

export function noteGuid(model: NoteModel, fields: readonly string[]): string {
  return createHash('sha256').update(`${model.id}:${fields[0]}`).digest('base64url').slice(0, 10);
}

/**
 * Indices of the fields a template's front side uses; Anki only
 * generates the card when one of them is non-empty.
 */
function requiredFields(model: NoteModel, qfmt: string): number[] {
  const used = new Set<number>();
  for (const match of qfmt.matchAll(/\{\{([^}]+)\}\}/g)) {
    const index = model.fields.indexOf(match[1].trim());
    if (index !== -1) used.add(index);
  }
  return [...used].sort((a, b) => a - b);
}

function modelJson(model: NoteModel, deckId: number, modSeconds: number): Record<string, unknown> {
  return {
    id: model.id,
    name: model.name,
    type: 0,
    mod: modSeconds,
    usn: -1,
    sortf: 0,
    did: deckId,
    tags: [],
    vers: [],
    css: model.css,
    latexPre: COLLECTION_DEFAULTS.latexPre,
    latexPost: COLLECTION_DEFAULTS.latexPost,
    latexsvg: false,
    req: model.templates.map((template, ord) => [ord, 'any', requiredFields(model, template.qfmt)]),
    flds: model.fields.map((name, ord) => ({
      name,
      ord,
      font: 'Arial',
      size: 20,
      media: [],
      rtl: false,
      sticky: false,
    })),
    tmpls: model.templates.map((template, ord) => ({
      name: template.name,
      ord,
      qfmt: template.qfmt,
      afmt: template.afmt,
      bqfmt: '',
      bafmt: '',
      did: null,
    })),
  };
}

function deckJson(id: number, name: string, description: string, modSeconds: number): Record<string, unknown> {
  return { ...COLLECTION_DEFAULTS.deck, id, name, desc: description, mod: modSeconds };
}

/**
 * Write the deck as an Anki 2 collection database
 */
function writeCollection(deck: Deck, dbPath: string, now: number): void {
  const modSeconds = Math.floor(now / 1000);
  const db = new Database(dbPath);

  try {
    db.exec(SCHEMA);

    const models = Object.fromEntries(
      [deck.models.word, deck.models.sentence].map(model => [String(model.id), modelJson(model, deck.id, modSeconds)])
    );
    const decks = {
      [String(DEFAULT_DECK_ID)]: deckJson(DEFAULT_DECK_ID, 'Default', '', modSeconds),
      [String(deck.id)]: deckJson(deck.id, deck.name, deck.description, modSeconds),
    };

    db.prepare(`
      INSERT INTO col (id, crt, mod, scm, ver, dty, usn, ls, conf, models, decks, dconf, tags)
      VALUES (1, ?, ?, ?, 11, 0, 0, 0, ?, ?, ?, ?, '{}')
    `).run(
      modSeconds,
      now,
      now,
      JSON.stringify(COLLECTION_DEFAULTS.conf),
      JSON.stringify(models),
      JSON.stringify(decks),
      JSON.stringify(COLLECTION_DEFAULTS.dconf)
    );

    const insertNote = db.prepare(`
      INSERT INTO notes (id, guid, mid, mod, usn, tags, flds, sfld, csum, flags, data)
      VALUES (?, ?, ?, ?, -1, '', ?, ?, ?, 0, '')
    `);
    const insertCard = db.prepare(`
      INSERT INTO cards (id, nid, did, ord, mod, usn, type, queue, due, ivl, factor, reps, lapses, left, odue, odid, flags, data)
      VALUES (?, ?, ?, ?, ?, -1, 0, 0, ?, 0, 0, 0, 0, 0, 0, 0, 0, '')
    `);

    // Ids only need to be unique; start from the current time like Anki does
    let nextId = now;
    db.transaction(() => {
      deck.notes.forEach((note, position) => {
        const noteId = nextId++;
        insertNote.run(
          noteId,
          noteGuid(note.model, note.fields),
          note.model.id,
          modSeconds,
          note.fields.join(FIELD_SEPARATOR),
          note.fields[0],
          fieldChecksum(note.fields[0])
        );
        note.model.templates.forEach((_template, ord) => {
          insertCard.run(nextId++, noteId, deck.id, ord, modSeconds, position);
        });
      });
    })();
  } finally {
    db.close();
  }
}

/**
 * Write the deck and its audio to an .apkg file
 */
export async function writePackage(deck: Deck, outputPath: string, now: number = Date.now()): Promise<void> {
  const workDir = await mkdtemp(join(tmpdir(), 'mandarin-anki-package-'));

  try {
    const collectionPath = join(workDir, 'collection.anki2');
    writeCollection(deck, collectionPath, now);

    const zip = new JSZip();
    zip.file('collection.anki2', await readFile(collectionPath));

    const mediaManifest: Record<string, string> = {};
    for (const [index, audio] of deck.media.entries()) {
      mediaManifest[String(index)] = audio.fileName;
      zip.file(String(index), await readFile(audio.path));
    }
    zip.file('media', JSON.stringify(mediaManifest));

    const archive = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
    await writeFile(outputPath, archive);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
