import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import JSZip from 'jszip';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { createDeck, createNoteModels } from '../src/services/deck.js';
import { fieldChecksum, writePackage } from '../src/services/package.js';
import type { AudioFile, Card } from '../src/types/index.js';
import { testConfig } from './helpers/fixtures.js';

const NOW = 1_700_000_000_000;
const anki = testConfig().anki;

const ModelsSchema = z.record(
  z.object({
    name: z.string(),
    flds: z.array(z.object({ name: z.string(), ord: z.number() })),
    tmpls: z.array(z.object({ name: z.string(), qfmt: z.string() })),
    req: z.array(z.tuple([z.number(), z.string(), z.array(z.number())])),
    css: z.string(),
  })
);

const DecksSchema = z.record(z.object({ id: z.number(), name: z.string() }));

describe('Deck', () => {
  it('files each card under its note model and keeps its audio', () => {
    const deck = createDeck(anki);
    const audio: AudioFile = { path: '/tmp/a.mp3', fileName: 'a.mp3' };

    deck.addCard({ kind: 'word', fields: ['1', '你好', 'hello', '[sound:a.mp3]', 'ㄋㄧˇ,ㄏㄠˇ', ''], audio });
    deck.addCard({ kind: 'sentence', fields: ['2', '我很好', "I'm fine", '[sound:a.mp3]', 'ㄨㄛˇ,ㄏㄣˇ,ㄏㄠˇ'], audio });

    expect(deck.notes.map(note => note.model.name)).toEqual(['Mandarin Word', 'Mandarin Sentence']);
    expect(deck.media).toEqual([audio, audio]);
    expect(deck.name).toBe('Test Deck');
  });

  it('highlights starred text only on sentence cards', () => {
    const { word, sentence } = createNoteModels(anki);
    expect(word.id).toBe(anki.wordModelId);
    expect(sentence.css).toContain('.starred');
    expect(word.css).not.toContain('.starred');
  });
});

describe('fieldChecksum', () => {
  it('hashes the field with markup removed', () => {
    expect(fieldChecksum('abc')).toBe(0xa9993e36);
    expect(fieldChecksum('<b>abc</b>')).toBe(0xa9993e36);
  });
});

describe('writePackage', () => {
  let directory: string;
  let cards: Card[];

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'package-test-'));

    const wordAudio = { path: join(directory, 'word.mp3'), fileName: '%E4%BD%A0%AAAAA.mp3' };
    const sentenceAudio = { path: join(directory, 'sentence.mp3'), fileName: '%E6%88%91%BBBBB.mp3' };
    await writeFile(wordAudio.path, 'word audio');
    await writeFile(sentenceAudio.path, 'sentence audio');

    cards = [
      {
        kind: 'word',
        fields: ['1700000000000000001', '你好', 'hello, hi', '[sound:%E4%BD%A0%AAAAA.mp3]', 'ㄋㄧˇ,ㄏㄠˇ', ''],
        audio: wordAudio,
      },
      {
        kind: 'sentence',
        fields: [
          '1700000000000000002',
          '我很<span class=starred>好</span>',
          "I'm fine",
          '[sound:%E6%88%91%BBBBB.mp3]',
          'ㄨㄛˇ,ㄏㄣˇ,<span class=starred>ㄏㄠˇ</span>',
        ],
        audio: sentenceAudio,
      },
    ];
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  async function buildPackage(): Promise<{ zip: JSZip; db: Database.Database }> {
    const deck = createDeck(anki);
    cards.forEach(card => deck.addCard(card));

    const outputPath = join(directory, 'output.apkg');
    await writePackage(deck, outputPath, NOW);

    const zip = await JSZip.loadAsync(await readFile(outputPath));
    const collection = zip.file('collection.anki2');
    if (!collection) throw new Error('collection.anki2 missing from package');

    const collectionPath = join(directory, 'collection.anki2');
    await writeFile(collectionPath, await collection.async('nodebuffer'));
    return { zip, db: new Database(collectionPath, { readonly: true }) };
  }

  it('bundles the collection, the media manifest and the audio', async () => {
    const { zip, db } = await buildPackage();
    db.close();

    expect(Object.keys(zip.files).sort()).toEqual(['0', '1', 'collection.anki2', 'media']);
    expect(JSON.parse(await zip.file('media')?.async('string') ?? '{}')).toEqual({
      0: '%E4%BD%A0%AAAAA.mp3',
      1: '%E6%88%91%BBBBB.mp3',
    });
    expect(await zip.file('0')?.async('string')).toBe('word audio');
    expect(await zip.file('1')?.async('string')).toBe('sentence audio');
  });

  it('writes one note per card with its fields', async () => {
    const { db } = await buildPackage();
    try {
      const notes = db
        .prepare<[], { id: number; mid: number; flds: string; csum: number }>(
          'SELECT id, mid, flds, csum FROM notes ORDER BY id'
        )
        .all();

      expect(notes.map(note => note.mid)).toEqual([anki.wordModelId, anki.sentenceModelId]);
      expect(notes.map(note => note.flds.split('\x1f'))).toEqual(cards.map(card => [...card.fields]));
      expect(notes[0].csum).toBe(fieldChecksum('1700000000000000001'));
    } finally {
      db.close();
    }
  });

  it('creates a card for each template in the deck', async () => {
    const { db } = await buildPackage();
    try {
      const cardRows = db
        .prepare<[], { nid: number; did: number; ord: number; due: number }>(
          'SELECT nid, did, ord, due FROM cards ORDER BY id'
        )
        .all();

      expect(cardRows).toEqual([
        { nid: NOW, did: anki.deckId, ord: 0, due: 0 },
        { nid: NOW, did: anki.deckId, ord: 1, due: 0 },
        { nid: NOW + 3, did: anki.deckId, ord: 0, due: 1 },
        { nid: NOW + 3, did: anki.deckId, ord: 1, due: 1 },
      ]);
    } finally {
      db.close();
    }
  });

  it('describes the note models and the deck in the collection', async () => {
    const { db } = await buildPackage();
    try {
      const col = db
        .prepare<[], { crt: number; mod: number; models: string; decks: string }>(
          'SELECT crt, mod, models, decks FROM col'
        )
        .get();
      if (!col) throw new Error('col row missing');

      expect(col.crt).toBe(NOW / 1000);
      expect(col.mod).toBe(NOW);

      const models = ModelsSchema.parse(JSON.parse(col.models));
      const word = models[String(anki.wordModelId)];
      expect(word.name).toBe('Mandarin Word');
      expect(word.flds.map(f => f.name)).toEqual(['timestamp', 'Hanzi', 'Definition', 'Audio', 'Reading', 'Similar Words']);
      expect(word.tmpls.map(t => t.name)).toEqual(['Listening', 'Reading']);
      expect(word.req).toEqual([
        [0, 'any', [3]],
        [1, 'any', [1]],
      ]);
      expect(models[String(anki.sentenceModelId)].name).toBe('Mandarin Sentence');

      const decks = DecksSchema.parse(JSON.parse(col.decks));
      expect(decks['1'].name).toBe('Default');
      expect(decks[String(anki.deckId)]).toMatchObject({ id: anki.deckId, name: 'Test Deck' });
    } finally {
      db.close();
    }
  });
});
