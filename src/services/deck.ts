import type { AnkiConfig } from '../config/index.js';
import type { AudioFile, Card } from '../types/index.js';

export interface CardTemplate {
  name: string;
  qfmt: string;
  afmt: string;
}

export interface NoteModel {
  id: number;
  name: string;
  fields: string[];
  templates: CardTemplate[];
  css: string;
}

export interface DeckNote {
  model: NoteModel;
  fields: readonly string[];
}

const CARD_CSS = `
.card {
  font-family: arial;
  font-size: 20px;
  text-align: center;
  color: black;
  background-color: white;
}
`;

const STARRED_CSS = `
.starred {
  color: red;
}
`;

/**
 * The "Mandarin Word" and "Mandarin Sentence" note types, each with a
 * Listening (audio first) and a Reading (characters first) card.
 */
export function createNoteModels(anki: AnkiConfig): { word: NoteModel; sentence: NoteModel } {
  const word: NoteModel = {
    id: anki.wordModelId,
    name: 'Mandarin Word',
    fields: ['timestamp', 'Hanzi', 'Definition', 'Audio', 'Reading', 'Similar Words'],
    templates: [
      {
        name: 'Listening',
        qfmt: 'Listen.{{Audio}}',
        afmt: [
          '{{FrontSide}}',
          '<hr id=answer>',
          '{{Hanzi}}<br>{{Reading}}<br>{{Definition}}',
          '<hr id=answer>',
          '{{Similar Words}}',
        ].join('\n'),
      },
      {
        name: 'Reading',
        qfmt: '{{Hanzi}}',
        afmt: [
          '{{FrontSide}}',
          '<hr id=answer>',
          '{{Reading}}<br>{{Definition}}<br>{{Audio}}',
          '<hr id=answer>',
          '{{Similar Words}}',
        ].join('\n'),
      },
    ],
    css: CARD_CSS,
  };

  const sentence: NoteModel = {
    id: anki.sentenceModelId,
    name: 'Mandarin Sentence',
    fields: ['timestamp', 'Hanzi', 'Meaning', 'Audio', 'Reading'],
    templates: [
      {
        name: 'Listening',
        qfmt: 'Listen.{{Audio}}',
        afmt: ['{{FrontSide}}', '<hr id=answer>', '{{Hanzi}}<br>{{Reading}}<br>{{Meaning}}'].join('\n'),
      },
      {
        name: 'Reading',
        qfmt: '{{Hanzi}}',
        afmt: ['{{FrontSide}}', '<hr id=answer>', '{{Reading}}<br>{{Meaning}}<br>{{Audio}}'].join('\n'),
      },
    ],
    css: CARD_CSS + STARRED_CSS,
  };

  return { word, sentence };
}

/**
 * In-memory deck: notes and the media they reference, in insertion order
 */
export class Deck {
  private readonly noteList: DeckNote[] = [];
  private readonly mediaList: AudioFile[] = [];
  readonly models: { word: NoteModel; sentence: NoteModel };

  constructor(
    readonly id: number,
    readonly name: string,
    readonly description: string,
    models: { word: NoteModel; sentence: NoteModel }
  ) {
    this.models = models;
  }

  get notes(): readonly DeckNote[] {
    return this.noteList;
  }

  get media(): readonly AudioFile[] {
    return this.mediaList;
  }

  addCard(card: Card): void {
    const model = card.kind === 'word' ? this.models.word : this.models.sentence;
    if (card.fields.length !== model.fields.length) {
      throw new Error(`${model.name} expects ${model.fields.length} fields, got ${card.fields.length}`);
    }
    this.noteList.push({ model, fields: card.fields });
    this.mediaList.push(card.audio);
  }
}

export function createDeck(anki: AnkiConfig): Deck {
  return new Deck(anki.deckId, anki.deckName, anki.deckDescription, createNoteModels(anki));
}
