import type { Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import type {
  Card,
  MandarinSentence,
  RelatedWordSource,
  SimilarWord,
  SpeechSynthesizer,
  Token,
  Translator,
} from '../types/index.js';
import { soundField, type AudioStore } from './audio.js';
import { countDelimiters, renderMarked, renderMarkedReading, renderPlain } from './emphasis.js';
import type { PhoneticReconciler } from './phonetics.js';
import { hasDictionaryMatch } from './tokenizer.js';

export interface CardServices {
  reconciler: PhoneticReconciler;
  translator: Translator;
  speech: SpeechSynthesizer;
  relatedWords: RelatedWordSource;
  audio: AudioStore;
  clock: Clock;
}

/**
 * All English definitions of the token's entries, or undefined if there are none
 */
export function dictionaryDefinition(token: Token): string | undefined {
  if (!token.entries) return undefined;
  const definition = token.entries.flatMap(entry => entry.definitions).join(', ');
  return definition.length > 0 ? definition : undefined;
}

/**
 * Builds word and sentence cards for input rows
 */
export class CardBuilder {
  constructor(
    private readonly services: CardServices,
    private readonly logger: Logger
  ) {}

  /**
   * Word card: timestamp, Hanzi, Definition, Audio, Reading, Similar Words.
   * Returns null when the token is not a dictionary word.
   */
  async buildWordCard(token: Token, definitionOverride?: string): Promise<Card | null> {
    if (!token.entries || token.entries.length === 0) {
      this.logger.warn(`Word wasn't recognisable Mandarin: ${token.text}`);
      return null;
    }

    const { reconciler, translator, speech, relatedWords, audio, clock } = this.services;

    const definition =
      definitionOverride || dictionaryDefinition(token) || (await translator.translate(token.text));
    this.logger.debug(`Built word definition: ${definition}`);

    const audioFile = await audio.save(token.text, await speech.synthesize(token.text));

    const similarWords = await relatedWords.suggest(token.text);
    if (similarWords.length === 0) {
      this.logger.warn(`No similar words found for: ${token.text}`);
    }
    const similarWordsField = similarWords.map(word => this.formatSimilarWord(word)).join('<br>');
    this.logger.debug(`Built similar words for note: ${similarWordsField}`);

    const reading = reconciler.tokenReading(token);

    return {
      kind: 'word',
      fields: [clock.now(), token.text, definition, soundField(audioFile), reading, similarWordsField],
      audio: audioFile,
    };
  }

  /**
   * Sentence card: timestamp, Hanzi (with emphasis markup), Meaning, Audio, Reading.
   * Returns null when no part of the sentence is in the dictionary.
   */
  async buildSentenceCard(sentence: MandarinSentence, definitionOverride?: string): Promise<Card | null> {
    if (!hasDictionaryMatch(sentence.tokens)) {
      this.logger.warn(`Sentence had no recognisable Mandarin characters: ${sentence.rawText}`);
      return null;
    }

    const { reconciler, translator, speech, audio, clock } = this.services;

    if (countDelimiters(sentence.tokens) % 2 !== 0) {
      this.logger.warn(`Unbalanced emphasis markers, the last span stays open: ${sentence.rawText}`);
    }

    const plainSentence = renderPlain(sentence.tokens);
    this.logger.debug(`Built plain sentence: ${plainSentence}`);

    const noteSentence = renderMarked(sentence.tokens);
    this.logger.debug(`Built sentence for note: ${noteSentence}`);

    const definition = definitionOverride || (await translator.translate(plainSentence));
    this.logger.debug(`Built definition: ${definition}`);

    const reading = renderMarkedReading(await reconciler.sentenceReading(sentence.rawText));
    this.logger.debug(`Built reading for note: ${reading}`);

    const audioFile = await audio.save(plainSentence, await speech.synthesize(plainSentence));

    return {
      kind: 'sentence',
      fields: [clock.now(), noteSentence, definition, soundField(audioFile), reading],
      audio: audioFile,
    };
  }

  /**
   * e.g., "朋友, ㄆㄥˊ,˙ㄧㄡ, friend"
   */
  private formatSimilarWord(similar: SimilarWord): string {
    const reading = this.services.reconciler.relatedWordReading(similar.word);
    return `${similar.word}, ${reading}, ${similar.translation}`;
  }
}
