import { randomInt } from 'crypto';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import type { Logger } from '../lib/logger.js';
import type { AudioFile } from '../types/index.js';

const SALT_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const SALT_LENGTH = 5;
const STEM_LENGTH = 10;

export function randomSalt(length = SALT_LENGTH): string {
  let salt = '';
  for (let i = 0; i < length; i++) {
    salt += SALT_ALPHABET[randomInt(SALT_ALPHABET.length)];
  }
  return salt;
}

/**
 * File name for a note's audio: the URL-encoded text cut or padded with
 * "-" to 10 characters, then the salt.
 *
 * e.g., ("a", "Xy12Z") -> "a---------Xy12Z.mp3"
 */
export function audioFileName(text: string, salt: string): string {
  const stem = encodeURIComponent(text).slice(0, STEM_LENGTH).padEnd(STEM_LENGTH, '-');
  return `${stem}${salt}.mp3`;
}

/**
 * Anki field referencing the audio
 */
export function soundField(audio: AudioFile): string {
  return `[sound:${audio.fileName}]`;
}

/**
 * Writes generated audio into the shared media directory.
 * Files are created exclusively, so two notes never share a file.
 */
export class AudioStore {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger,
    private readonly salt: () => string = randomSalt
  ) {}

  async save(text: string, audio: Buffer): Promise<AudioFile> {
    for (let attempt = 0; ; attempt++) {
      const fileName = audioFileName(text, this.salt());
      const path = join(this.directory, fileName);
      try {
        await writeFile(path, audio, { flag: 'wx' });
        this.logger.debug(`Audio file: ${path}`);
        return { path, fileName };
      } catch (error) {
        const exists = error instanceof Error && 'code' in error && error.code === 'EEXIST';
        if (!exists || attempt >= 2) {
          throw error;
        }
      }
    }
  }
}
