import { createInterface } from 'readline/promises';

/**
 * Asks for a corrected version of a reading that could not be converted.
 */
export type CorrectionPrompt = (candidate: string) => Promise<string>;

const PROMPT_MESSAGE =
  'Error in parsing pinyin, probably due to a syllable ending in a vowel without a following apostrophe. Please attempt a fix:\n';

/**
 * Prompt on the terminal with the candidate pre-filled for editing
 */
export const terminalCorrectionPrompt: CorrectionPrompt = async (candidate) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = rl.question(PROMPT_MESSAGE);
    rl.write(candidate);
    return (await answer).trim();
  } finally {
    rl.close();
  }
};

/**
 * Wrap a prompt so that concurrent callers take turns: the terminal
 * is a single shared resource.
 */
export function serializePrompt(prompt: CorrectionPrompt): CorrectionPrompt {
  let queue: Promise<unknown> = Promise.resolve();

  return (candidate) => {
    const turn = queue.then(() => prompt(candidate));
    // The next caller waits for this turn to finish, whether or not it failed;
    // the failure itself still reaches this caller through `turn`.
    queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  };
}
