import { BotConfig, ModerationDecision } from '../database/models';

/**
 * Decides whether a text is advertising. Detection rules live outside the
 * classifier and are supplied by whoever builds the pipeline.
 */
export type AdvertisementPredicate = (text: string) => boolean;

export interface ClassifyOptions {
  isAdvertisement?: AdvertisementPredicate;
}

export const MAX_EXCLAMATION_MARKS = 5;

export const neverAdvertisement: AdvertisementPredicate = () => false;

/**
 * Builds a predicate that flags text matching any of the given patterns.
 * Patterns are operator-supplied (AD_PATTERNS); none are built in.
 */
export function createPatternAdvertisementPredicate(
  patterns: RegExp[],
): AdvertisementPredicate {
  if (patterns.length === 0) {
    return neverAdvertisement;
  }
  // Global or sticky flags would make test() stateful between calls
  const safePatterns = patterns.map(
    (pattern) => new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')),
  );
  return (text) => safePatterns.some((pattern) => pattern.test(text));
}

const countExclamationMarks = (text: string): number => {
  let count = 0;
  for (const char of text) {
    if (char === '!') count++;
  }
  return count;
};

/**
 * Classifies a message against a chat's configuration. Checks run in a
 * fixed order and the first hit wins: spam, offensive, advertisement.
 */
export function classify(
  text: string,
  config: Pick<BotConfig, 'blocked_words' | 'max_message_length'>,
  options: ClassifyOptions = {},
): ModerationDecision {
  // Counted in code points, so an emoji is one character
  const length = [...text].length;
  if (length > config.max_message_length) {
    return {
      verdict: 'spam',
      reason: `Сообщение слишком длинное: ${length} символов`,
    };
  }

  const exclamations = countExclamationMarks(text);
  if (exclamations > MAX_EXCLAMATION_MARKS) {
    return {
      verdict: 'spam',
      reason: `Слишком много восклицательных знаков: ${exclamations}`,
    };
  }

  const lowered = text.toLowerCase();
  const found = config.blocked_words.filter((word) => {
    const needle = word.trim().toLowerCase();
    return needle.length > 0 && lowered.includes(needle);
  });
  if (found.length > 0) {
    return {
      verdict: 'offensive',
      reason: `Запрещенные слова: ${found.slice(0, 3).join(', ')}`,
    };
  }

  const isAdvertisement = options.isAdvertisement ?? neverAdvertisement;
  if (isAdvertisement(text)) {
    return { verdict: 'advertisement', reason: 'Реклама' };
  }

  return { verdict: 'ok' };
}
