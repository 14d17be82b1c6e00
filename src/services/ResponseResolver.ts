import { AutoResponse, BotConfig } from '../database/models';

export const normalizeTrigger = (value: string): string =>
  value.trim().toLowerCase();

interface Candidate {
  entry: AutoResponse;
  length: number;
  exact: boolean;
}

/**
 * Picks the canned reply for a message, or undefined when no trigger
 * occurs in it.
 *
 * Precedence: a trigger equal to the whole (case-folded, trimmed)
 * message wins; otherwise the longest trigger found inside the message;
 * equal lengths fall back to configuration order.
 */
export function resolve(
  text: string,
  config: Pick<BotConfig, 'auto_responses'>,
): string | undefined {
  const message = normalizeTrigger(text);
  if (message.length === 0) {
    return undefined;
  }

  let best: Candidate | undefined;
  for (const entry of config.auto_responses) {
    const trigger = normalizeTrigger(entry.trigger);
    if (trigger.length === 0 || !message.includes(trigger)) {
      continue;
    }

    const candidate: Candidate = {
      entry,
      length: trigger.length,
      exact: trigger === message,
    };

    if (
      !best ||
      (candidate.exact && !best.exact) ||
      (candidate.exact === best.exact && candidate.length > best.length)
    ) {
      best = candidate;
    }
  }

  return best?.entry.reply;
}
