import { ReplyIntent } from '@hotel-concierge/shared-types';

import suggestionLexicon from './lexicon/suggestions.json';

const SUGGESTIONS: ReadonlyMap<string, readonly string[]> = new Map(
  Object.entries(suggestionLexicon),
);

export const DEFAULT_SUGGESTIONS: readonly string[] = ['How can I help you today?'];

/** Quick replies offered to staff alongside the generated answer. */
export const suggestedResponses = (intent: ReplyIntent): string[] => [
  ...(SUGGESTIONS.get(intent) ?? DEFAULT_SUGGESTIONS),
];
