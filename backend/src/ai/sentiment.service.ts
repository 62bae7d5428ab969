import { Injectable } from '@nestjs/common';
import { SentimentLabel } from '@hotel-concierge/shared-types';

import sentimentLexicon from './lexicon/sentiment.json';

const countContained = (message: string, words: readonly string[]): number =>
  words.filter((word) => message.includes(word)).length;

@Injectable()
export class SentimentService {
  analyze(message: string): SentimentLabel {
    const normalized = message.toLowerCase();
    const positive = countContained(normalized, sentimentLexicon.positive);
    const negative = countContained(normalized, sentimentLexicon.negative);

    if (negative > positive) {
      return 'negative';
    }
    if (positive > negative) {
      return 'positive';
    }
    return 'neutral';
  }
}
