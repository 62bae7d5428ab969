import { Injectable } from '@nestjs/common';
import { INTENT_LABELS, IntentLabel } from '@hotel-concierge/shared-types';

import { ClassificationResult } from './ai.types';
import intentLexicon from './lexicon/intents.json';

export const DEFAULT_CLASSIFICATION: ClassificationResult = { intent: 'inquiry', confidence: 0.5 };

export interface IntentRule {
  intent: IntentLabel;
  keywords: readonly string[];
}

/** Taxonomy in declaration order; earlier intents win ties. */
export const INTENT_TAXONOMY: readonly IntentRule[] = INTENT_LABELS.map((intent) => ({
  intent,
  keywords: intentLexicon[intent],
}));

@Injectable()
export class IntentService {
  /**
   * Keyword-overlap classification. Confidence is the share of the winning intent's
   * keywords found in the lower-cased message.
   */
  classify(message: string): ClassificationResult {
    const normalized = message.toLowerCase();
    let best: ClassificationResult | null = null;

    for (const rule of INTENT_TAXONOMY) {
      const matched = rule.keywords.filter((keyword) => normalized.includes(keyword)).length;
      if (matched === 0) {
        continue;
      }

      const score = matched / rule.keywords.length;
      if (!best || score > best.confidence) {
        best = { intent: rule.intent, confidence: score };
      }
    }

    return best ?? { ...DEFAULT_CLASSIFICATION };
  }
}
