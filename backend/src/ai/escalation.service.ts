import { Injectable } from '@nestjs/common';
import { IntentLabel, ReplyIntent, SentimentLabel } from '@hotel-concierge/shared-types';

const SEVERITY_WORDS = ['manager', 'supervisor', 'complaint', 'refund'];
const HANDOFF_WORDS = ['human', 'agent'];
const HANDOFF_PHRASE = 'speak to someone';
const EMERGENCY_INTENT: IntentLabel = 'emergency';

export type EscalationTrigger =
  | 'emergency'
  | 'negative_severity'
  | 'handoff_word'
  | 'handoff_phrase';

@Injectable()
export class EscalationService {
  shouldEscalate(message: string, intent: ReplyIntent, sentiment: SentimentLabel): boolean {
    return this.triggers(message, intent, sentiment).length > 0;
  }

  /** Every independent trigger that fired; any one of them escalates. */
  triggers(message: string, intent: ReplyIntent, sentiment: SentimentLabel): EscalationTrigger[] {
    const normalized = message.toLowerCase();
    const fired: EscalationTrigger[] = [];

    if (intent === EMERGENCY_INTENT) {
      fired.push('emergency');
    }
    if (sentiment === 'negative' && SEVERITY_WORDS.some((word) => normalized.includes(word))) {
      fired.push('negative_severity');
    }
    if (HANDOFF_WORDS.some((word) => normalized.includes(word))) {
      fired.push('handoff_word');
    }
    if (normalized.includes(HANDOFF_PHRASE)) {
      fired.push('handoff_phrase');
    }

    return fired;
  }
}
