import { Injectable, Logger } from '@nestjs/common';
import {
  GuestRequestPriority,
  GuestRequestType,
  ReplyIntent,
} from '@hotel-concierge/shared-types';

import { describeError } from '../common/errors';
import { GuestRequestSink } from '../requests/request.sink';
import { ExtractedRequest, GuestContext, GuestRequestDraft } from './ai.types';

const RECORDABLE_INTENTS: ReadonlyMap<ReplyIntent, GuestRequestType> = new Map<
  ReplyIntent,
  GuestRequestType
>([
  ['service_request', 'room_service'],
  ['guest_request', 'concierge'],
  ['concierge_request', 'concierge'],
]);

const URGENT_KEYWORDS = ['urgent', 'emergency', 'asap', 'immediately', 'now'];
const HIGH_KEYWORDS = ['important', 'soon', 'quickly', 'priority'];
const TITLE_WORD_LIMIT = 8;

export const isRecordableIntent = (intent: ReplyIntent): boolean => RECORDABLE_INTENTS.has(intent);

export const requestTypeFor = (intent: ReplyIntent): GuestRequestType =>
  RECORDABLE_INTENTS.get(intent) ?? 'concierge';

export const extractTitle = (message: string): string =>
  message
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, TITLE_WORD_LIMIT)
    .join(' ');

export const determinePriority = (message: string): GuestRequestPriority => {
  const normalized = message.toLowerCase();
  if (URGENT_KEYWORDS.some((keyword) => normalized.includes(keyword))) {
    return 'urgent';
  }
  if (HIGH_KEYWORDS.some((keyword) => normalized.includes(keyword))) {
    return 'high';
  }
  return 'medium';
};

@Injectable()
export class RequestExtractorService {
  private readonly logger = new Logger(RequestExtractorService.name);

  constructor(private readonly requestSink: GuestRequestSink) {}

  /**
   * Records at most one guest request for messages whose intent asks for service.
   * Returns `null` for other intents, or when the request could not be stored.
   */
  async maybeExtract(
    message: string,
    intent: ReplyIntent,
    context: GuestContext,
  ): Promise<ExtractedRequest | null> {
    if (!isRecordableIntent(intent)) {
      return null;
    }

    const draft: GuestRequestDraft = {
      conversationId: context.conversationId,
      userId: context.userId ?? 'unknown',
      requestType: requestTypeFor(intent),
      title: extractTitle(message),
      description: message,
      priority: determinePriority(message),
      roomNumber: context.roomNumber ?? null,
    };

    try {
      const requestId = await this.requestSink.createRequest(draft);
      return {
        requestId,
        draft,
        confirmation: `Request #${requestId.slice(0, 8)} has been recorded and will be processed.`,
      };
    } catch (error) {
      this.logger.warn(
        `Failed to record ${draft.requestType} request for conversation ${
          context.conversationId
        }: ${describeError(error)}`,
      );
      return null;
    }
  }
}
