import { Injectable, Logger } from '@nestjs/common';

import { describeError } from '../common/errors';
import { ConversationHistory } from '../conversations/conversation.history';
import { RetrievalService } from '../documents/retrieval.service';
import { LoggingService } from '../logging/logging.service';
import { ConciergeReply, GuestContext } from './ai.types';
import { EscalationService } from './escalation.service';
import { IntentService } from './intent.service';
import { RequestExtractorService } from './request.extractor';
import { ResponseGeneratorService } from './response.generator';
import { SentimentService } from './sentiment.service';
import { suggestedResponses } from './suggestions';

const HISTORY_LIMIT = 10;

export const APOLOGY_REPLY =
  "I apologize, but I'm experiencing technical difficulties. " +
  'Please contact our front desk for immediate assistance.';

@Injectable()
export class AiEngineService {
  private readonly logger = new Logger(AiEngineService.name);

  constructor(
    private readonly intentService: IntentService,
    private readonly sentimentService: SentimentService,
    private readonly escalationService: EscalationService,
    private readonly requestExtractor: RequestExtractorService,
    private readonly responseGenerator: ResponseGeneratorService,
    private readonly retrievalService: RetrievalService,
    private readonly conversationHistory: ConversationHistory,
    private readonly loggingService: LoggingService,
  ) {}

  /**
   * Runs one guest message through classification, retrieval, request capture and reply
   * generation. Never throws; a fault produces an apology that is flagged for staff.
   */
  async generateResponse(message: string, guest: GuestContext): Promise<ConciergeReply> {
    const startedAt = Date.now();

    try {
      const classification = this.intentService.classify(message);
      const sentiment = this.sentimentService.analyze(message);

      const history = await this.conversationHistory.recentMessages(
        guest.conversationId,
        HISTORY_LIMIT,
      );
      const documentContext = await this.retrievalService.buildContext(message);
      const request = await this.requestExtractor.maybeExtract(
        message,
        classification.intent,
        guest,
      );

      const generated = await this.responseGenerator.generateResponse({
        message,
        intent: classification.intent,
        guest,
        history,
        documentContext,
        requestConfirmation: request?.confirmation ?? null,
      });

      const triggers = this.escalationService.triggers(message, classification.intent, sentiment);
      const escalate = triggers.length > 0;
      const processingTimeMs = Date.now() - startedAt;

      this.loggingService.logMessageProcessing(guest.conversationId, classification.intent, {
        confidence: classification.confidence,
        sentiment,
        escalate,
        source: generated.source,
        requestId: request?.requestId ?? null,
        processingTimeMs,
      });
      if (escalate) {
        this.loggingService.logEscalation(guest.conversationId, message, { triggers, sentiment });
      }

      return {
        response: generated.text,
        intent: classification.intent,
        confidence: classification.confidence,
        sentiment,
        escalate,
        processingTimeMs,
        requestId: request?.requestId ?? null,
        suggestedResponses: suggestedResponses(classification.intent),
      };
    } catch (error) {
      const reason = describeError(error);
      this.logger.error(`Message processing failed for ${guest.conversationId}: ${reason}`);

      return {
        response: APOLOGY_REPLY,
        intent: 'error',
        confidence: 0,
        sentiment: 'neutral',
        escalate: true,
        processingTimeMs: Date.now() - startedAt,
        requestId: null,
        suggestedResponses: suggestedResponses('error'),
        error: reason,
      };
    }
  }
}
