import {
  GuestProfile,
  GuestRequestPriority,
  GuestRequestType,
  IntentLabel,
  ReplyIntent,
  SentimentLabel,
} from '@hotel-concierge/shared-types';

export interface ClassificationResult {
  intent: IntentLabel;
  confidence: number;
}

export interface GuestContext extends GuestProfile {
  conversationId: string;
}

export interface GuestRequestDraft {
  conversationId: string;
  userId: string;
  requestType: GuestRequestType;
  title: string;
  description: string;
  priority: GuestRequestPriority;
  roomNumber: string | null;
}

export interface ExtractedRequest {
  requestId: string;
  draft: GuestRequestDraft;
  confirmation: string;
}

export interface ConciergeReply {
  response: string;
  intent: ReplyIntent;
  confidence: number;
  sentiment: SentimentLabel;
  escalate: boolean;
  processingTimeMs: number;
  requestId: string | null;
  suggestedResponses: string[];
  error?: string;
}
