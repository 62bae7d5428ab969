export const INTENT_LABELS = [
  'booking',
  'complaint',
  'inquiry',
  'service_request',
  'checkout',
  'amenities',
  'emergency',
  'policy_inquiry',
  'concierge_request',
  'guest_request',
] as const;

export type IntentLabel = (typeof INTENT_LABELS)[number];

/** Intent reported when the pipeline itself failed. */
export type ReplyIntent = IntentLabel | 'error';

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export const DOCUMENT_CATEGORIES = ['policy', 'menu', 'amenities', 'procedures', 'general'] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

export const GUEST_REQUEST_TYPES = [
  'room_service',
  'concierge',
  'maintenance',
  'housekeeping',
  'complaint',
] as const;

export type GuestRequestType = (typeof GUEST_REQUEST_TYPES)[number];

export const GUEST_REQUEST_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;

export type GuestRequestPriority = (typeof GUEST_REQUEST_PRIORITIES)[number];

export const GUEST_REQUEST_STATUSES = ['pending', 'in_progress', 'completed', 'cancelled'] as const;

export type GuestRequestStatus = (typeof GUEST_REQUEST_STATUSES)[number];

export type ChatRole = 'user' | 'assistant';

export interface ChatHistoryMessage {
  role: ChatRole;
  content: string;
}

export interface GuestProfile {
  userId?: string;
  name?: string;
  roomNumber?: string;
  guestType?: string;
}

export interface ChatReplyPayload {
  response: string;
  conversationId: string;
  intent: ReplyIntent;
  sentiment: SentimentLabel;
  escalate: boolean;
  requestId: string | null;
  suggestedResponses: string[];
}

export interface DocumentSummary {
  id: string;
  title: string;
  category: DocumentCategory;
  originalFilename: string;
  isIndexed: boolean;
  isActive: boolean;
  uploadedAt: string;
}

export interface ChunkSummary {
  id: string;
  documentId: string;
  chunkIndex: number;
  content: string;
  pageNumber: number;
  charStart: number;
  charEnd: number;
}

export interface RetrievalHitPayload {
  chunk: ChunkSummary;
  document: DocumentSummary;
  score: number;
  content: string;
}

export const isDocumentCategory = (value: string): value is DocumentCategory =>
  (DOCUMENT_CATEGORIES as readonly string[]).includes(value);
