import { GuestRequestDraft } from '../ai/ai.types';

/** Write side for guest requests; returns the id of the stored request. */
export abstract class GuestRequestSink {
  abstract createRequest(fields: GuestRequestDraft): Promise<string>;
}
