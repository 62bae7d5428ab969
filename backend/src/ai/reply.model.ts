export type ChatTurnRole = 'system' | 'user' | 'assistant';

export interface ChatTurn {
  role: ChatTurnRole;
  content: string;
}

/**
 * Generative chat backend. `complete` throws when the backend fails; callers check
 * `available` before relying on it.
 */
export abstract class ReplyModel {
  abstract readonly available: boolean;

  abstract complete(turns: ChatTurn[]): Promise<string>;
}

export class NullReplyModel extends ReplyModel {
  readonly available = false;

  async complete(): Promise<string> {
    throw new Error('No generative backend is configured');
  }
}
