import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import { ChatTurn, ReplyModel } from './reply.model';

const toMessageParam = (turn: ChatTurn): ChatCompletionMessageParam => {
  switch (turn.role) {
    case 'system':
      return { role: 'system', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content };
    default:
      return { role: 'user', content: turn.content };
  }
};

export class OpenAiReplyModel extends ReplyModel {
  readonly available = true;

  constructor(
    private readonly openai: OpenAI,
    private readonly model: string,
  ) {
    super();
  }

  async complete(turns: ChatTurn[]): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: turns.map(toMessageParam),
      temperature: 0.7,
      max_tokens: 1000,
    });

    const output = response.choices[0]?.message?.content;
    if (!output) {
      throw new Error('No output from OpenAI');
    }

    return output.trim();
  }
}
