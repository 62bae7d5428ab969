import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatHistoryMessage, GuestProfile, ReplyIntent } from '@hotel-concierge/shared-types';

import { describeError } from '../common/errors';
import { ReplyModel } from './reply.model';
import { ResponseComposer } from './response.composer';

export interface GenerationInput {
  message: string;
  intent: ReplyIntent;
  guest: GuestProfile;
  history: ChatHistoryMessage[];
  documentContext: string;
  requestConfirmation: string | null;
}

export interface GeneratedResponse {
  text: string;
  source: 'model' | 'fallback';
}

interface HotelInfo {
  name: string;
  phone: string;
  email: string;
  address: string;
}

@Injectable()
export class ResponseGeneratorService {
  private readonly logger = new Logger(ResponseGeneratorService.name);
  private readonly systemPrompt: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly replyModel: ReplyModel,
    private readonly composer: ResponseComposer,
  ) {
    this.systemPrompt = this.buildSystemPrompt({
      name: this.configService.get<string>('HOTEL_NAME') ?? 'Grand Hotel',
      phone: this.configService.get<string>('HOTEL_PHONE') ?? '+1234567890',
      email: this.configService.get<string>('HOTEL_EMAIL') ?? 'info@grandhotel.example',
      address:
        this.configService.get<string>('HOTEL_ADDRESS') ?? '123 Main St, City, State 12345',
    });

    if (!this.replyModel.available) {
      this.logger.warn(
        'No generative backend configured. Replies will use rule-based fallbacks.',
      );
    }
  }

  async generateResponse(input: GenerationInput): Promise<GeneratedResponse> {
    if (!this.replyModel.available) {
      return this.fallback(input);
    }

    try {
      const context = this.buildContext(input);
      const systemContent = `${this.systemPrompt}\n\nCURRENT CONTEXT:\n${context}`;
      const reply = await this.replyModel.complete([
        { role: 'system', content: systemContent },
        ...input.history.map((entry) => ({ role: entry.role, content: entry.content })),
        { role: 'user', content: input.message },
      ]);

      const text = input.requestConfirmation ? `${reply}\n\n${input.requestConfirmation}` : reply;
      return { text, source: 'model' };
    } catch (error) {
      this.logger.error(`Failed to generate AI response: ${describeError(error)}`);
      return this.fallback(input);
    }
  }

  private fallback(input: GenerationInput): GeneratedResponse {
    return {
      text: this.composer.compose(
        input.message,
        input.intent,
        input.documentContext,
        input.requestConfirmation,
      ),
      source: 'fallback',
    };
  }

  private buildContext(input: GenerationInput): string {
    let context = '';
    if (input.guest.name) {
      context += `Guest Name: ${input.guest.name}\n`;
    }
    if (input.guest.roomNumber) {
      context += `Room Number: ${input.guest.roomNumber}\n`;
    }
    if (input.guest.guestType) {
      context += `Guest Type: ${input.guest.guestType}\n`;
    }
    if (input.documentContext) {
      context += `\nRelevant Hotel Information:\n${input.documentContext}`;
    }
    return context || 'None';
  }

  private buildSystemPrompt(hotel: HotelInfo): string {
    return `You are a knowledgeable hotel concierge assistant for ${hotel.name}. Provide helpful, direct answers to guest questions and assist with their needs.

HOTEL INFORMATION:
- Name: ${hotel.name}
- Phone: ${hotel.phone}
- Email: ${hotel.email}
- Address: ${hotel.address}

RESPONSE STYLE:
1. Answer the question directly first, with specific details about hotel services and amenities.
2. Offer practical solutions and alternatives in a warm, professional tone.
3. Only suggest contacting staff for tasks that need a person: actual bookings, billing problems, emergencies, maintenance needing immediate attention, or complaints requiring a manager.

Use the context below when it is relevant. If a document excerpt answers the question, prefer it over general knowledge.`;
  }
}
