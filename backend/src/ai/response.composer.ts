import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ReplyIntent } from '@hotel-concierge/shared-types';

import fallbackTopics from './lexicon/fallback-topics.json';

interface TopicRule {
  topic: string;
  keywords: readonly string[];
  /** When any of these also appear, the guest is asking for something, not about it. */
  requestKeywords: readonly string[];
  requestReply: string | null;
  reply: string;
}

export interface HotelProfile {
  hotelName: string;
  wifiNetwork: string;
}

const TOPIC_RULES: readonly TopicRule[] = fallbackTopics;

const DEFAULT_REPLY =
  "Hello! I'm here to assist you with anything you need during your stay at {hotelName}. " +
  "What can I help you with today? Whether it's information about our amenities, making a " +
  "request, or getting recommendations, I'm happy to help!";

const containsAny = (text: string, words: readonly string[]): boolean =>
  words.some((word) => text.includes(word));

export const renderTemplate = (template: string, profile: HotelProfile): string =>
  template.replace(
    /\{(hotelName|wifiNetwork)\}/g,
    (_match, key: keyof HotelProfile) => profile[key],
  );

/** Rule-based replies for when no generative model is reachable. */
@Injectable()
export class ResponseComposer {
  private readonly profile: HotelProfile;

  constructor(private readonly configService: ConfigService) {
    const hotelName = this.configService.get<string>('HOTEL_NAME') ?? 'Grand Hotel';
    this.profile = {
      hotelName,
      wifiNetwork:
        this.configService.get<string>('HOTEL_WIFI_NETWORK') ??
        `${hotelName.replace(/\s+/g, '')}_Guest`,
    };
  }

  compose(
    message: string,
    _intent: ReplyIntent,
    documentContext: string,
    requestConfirmation: string | null,
  ): string {
    let response = this.topicAnswer(message);

    if (documentContext) {
      response += `\n\n${documentContext}`;
    }
    if (requestConfirmation) {
      response += `\n\n${requestConfirmation}`;
    }

    return response;
  }

  /** First matching topic wins, in declaration order. */
  topicAnswer(message: string): string {
    const normalized = message.toLowerCase();
    const rule = TOPIC_RULES.find((candidate) => containsAny(normalized, candidate.keywords));

    if (!rule) {
      return renderTemplate(DEFAULT_REPLY, this.profile);
    }

    const template =
      rule.requestReply && containsAny(normalized, rule.requestKeywords)
        ? rule.requestReply
        : rule.reply;
    return renderTemplate(template, this.profile);
  }
}
