/**
 * OpenAI-backed vision providers: product identification and condition
 * description from item photos. Both are best effort and resolve to null on
 * any failure (missing key, timeout, HTTP error, unparseable JSON).
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { z } from 'zod';
import { cfg } from '../../config.js';
import { createLogger, errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import { withTimeout } from '../pricing/cancellation.js';
import type { RawConditionFactor } from '../pricing/condition-assessor.js';
import { ITEM_CATEGORIES } from '../pricing/types.js';
import type { RawIdentificationGuess } from '../pricing/types.js';

export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
    };
  };
}

export interface ConditionDescription {
  narrative: string;
  factors: RawConditionFactor[];
}

export interface IdentificationProvider {
  identify(images: readonly string[], texts: readonly string[]): Promise<RawIdentificationGuess | null>;
}

export interface ConditionProvider {
  describeCondition(images: readonly string[]): Promise<ConditionDescription | null>;
}

export interface OpenAIVisionOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  client?: ChatClient;
  logger?: Logger;
}

// models answer with null for fields they cannot see
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const GuessSchema = z.object({
  productName: optionalText,
  brand: optionalText,
  productLine: optionalText,
  variant: optionalText,
  styleCode: optionalText,
  colorway: optionalText,
  size: optionalText,
  category: optionalText,
  confidence: z.coerce.number().finite().default(0),
});

const ConditionSchema = z.object({
  narrative: z.string().default(''),
  factors: z
    .array(
      z.object({
        area: optionalText,
        issue: optionalText,
        severity: optionalText,
        valueImpactPercent: z.coerce.number().optional(),
      })
    )
    .default([]),
});

const IDENTIFY_PROMPT = [
  'Identify the product in these photos for a resale listing.',
  'Respond with JSON only:',
  '{ "productName": string, "brand": string, "productLine": string, "variant": string,',
  '  "styleCode": string, "colorway": string, "size": string,',
  `  "category": one of ${ITEM_CATEGORIES.join(' | ')}, "confidence": number 0-1 }`,
  'Use "Unknown" for the product name when you cannot tell, and a low confidence when guessing.',
  'Never invent a style code or size that is not visible.',
].join('\n');

const CONDITION_PROMPT = [
  'Describe the physical condition of this item for a resale buyer.',
  'Start the narrative with an eBay condition label (New with tags, New without tags, New other,',
  'Like New, Excellent, Very Good, Good, Acceptable, For parts or not working).',
  'Respond with JSON only:',
  '{ "narrative": string, "factors": [ { "area": string, "issue": string,',
  '  "severity": "minor" | "moderate" | "major" | "critical", "valueImpactPercent": number } ] }',
].join('\n');

function imageParts(images: readonly string[]): ChatCompletionContentPart[] {
  return images
    .map((url) => url.trim())
    .filter(Boolean)
    .map((url): ChatCompletionContentPart => ({ type: 'image_url', image_url: { url } }));
}

function parseJsonContent(response: ChatCompletion): unknown {
  const payload = response.choices[0]?.message?.content || '{}';
  return JSON.parse(payload);
}

export class OpenAIVisionProvider implements IdentificationProvider, ConditionProvider {
  private readonly client: ChatClient | null;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: OpenAIVisionOptions = {}) {
    const apiKey = options.apiKey ?? cfg.vision.apiKey;
    this.log = options.logger ?? createLogger('openai-vision');
    this.model = options.model ?? cfg.vision.model;
    this.timeoutMs = options.timeoutMs ?? cfg.vision.timeoutMs;
    this.client = options.client ?? (apiKey ? new OpenAI({ apiKey, maxRetries: 1 }) : null);
    if (!this.client) {
      this.log.warn('OPENAI_API_KEY not set; vision identification is disabled');
    }
  }

  private async complete(system: string, content: ChatCompletionContentPart[]): Promise<unknown> {
    const client = this.client;
    if (!client) return null;
    const response = await withTimeout(this.timeoutMs, 'vision request', (signal) =>
      client.chat.completions.create(
        {
          model: this.model,
          temperature: 0.2,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: system },
            { role: 'user', content },
          ],
        },
        { signal }
      )
    );
    return parseJsonContent(response);
  }

  async identify(images: readonly string[], texts: readonly string[]): Promise<RawIdentificationGuess | null> {
    const parts = imageParts(images);
    if (parts.length === 0 || !this.client) return null;

    const textHint = texts.length > 0 ? `\nText read from the item: ${texts.join(' | ')}` : '';
    try {
      const raw = await this.complete('You are a strict JSON-only product photo parser.', [
        { type: 'text', text: IDENTIFY_PROMPT + textHint },
        ...parts,
      ]);
      const parsed = GuessSchema.safeParse(raw);
      if (!parsed.success) {
        this.log.warn('Identification response failed validation', { issues: parsed.error.issues.length });
        return null;
      }
      return parsed.data;
    } catch (err) {
      this.log.warn('Identification request failed', { error: errorMessage(err) });
      return null;
    }
  }

  async describeCondition(images: readonly string[]): Promise<ConditionDescription | null> {
    const parts = imageParts(images);
    if (parts.length === 0 || !this.client) return null;

    try {
      const raw = await this.complete('You are a careful resale condition grader. Answer in JSON.', [
        { type: 'text', text: CONDITION_PROMPT },
        ...parts,
      ]);
      const parsed = ConditionSchema.safeParse(raw);
      if (!parsed.success) {
        this.log.warn('Condition response failed validation', { issues: parsed.error.issues.length });
        return null;
      }
      return parsed.data;
    } catch (err) {
      this.log.warn('Condition request failed', { error: errorMessage(err) });
      return null;
    }
  }
}
