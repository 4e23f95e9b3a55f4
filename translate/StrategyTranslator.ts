/**
 * Natural language → JSON strategy translation
 * The shipped translator calls an OpenAI-compatible chat-completions endpoint
 */

import axios from 'axios';
import { z } from 'zod';
import { ConditionSchema, formatIssues, StrategyJson } from '../spec/schema';
import { describeError, TranslationError } from '../compiler/errors';
import { TranslatorConfig } from '../config';
import {
  generateTranslationSystemPrompt,
  generateTranslationUserPrompt,
} from '../lib/dslDocGenerator';
import { Logger, LoggerFactory } from '../logging/logger';

export interface StrategyTranslator {
  translate(text: string): Promise<StrategyJson>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// Both sections must be present in a translated reply, even if empty
const TranslatedStrategySchema = z.object({
  entry: z.array(ConditionSchema),
  exit: z.array(ConditionSchema),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

const MAX_TOKENS = 2000;

/**
 * Pull the outermost {...} block out of a reply (models like to wrap JSON in
 * prose or code fences) and validate it.
 */
export function extractStrategyJson(reply: string): StrategyJson {
  const match = reply.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new TranslationError(`No JSON object found in translator reply: ${reply}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(match[0]);
  } catch (error) {
    throw new TranslationError(`Translator reply is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = TranslatedStrategySchema.safeParse(raw);
  if (!parsed.success) {
    throw new TranslationError(`Translator reply does not match the strategy format: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}: ${JSON.stringify(error.response.data)}`;
    }
    return error.message;
  }
  return describeError(error);
}

/**
 * Chat-completions translator
 */
export class ChatCompletionTranslator implements StrategyTranslator {
  private readonly logger: Logger;
  private readonly apiKey: string;

  constructor(
    private readonly config: TranslatorConfig,
    logger?: Logger
  ) {
    if (!config.apiKey) {
      throw new TranslationError('TRANSLATOR_API_KEY (or GROQ_API_KEY) is not set');
    }
    this.apiKey = config.apiKey;
    this.logger = logger ?? LoggerFactory.getLogger('StrategyTranslator');
  }

  async translate(text: string): Promise<StrategyJson> {
    if (!text.trim()) {
      throw new TranslationError('Natural language input is empty');
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: generateTranslationSystemPrompt() },
      { role: 'user', content: generateTranslationUserPrompt(text) },
    ];

    this.logger.info('Requesting translation', { model: this.config.model, chars: text.length });

    let reply: string;
    try {
      reply = await this.requestCompletion(messages);
    } catch (error) {
      if (error instanceof TranslationError) throw error;
      const reason = describeRequestError(error);
      this.logger.error('Translation request failed', error, { reason });
      throw new TranslationError(`Translator request failed: ${reason}`, { cause: error });
    }

    const strategy = extractStrategyJson(reply);
    this.logger.info('Translation received', {
      entryConditions: strategy.entry.length,
      exitConditions: strategy.exit.length,
    });
    return strategy;
  }

  /**
   * Send one chat completion and return the assistant's text
   */
  protected async requestCompletion(messages: ChatMessage[]): Promise<string> {
    const response = await axios.post<unknown>(
      `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`,
      {
        model: this.config.model,
        messages,
        temperature: this.config.temperature,
        max_tokens: MAX_TOKENS,
      },
      {
        timeout: this.config.timeoutMs,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
      }
    );

    const parsed = ChatCompletionSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TranslationError(`Unexpected completion response: ${formatIssues(parsed.error)}`);
    }

    const content = parsed.data.choices[0].message.content;
    if (!content) {
      throw new TranslationError('Completion response has no content');
    }
    return content;
  }
}
