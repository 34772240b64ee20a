import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenAI, type GenerateContentParameters } from '@google/genai';
import OpenAI from 'openai';
import type { AiProvider, Configuration } from '../types/index.js';

export interface CompletionRequest {
  system?: string;
  prompt: string;
  /** Ask the provider for a single JSON object where it supports a JSON mode. */
  json?: boolean;
  maxTokens?: number;
}

export interface LanguageModelClient {
  readonly provider: AiProvider;
  readonly model: string;
  /** Returns the reply text; empty when the model produced nothing. */
  complete(request: CompletionRequest): Promise<string>;
}

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_MAX_TOKENS = 8192;

// Retries are left to the pipeline; the SDKs' own retry loops are disabled.
const SDK_MAX_RETRIES = 0;

export type ChatCompletionCall = (
  body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
) => Promise<{ choices: Array<{ message: { content: string | null } }> }>;

export class OpenAIChatClient implements LanguageModelClient {
  private readonly createCompletion: ChatCompletionCall;

  constructor(
    readonly provider: 'openai' | 'openrouter',
    readonly model: string,
    apiKey: string,
    timeoutMs: number,
    createCompletion?: ChatCompletionCall
  ) {
    if (createCompletion) {
      this.createCompletion = createCompletion;
      return;
    }
    const client = provider === 'openrouter'
      ? new OpenAI({
          baseURL: OPENROUTER_BASE_URL,
          apiKey,
          timeout: timeoutMs,
          maxRetries: SDK_MAX_RETRIES,
          defaultHeaders: { 'X-Title': 'SEO Post Pipeline' },
        })
      : new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: SDK_MAX_RETRIES });
    this.createCompletion = (body) => client.chat.completions.create(body);
  }

  async complete({ system, prompt, json, maxTokens }: CompletionRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = system
      ? [{ role: 'system', content: system }, { role: 'user', content: prompt }]
      : [{ role: 'user', content: prompt }];

    const response = await this.createCompletion({
      model: this.model,
      messages,
      max_tokens: maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(json ? { response_format: { type: 'json_object' as const } } : {}),
    });
    return response.choices[0]?.message.content ?? '';
  }
}

export type MessageCall = (
  body: Anthropic.MessageCreateParamsNonStreaming
) => Promise<{ content: Array<{ type: string; text?: string }> }>;

export class AnthropicClient implements LanguageModelClient {
  readonly provider = 'anthropic' as const;
  private readonly createMessage: MessageCall;

  constructor(readonly model: string, apiKey: string, timeoutMs: number, createMessage?: MessageCall) {
    if (createMessage) {
      this.createMessage = createMessage;
      return;
    }
    const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: SDK_MAX_RETRIES });
    this.createMessage = (body) => client.messages.create(body);
  }

  async complete({ system, prompt, json, maxTokens }: CompletionRequest): Promise<string> {
    const instruction = json
      ? `${system ?? ''}\nRespond with only the requested JSON object inside <json> tags.`.trim()
      : system;

    const response = await this.createMessage({
      model: this.model,
      max_tokens: maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(instruction ? { system: instruction } : {}),
      messages: [{ role: 'user', content: prompt }],
    });

    const text = response.content.find(block => block.type === 'text')?.text;
    if (!text) {
      return '';
    }
    if (json) {
      const jsonMatch = text.match(/<json>([\s\S]*)<\/json>/);
      if (jsonMatch && jsonMatch[1]) {
        return jsonMatch[1];
      }
    }
    return text;
  }
}

export type GenerateContent = (params: GenerateContentParameters) => Promise<{ text?: string }>;

export class GeminiClient implements LanguageModelClient {
  readonly provider = 'gemini' as const;
  private readonly generateContent: GenerateContent;

  constructor(readonly model: string, apiKey: string, timeoutMs: number, generateContent?: GenerateContent) {
    if (generateContent) {
      this.generateContent = generateContent;
      return;
    }
    const client = new GoogleGenAI({ apiKey, httpOptions: { timeout: timeoutMs } });
    this.generateContent = (params) => client.models.generateContent(params);
  }

  async complete({ system, prompt, json, maxTokens }: CompletionRequest): Promise<string> {
    const response = await this.generateContent({
      model: this.model,
      contents: prompt,
      config: {
        maxOutputTokens: maxTokens ?? DEFAULT_MAX_TOKENS,
        ...(system ? { systemInstruction: system } : {}),
        ...(json ? { responseMimeType: 'application/json' } : {}),
      },
    });
    return response.text ?? '';
  }
}

export const createLanguageModelClient = ({ ai }: Configuration): LanguageModelClient => {
  switch (ai.provider) {
    case 'openai':
    case 'openrouter':
      return new OpenAIChatClient(ai.provider, ai.model, ai.apiKey, ai.timeoutMs);
    case 'anthropic':
      return new AnthropicClient(ai.model, ai.apiKey, ai.timeoutMs);
    case 'gemini':
      return new GeminiClient(ai.model, ai.apiKey, ai.timeoutMs);
  }
};
