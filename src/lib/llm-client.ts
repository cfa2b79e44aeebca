/**
 * LLM Client Implementation
 *
 * Wraps OpenAI SDK to communicate with OpenRouter
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type {
  LLMClient,
  LLMMessage,
  LLMRequest,
  LLMResponse,
} from '@/types/index.js';

/**
 * OpenRouter base URL
 */
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * LLM Client configuration options
 */
export interface LLMClientConfig {
  /** OpenRouter API key (required) */
  apiKey: string;

  /** Base URL override (default: OpenRouter) */
  baseURL?: string;

  /** Site URL for OpenRouter attribution */
  siteUrl?: string;

  /** Site name for OpenRouter attribution */
  siteName?: string;

  /** Request timeout in milliseconds */
  timeout?: number;
}

function toOpenAIMessage(msg: LLMMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
  }
}

/**
 * Create an LLM client for OpenRouter
 */
export function createLLMClient(config: LLMClientConfig): LLMClient {
  // Validate API key
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  // Build default headers for OpenRouter
  const defaultHeaders: Record<string, string> = {};
  if (config.siteUrl) {
    defaultHeaders['HTTP-Referer'] = config.siteUrl;
  }
  if (config.siteName) {
    defaultHeaders['X-Title'] = config.siteName;
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? OPENROUTER_BASE_URL,
    defaultHeaders,
    timeout: config.timeout ?? 60000,
  });

  return {
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const response = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        ...(request.max_tokens && { max_tokens: request.max_tokens }),
        ...(request.temperature !== undefined && {
          temperature: request.temperature,
        }),
        stream: false,
      });

      const choice = response.choices[0];
      return {
        id: response.id,
        model: response.model,
        content: choice?.message.content ?? '',
        finish_reason: choice?.finish_reason ?? null,
        usage: {
          prompt_tokens: response.usage?.prompt_tokens ?? 0,
          completion_tokens: response.usage?.completion_tokens ?? 0,
          total_tokens: response.usage?.total_tokens ?? 0,
        },
      };
    },
  };
}
