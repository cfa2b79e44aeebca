/**
 * LLM Client Types
 *
 * Minimal chat-completion surface used by the insight synthesizer.
 */

/**
 * Message in a chat completion request
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Chat completion request
 */
export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  max_tokens?: number;
  temperature?: number;
}

/**
 * Non-streaming chat completion response
 */
export interface LLMResponse {
  id: string;
  model: string;
  content: string;
  finish_reason:
    | 'stop'
    | 'length'
    | 'content_filter'
    | 'tool_calls'
    | 'function_call'
    | null;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * LLM Client interface for making requests to OpenRouter
 */
export interface LLMClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}
