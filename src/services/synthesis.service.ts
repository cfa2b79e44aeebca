/**
 * Insight Synthesizer
 * Implements SynthesisPort with a single chat completion
 *
 * The model is asked for a JSON object with the insight and a 0-1 quality
 * score. Replies that do not parse are INVALID_RESPONSE; client errors are
 * SYNTHESIS_FAILED. Never throws.
 */

import { z } from 'zod';

import type {
  LLMClient,
  Result,
  Synthesis,
  SynthesisPort,
} from '@/types/index.js';
import { PORT_ERROR_CODES, errorMessage, failure, success } from '@/types/index.js';

export const SYNTHESIS_SYSTEM_PROMPT = [
  'You turn a curious tangent and some raw web research into one short, concrete insight.',
  'Say something the research supports that would be worth bringing up in a later conversation.',
  'Rate the insight from 0 to 1: 1 is surprising, specific and well supported; 0 is vague or unsupported.',
  'Reply with JSON only: {"insight": "<two to four sentences>", "quality_score": <number>}',
].join('\n');

const synthesisReplySchema = z.object({
  insight: z.string().trim().min(1),
  // Numeric strings are accepted; null, booleans and blanks are not
  quality_score: z.union([
    z.number(),
    z.string().trim().min(1).transform(Number),
  ]),
});

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pull the JSON object out of a model reply (bare or inside a code fence)
 */
export function parseSynthesisReply(content: string): Synthesis | null {
  const fenced = FENCED_BLOCK.exec(content);
  const candidate = (fenced?.[1] ?? content).trim();

  let raw: unknown;
  try {
    raw = JSON.parse(candidate);
  } catch {
    return null;
  }

  const parsed = synthesisReplySchema.safeParse(raw);
  if (!parsed.success || !Number.isFinite(parsed.data.quality_score)) {
    return null;
  }

  return {
    insight: parsed.data.insight,
    qualityScore: Math.min(1, Math.max(0, parsed.data.quality_score)),
  };
}

export interface SynthesisServiceConfig {
  model: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Create a SynthesisPort backed by an LLM client
 */
export function createSynthesisService(deps: {
  llmClient: LLMClient;
  config: SynthesisServiceConfig;
}): SynthesisPort {
  const { llmClient, config } = deps;

  return {
    async synthesize(
      tangent: string,
      research: string
    ): Promise<Result<Synthesis>> {
      let content: string;
      try {
        const response = await llmClient.complete({
          model: config.model,
          messages: [
            { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
            {
              role: 'user',
              content: `Tangent: ${tangent}\n\nResearch:\n${research}`,
            },
          ],
          max_tokens: config.maxTokens ?? 400,
          temperature: config.temperature ?? 0.4,
        });
        content = response.content;
      } catch (err) {
        return failure(PORT_ERROR_CODES.SYNTHESIS_FAILED, errorMessage(err));
      }

      const synthesis = parseSynthesisReply(content);
      if (synthesis === null) {
        return failure(
          PORT_ERROR_CODES.INVALID_RESPONSE,
          'Synthesis reply was not valid JSON',
          { reply: content.slice(0, 200) }
        );
      }

      return success(synthesis);
    },
  };
}
