/**
 * Synthesis Service Unit Tests
 * One completion per tangent, JSON reply parsed into an insight and score
 */

import type { Mock } from 'vitest';
import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  SYNTHESIS_SYSTEM_PROMPT,
  createSynthesisService,
  parseSynthesisReply,
} from '@/services/synthesis.service.js';
import type { LLMClient, LLMResponse, SynthesisPort } from '@/types/index.js';
import { PORT_ERROR_CODES } from '@/types/index.js';

function llmResponse(content: string): LLMResponse {
  return {
    id: 'chatcmpl-test',
    model: 'openai/gpt-4o-mini',
    content,
    finish_reason: 'stop',
    usage: { prompt_tokens: 120, completion_tokens: 40, total_tokens: 160 },
  };
}

describe('parseSynthesisReply()', () => {
  it('should parse a bare JSON object', () => {
    expect(
      parseSynthesisReply('{"insight": "Waves add up.", "quality_score": 0.8}')
    ).toEqual({ insight: 'Waves add up.', qualityScore: 0.8 });
  });

  it('should parse JSON inside a code fence', () => {
    const reply = [
      'Here you go:',
      '```json',
      '{"insight": "  Waves add up.  ", "quality_score": "0.75"}',
      '```',
    ].join('\n');

    expect(parseSynthesisReply(reply)).toEqual({
      insight: 'Waves add up.',
      qualityScore: 0.75,
    });
  });

  it('should clamp the score into 0..1', () => {
    expect(
      parseSynthesisReply('{"insight": "a", "quality_score": 7}')?.qualityScore
    ).toBe(1);
    expect(
      parseSynthesisReply('{"insight": "a", "quality_score": -2}')?.qualityScore
    ).toBe(0);
  });

  it('should reject prose', () => {
    expect(parseSynthesisReply('Waves are neat.')).toBeNull();
  });

  it('should reject an empty insight', () => {
    expect(
      parseSynthesisReply('{"insight": "   ", "quality_score": 0.9}')
    ).toBeNull();
  });

  it('should reject a null, boolean or blank score', () => {
    expect(
      parseSynthesisReply('{"insight": "a", "quality_score": null}')
    ).toBeNull();
    expect(
      parseSynthesisReply('{"insight": "a", "quality_score": true}')
    ).toBeNull();
    expect(
      parseSynthesisReply('{"insight": "a", "quality_score": ""}')
    ).toBeNull();
  });

  it('should reject a non-numeric score', () => {
    expect(
      parseSynthesisReply('{"insight": "a", "quality_score": "high"}')
    ).toBeNull();
  });
});

describe('SynthesisService', () => {
  let complete: Mock<LLMClient['complete']>;
  let service: SynthesisPort;

  beforeEach(() => {
    complete = vi.fn<LLMClient['complete']>();
    service = createSynthesisService({
      llmClient: { complete },
      config: { model: 'openai/gpt-4o-mini' },
    });
  });

  it('should send the tangent and research in one request', async () => {
    complete.mockResolvedValue(
      llmResponse('{"insight": "Waves add up.", "quality_score": 0.8}')
    );

    await service.synthesize('rogue waves', '- Rogue wave: big');

    expect(complete).toHaveBeenCalledWith({
      model: 'openai/gpt-4o-mini',
      messages: [
        { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
        {
          role: 'user',
          content: 'Tangent: rogue waves\n\nResearch:\n- Rogue wave: big',
        },
      ],
      max_tokens: 400,
      temperature: 0.4,
    });
  });

  it('should return the parsed synthesis', async () => {
    complete.mockResolvedValue(
      llmResponse('{"insight": "Waves add up.", "quality_score": 0.8}')
    );

    await expect(service.synthesize('rogue waves', 'r')).resolves.toEqual({
      success: true,
      data: { insight: 'Waves add up.', qualityScore: 0.8 },
    });
  });

  it('should fail with SYNTHESIS_FAILED when the client throws', async () => {
    complete.mockRejectedValue(new Error('API rate limit exceeded'));

    await expect(service.synthesize('rogue waves', 'r')).resolves.toEqual({
      success: false,
      error: {
        code: PORT_ERROR_CODES.SYNTHESIS_FAILED,
        message: 'API rate limit exceeded',
      },
    });
  });

  it('should fail with INVALID_RESPONSE on an unparseable reply', async () => {
    complete.mockResolvedValue(llmResponse('I cannot help with that.'));

    await expect(service.synthesize('rogue waves', 'r')).resolves.toEqual({
      success: false,
      error: {
        code: PORT_ERROR_CODES.INVALID_RESPONSE,
        message: 'Synthesis reply was not valid JSON',
        details: { reply: 'I cannot help with that.' },
      },
    });
  });
});
