import fetch from 'node-fetch';
import { z } from 'zod';
import { AppConfig } from '../config';

const GENERATE_TIMEOUT_MS = 45_000;

export const GENERATION_CONFIG = {
  temperature: 0.4,
  maxOutputTokens: 4096,
  topP: 0.8,
  topK: 40,
} as const;

export type GenerationFailureReason =
  | 'missing_key'
  | 'network'
  | 'http'
  | 'api_error'
  | 'bad_response';

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; reason: GenerationFailureReason; message: string };

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).min(1),
        }),
      }),
    )
    .min(1),
});

const errorPayloadSchema = z.object({
  error: z.union([z.string(), z.record(z.string(), z.unknown())]),
});

function failure(
  reason: GenerationFailureReason,
  message: string,
): GenerationResult {
  console.error(`❌ Gemini ${reason}: ${message}`);
  return { ok: false, reason, message };
}

export function buildGenerateUrl(config: AppConfig): string {
  return `${config.geminiUrl}/${config.model}:generateContent`;
}

/**
 * Sends the prompt as a single user message and returns the first
 * candidate's text. Never throws.
 */
export async function generateText(
  config: AppConfig,
  prompt: string,
): Promise<GenerationResult> {
  if (!config.geminiKey) {
    return failure('missing_key', 'Gemini API key not configured.');
  }

  let data: unknown;
  try {
    const res = await fetch(buildGenerateUrl(config), {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': config.geminiKey,
      },
      body: JSON.stringify({
        contents: [{ parts: [{ text: prompt }] }],
        generationConfig: GENERATION_CONFIG,
      }),
      timeout: GENERATE_TIMEOUT_MS,
    });

    if (!res.ok) {
      const body = await res.text();
      return failure('http', `Gemini API error: ${res.status} ${body}`);
    }

    data = await res.json();
  } catch (err) {
    return failure('network', err instanceof Error ? err.message : String(err));
  }

  const errorPayload = errorPayloadSchema.safeParse(data);
  if (errorPayload.success) {
    return failure('api_error', JSON.stringify(errorPayload.data.error));
  }

  const parsed = generateResponseSchema.safeParse(data);
  if (!parsed.success) {
    return failure('bad_response', 'Gemini API returned no candidate text.');
  }

  return { ok: true, text: parsed.data.candidates[0].content.parts[0].text };
}
