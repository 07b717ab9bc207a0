// ============================================================================
// Care plan generation capability
// OpenAI-compatible HTTP client plus a deterministic local generator. Every
// failure leaves here as a GenerationTransientError or
// GenerationPermanentError; upstream bodies are never carried along.
// ============================================================================

import { z } from 'zod';
import { GenerationFailureCategory } from '@careplan/shared/constants/order.constants.js';
import { GenerationPermanentError, GenerationTransientError } from '../../lib/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationResult {
  content: string;
  model: string;
  promptTokens: number | null;
  completionTokens: number | null;
}

export interface CarePlanGenerator {
  readonly model: string;
  generate(messages: ChatMessage[], options?: GenerateOptions): Promise<GenerationResult>;
}

export interface LlmClientConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
}

// ---------------------------------------------------------------------------
// Upstream status → failure category
// ---------------------------------------------------------------------------

export function classifyHttpStatus(status: number): GenerationTransientError | GenerationPermanentError {
  if (status === 429) {
    return new GenerationTransientError(GenerationFailureCategory.RATE_LIMITED, `HTTP ${status}`);
  }
  if (status >= 500) {
    return new GenerationTransientError(GenerationFailureCategory.UPSTREAM_UNAVAILABLE, `HTTP ${status}`);
  }
  if (status === 401 || status === 403) {
    return new GenerationPermanentError(GenerationFailureCategory.AUTHENTICATION, `HTTP ${status}`);
  }
  if (status === 408) {
    return new GenerationTransientError(GenerationFailureCategory.TIMEOUT, `HTTP ${status}`);
  }
  return new GenerationPermanentError(GenerationFailureCategory.BAD_REQUEST, `HTTP ${status}`);
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// OpenAI-compatible client
// ---------------------------------------------------------------------------

/**
 * Client for the OpenAI-compatible `/v1/chat/completions` protocol. Works
 * with OpenAI, vLLM, Ollama or llama.cpp. The caller owns the timeout and
 * passes it in as an AbortSignal.
 */
export function createOpenAiGenerator(config: LlmClientConfig): CarePlanGenerator {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');

  return {
    model: config.model,

    async generate(messages, options) {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
      };
      if (config.apiKey) {
        headers['Authorization'] = `Bearer ${config.apiKey}`;
      }

      const body = JSON.stringify({
        model: config.model,
        messages,
        temperature: options?.temperature ?? 0.2,
        max_tokens: options?.maxTokens ?? 2048,
      });

      let response: Response;
      try {
        response = await fetch(`${baseUrl}/v1/chat/completions`, {
          method: 'POST',
          headers,
          body,
          signal: options?.signal,
        });
      } catch (err) {
        if (isAbortError(err)) {
          throw new GenerationTransientError(GenerationFailureCategory.TIMEOUT);
        }
        throw new GenerationTransientError(GenerationFailureCategory.NETWORK);
      }

      if (!response.ok) {
        // Drain without reading the body into any error.
        await response.body?.cancel();
        throw classifyHttpStatus(response.status);
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (err) {
        if (isAbortError(err)) {
          throw new GenerationTransientError(GenerationFailureCategory.TIMEOUT);
        }
        throw new GenerationPermanentError(GenerationFailureCategory.MALFORMED_RESULT, 'response was not JSON');
      }

      const parsed = chatCompletionSchema.safeParse(json);
      if (!parsed.success) {
        throw new GenerationPermanentError(GenerationFailureCategory.MALFORMED_RESULT, 'unexpected response shape');
      }

      const choice = parsed.data.choices[0];
      return {
        content: choice.message?.content ?? '',
        model: parsed.data.model ?? config.model,
        promptTokens: parsed.data.usage?.prompt_tokens ?? null,
        completionTokens: parsed.data.usage?.completion_tokens ?? null,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Local generator (LLM_PROVIDER=mock)
// ---------------------------------------------------------------------------

export const MOCK_MODEL = 'local-mock';

function medicationFrom(messages: ChatMessage[]): string {
  const user = messages.find((m) => m.role === 'user')?.content ?? '';
  const match = /## MEDICATION\n- (.+)/.exec(user);
  return match ? match[1] : 'the prescribed medication';
}

/** Returns a fixed four-section plan so the pipeline runs without a provider. */
export function createMockGenerator(): CarePlanGenerator {
  return {
    model: MOCK_MODEL,
    async generate(messages) {
      const medication = medicationFrom(messages);
      const content = [
        'PROBLEM LIST / DRUG THERAPY PROBLEMS',
        `- Need for therapy monitoring while on ${medication}`,
        '',
        'GOALS',
        `- Complete the ${medication} course without serious adverse events`,
        '',
        'PHARMACIST INTERVENTIONS',
        '- Counsel the patient on administration, adherence and expected side effects',
        '- Reconcile the medication history with the prescriber',
        '',
        'MONITORING PLAN & LAB SCHEDULE',
        '- Baseline labs before the first dose, then per prescriber protocol',
      ].join('\n');
      return { content, model: MOCK_MODEL, promptTokens: null, completionTokens: null };
    },
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface GeneratorSettings {
  LLM_PROVIDER: 'openai' | 'mock';
  LLM_BASE_URL?: string;
  LLM_MODEL: string;
  LLM_API_KEY?: string;
}

export function createCarePlanGenerator(settings: GeneratorSettings): CarePlanGenerator {
  if (settings.LLM_PROVIDER === 'openai' && settings.LLM_BASE_URL) {
    return createOpenAiGenerator({
      baseUrl: settings.LLM_BASE_URL,
      model: settings.LLM_MODEL,
      apiKey: settings.LLM_API_KEY,
    });
  }
  return createMockGenerator();
}
