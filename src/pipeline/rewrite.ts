import OpenAI, { APIConnectionError, APIConnectionTimeoutError } from 'openai';
import { ENV } from './env';
import { errorMessage, NetworkError, TimeoutError } from './errors';
import { withRetry, DEFAULT_RETRY_CONFIG } from './retry';
import { startStep, warn } from './log';

export const REWRITE_ERROR_PREFIX = 'Error calling model: ';

/** The one call the rewrite step needs from a chat model. */
export interface ChatCompletionClient {
  complete(prompt: string, model: string): Promise<string>;
}

export interface RewriteOptions {
  model?: string;
  baseURL?: string;
  maxRetries?: number;
  retryDelay?: number;
  /** Injected in tests */
  client?: ChatCompletionClient;
}

export function buildRewritePrompt(text: string, instructionPrompt: string): string {
  return `${instructionPrompt}\n\nHere is the text:\n---\n${text}\n---`;
}

/**
 * Gemini through its OpenAI-compatible endpoint. SDK-level retries are off;
 * `rewrite` retries transient failures itself.
 */
export function createOpenAiClient(apiKey: string, baseURL = ENV.geminiBaseUrl): ChatCompletionClient {
  const openai = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
  return {
    async complete(prompt, model) {
      try {
        const resp = await openai.chat.completions.create({
          model,
          messages: [{ role: 'user', content: prompt }],
        });
        return String(resp.choices[0]?.message?.content ?? '').trim();
      } catch (e) {
        if (e instanceof APIConnectionTimeoutError) {
          throw new TimeoutError(`Model request timed out: ${e.message}`);
        }
        if (e instanceof APIConnectionError) {
          throw new NetworkError(`Model connection error: ${e.message}`);
        }
        throw e;
      }
    },
  };
}

/**
 * Rewrites `text` under `instructionPrompt`. Never throws; a failure comes
 * back as an "Error calling model: ..." string so the batch keeps going.
 */
export async function rewrite(
  text: string,
  instructionPrompt: string,
  apiKey: string,
  opts: RewriteOptions = {}
): Promise<string> {
  const model = opts.model ?? ENV.geminiModel;
  const timer = startStep('rewrite', { model, chars: text.length });
  try {
    const client = opts.client ?? createOpenAiClient(apiKey, opts.baseURL);
    const prompt = buildRewritePrompt(text, instructionPrompt);
    const out = await withRetry(() => client.complete(prompt, model), {
      ...DEFAULT_RETRY_CONFIG,
      maxRetries: opts.maxRetries ?? ENV.rewriteRetries,
      initialDelay: opts.retryDelay ?? DEFAULT_RETRY_CONFIG.initialDelay,
    });
    timer.end({ outChars: out.length });
    return out;
  } catch (e) {
    warn('rewrite.fail', { model, error: errorMessage(e) });
    return `${REWRITE_ERROR_PREFIX}${errorMessage(e)}`;
  }
}
