import { GoogleGenAI, GenerateContentParameters } from '@google/genai';
import { Logger } from '@nestjs/common';
import { AnalysisError } from '../../domain/errors/AnalysisError';
import { SubAnalysisKind } from '../../domain/value-objects/AnalysisKind';
import { AnalysisResult } from '../../domain/value-objects/AnalysisResult';
import { BaseAiClient } from './BaseAiClient';
import { AnalyzeOptions } from './IAiClient';

/**
 * The slice of the @google/genai models API this client needs.
 */
export interface GenerateContentApi {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface GeminiClientOptions {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  models?: GenerateContentApi;
}

/**
 * Gemini adapter. Requests JSON output; the shape is described in the prompt and
 * validated on return.
 */
export class GeminiAiClient extends BaseAiClient {
  readonly name = 'gemini';
  private readonly logger = new Logger(GeminiAiClient.name);
  private readonly models: GenerateContentApi | null;

  constructor(private readonly options: GeminiClientOptions) {
    super();
    if (options.models) {
      this.models = options.models;
    } else if (options.apiKey) {
      this.models = new GoogleGenAI({
        apiKey: options.apiKey,
        httpOptions: { timeout: options.timeoutMs },
      }).models;
    } else {
      this.logger.warn('GEMINI_API_KEY not set; analysis requests will fail with AuthFailure');
      this.models = null;
    }
  }

  async analyze(kind: SubAnalysisKind, content: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    if (!this.models) {
      throw new AnalysisError('AuthFailure', 'GEMINI_API_KEY is not configured');
    }

    const prompt = this.buildPrompt(kind, content, options);
    const startedAt = Date.now();

    let text: string | undefined;
    try {
      const response = await this.models.generateContent({
        model: this.options.model,
        contents: prompt,
        config: {
          responseMimeType: 'application/json',
          temperature: 0.1,
          abortSignal: options.signal,
        },
      });
      text = response.text;
    } catch (error) {
      throw toAiError(error);
    }

    this.logger.debug(`${kind} response from ${this.options.model} in ${Date.now() - startedAt}ms`);
    return this.parseResult(text);
  }
}

/**
 * Map a @google/genai ApiError (or a network failure) onto the error taxonomy.
 * Gemini reports both per-minute and daily limits as 429; daily and billing
 * limits do not recover within the retry window.
 */
export function toAiError(error: unknown): AnalysisError {
  if (error instanceof AnalysisError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;

  if (status === undefined || status >= 500) {
    return new AnalysisError('TransientNetworkError', `Gemini request failed: ${message}`, { cause: error });
  }
  if (status === 429) {
    if (/per.?day|daily|billing/i.test(message)) {
      return new AnalysisError('QuotaExceeded', `Gemini quota exceeded: ${message}`, { cause: error });
    }
    return new AnalysisError('RateLimited', `Gemini rate limit exceeded: ${message}`, { cause: error });
  }
  // An invalid key comes back as 400 INVALID_ARGUMENT.
  if (status === 401 || status === 403 || (status === 400 && /api key/i.test(message))) {
    return new AnalysisError('AuthFailure', `Gemini rejected the credentials: ${message}`, { cause: error });
  }
  return new AnalysisError('Internal', `Gemini request rejected (${status}): ${message}`, { cause: error });
}
