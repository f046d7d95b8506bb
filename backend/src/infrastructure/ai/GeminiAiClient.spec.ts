import { GenerateContentParameters } from '@google/genai';
import { Logger } from '@nestjs/common';
import { AnalysisError } from '../../domain/errors/AnalysisError';
import { AnalysisResult } from '../../domain/value-objects/AnalysisResult';
import { GeminiAiClient, toAiError } from './GeminiAiClient';

const result: AnalysisResult = {
  summary: 'Small, readable module',
  sections: { quality: 'Good', bugs: 'None found' },
  findings: [{ title: 'Magic number', severity: 'low', description: '42 has no name', line: 3 }],
};

function apiError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

async function errorOf(promise: Promise<unknown>): Promise<AnalysisError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AnalysisError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an AnalysisError');
}

describe('GeminiAiClient', () => {
  let generateContent: jest.Mock<Promise<{ text?: string }>, [GenerateContentParameters]>;
  let client: GeminiAiClient;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    generateContent = jest.fn<Promise<{ text?: string }>, [GenerateContentParameters]>(async () => ({
      text: JSON.stringify(result),
    }));
    client = new GeminiAiClient({ model: 'gemini-test', timeoutMs: 1000, models: { generateContent } });
  });

  describe('analyze', () => {
    it('should request JSON and return the validated result', async () => {
      const controller = new AbortController();

      const analysis = await client.analyze('code-review', 'const answer = 42;', {
        source: 'acme/widgets:src/app.ts',
        signal: controller.signal,
      });

      expect(analysis).toEqual(result);
      expect(generateContent).toHaveBeenCalledTimes(1);
      const params = generateContent.mock.calls[0][0];
      expect(params.model).toBe('gemini-test');
      expect(params.config?.responseMimeType).toBe('application/json');
      expect(params.config?.abortSignal).toBe(controller.signal);
      expect(params.contents).toEqual(expect.stringContaining('Review the following code'));
      expect(params.contents).toEqual(expect.stringContaining('Source: acme/widgets:src/app.ts'));
      expect(params.contents).toEqual(expect.stringContaining('const answer = 42;'));
      expect(params.contents).toEqual(expect.stringContaining('"bestPractices": Best practices suggestions'));
    });

    it('should use the prompt for each kind', async () => {
      await client.analyze('documentation', 'x');
      await client.analyze('bug-detection', 'x');

      expect(generateContent.mock.calls[0][0].contents).toEqual(
        expect.stringContaining('Generate comprehensive documentation for the following code.'),
      );
      expect(generateContent.mock.calls[1][0].contents).toEqual(
        expect.stringContaining('Analyze the following code for potential bugs, errors, or issues.'),
      );
    });

    it('should mention truncation in the prompt', async () => {
      await client.analyze('bug-detection', 'x', { truncated: true });

      expect(generateContent.mock.calls[0][0].contents).toEqual(
        expect.stringContaining('NOTE: the content was truncated to fit the size limit'),
      );
    });

    it('should list skipped files in the prompt', async () => {
      const skipped = Array.from({ length: 12 }, (_, i) => ({ path: `src/f${i}.ts`, reason: 'too large' }));

      await client.analyze('code-review', 'x', { skipped });

      const prompt = generateContent.mock.calls[0][0].contents;
      expect(prompt).toEqual(
        expect.stringContaining('NOTE: these files were left out of the content:\n- src/f0.ts (too large)\n'),
      );
      expect(prompt).toEqual(expect.stringContaining('- src/f9.ts (too large)\n- ... and 2 more\n'));
      expect(prompt).not.toEqual(expect.stringContaining('src/f10.ts'));
    });

    it('should accept JSON wrapped in a code fence', async () => {
      generateContent.mockResolvedValueOnce({ text: '```json\n' + JSON.stringify(result) + '\n```' });

      expect(await client.analyze('code-review', 'x')).toEqual(result);
    });

    it('should reject an empty response', async () => {
      generateContent.mockResolvedValueOnce({ text: '  ' });

      const error = await errorOf(client.analyze('code-review', 'x'));

      expect(error.kind).toBe('InvalidResponse');
      expect(error.message).toBe('gemini returned an empty response');
    });

    it('should reject malformed JSON', async () => {
      generateContent.mockResolvedValueOnce({ text: '{"summary": ' });

      const error = await errorOf(client.analyze('code-review', 'x'));

      expect(error.kind).toBe('InvalidResponse');
      expect(error.message).toBe('gemini returned malformed JSON');
    });

    it('should reject JSON of the wrong shape', async () => {
      generateContent.mockResolvedValueOnce({ text: JSON.stringify({ summary: 'ok', sections: {}, findings: 'none' }) });

      const error = await errorOf(client.analyze('code-review', 'x'));

      expect(error.kind).toBe('InvalidResponse');
      expect(error.message).toMatch(/^gemini response failed validation at findings: /);
    });

    it('should map API failures', async () => {
      generateContent.mockRejectedValueOnce(apiError(429, 'Quota exceeded for requests per day'));

      const error = await errorOf(client.analyze('code-review', 'x'));

      expect(error.kind).toBe('QuotaExceeded');
    });

    it('should fail with AuthFailure when no API key is configured', async () => {
      const unconfigured = new GeminiAiClient({ model: 'gemini-test', timeoutMs: 1000 });

      const error = await errorOf(unconfigured.analyze('code-review', 'x'));

      expect(error.kind).toBe('AuthFailure');
      expect(error.message).toBe('GEMINI_API_KEY is not configured');
    });
  });

  describe('toAiError', () => {
    it('should separate daily quota from per-minute rate limits', () => {
      expect(toAiError(apiError(429, 'Daily limit reached')).kind).toBe('QuotaExceeded');
      expect(toAiError(apiError(429, 'Check your plan and billing details')).kind).toBe('QuotaExceeded');
      expect(toAiError(apiError(429, 'Too many requests per minute')).kind).toBe('RateLimited');
    });

    it('should map credential errors to AuthFailure', () => {
      expect(toAiError(apiError(401, 'Unauthorized')).kind).toBe('AuthFailure');
      expect(toAiError(apiError(403, 'Permission denied')).kind).toBe('AuthFailure');
      expect(toAiError(apiError(400, 'API key not valid. Please pass a valid API key.')).kind).toBe('AuthFailure');
    });

    it('should treat server and network errors as transient', () => {
      expect(toAiError(apiError(503, 'The model is overloaded')).kind).toBe('TransientNetworkError');
      expect(toAiError(new Error('fetch failed')).kind).toBe('TransientNetworkError');
    });

    it('should map other client errors to Internal', () => {
      const error = toAiError(apiError(404, 'models/gemini-test is not found'));

      expect(error.kind).toBe('Internal');
      expect(error.message).toBe('Gemini request rejected (404): models/gemini-test is not found');
    });

    it('should keep AnalysisErrors as they are', () => {
      const original = new AnalysisError('Cancelled', 'stop');
      expect(toAiError(original)).toBe(original);
    });
  });
});
