// src/tests/modelOutput.test.ts
import { buildPredictRequest, decodeMessages, encodeCount, extractTokenUsage, responseText } from '../services/report/modelOutput';
import { PredictResponse } from '../types/backend.types';

function response(outputs: Record<string, Buffer>): PredictResponse {
  return { modelName: 'patent-strategy-llm', outputs };
}

describe('modelOutput', () => {
  describe('extractTokenUsage', () => {
    it('should sum prompt and completion tokens when the total is missing', () => {
      expect(
        extractTokenUsage(response({ prompt_tokens: encodeCount(30), completion_tokens: encodeCount(12) }))
      ).toEqual({ promptTokens: 30, completionTokens: 12, totalTokens: 42 });
    });

    it('should prefer an explicit total', () => {
      expect(
        extractTokenUsage(
          response({ prompt_tokens: encodeCount(30), completion_tokens: encodeCount(12), total_tokens: encodeCount(50) })
        ).totalTokens
      ).toBe(50);
    });

    it('should count undecodable values as zero', () => {
      expect(
        extractTokenUsage(response({ prompt_tokens: Buffer.from('many'), completion_tokens: encodeCount(-3) }))
      ).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
      expect(extractTokenUsage(undefined)).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
    });
  });

  describe('responseText', () => {
    it('should fall back to the output key', () => {
      expect(responseText(response({ output: Buffer.from('fallback') }))).toBe('fallback');
      expect(responseText(response({}))).toBe('');
    });
  });

  describe('buildPredictRequest', () => {
    it('should encode messages as JSON and round-trip them', () => {
      const messages = [{ role: 'user' as const, content: 'Is claim 3 valid?' }];
      const req = buildPredictRequest({
        modelName: 'm',
        messages,
        task: 'valuation',
        requestId: 'req-9',
        stream: true
      });

      expect(req.inputFormat).toBe('JSON');
      expect(req.metadata).toEqual({ task: 'valuation', request_id: 'req-9', stream: 'true' });
      expect(decodeMessages(req)).toEqual(messages);
    });

    it('should treat a text request as one user message', () => {
      expect(
        decodeMessages({ modelName: 'm', inputData: Buffer.from('hello'), inputFormat: 'Text', metadata: {} })
      ).toEqual([{ role: 'user', content: 'hello' }]);
    });

    it('should reject JSON without messages', () => {
      expect(() =>
        decodeMessages({ modelName: 'm', inputData: Buffer.from('{"prompt":"x"}'), inputFormat: 'JSON', metadata: {} })
      ).toThrow('predict request carries no valid messages');
    });
  });
});
