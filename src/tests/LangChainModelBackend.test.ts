// src/tests/LangChainModelBackend.test.ts
import { AIMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import { FakeEmbeddings, FakeListChatModel } from '@langchain/core/utils/testing';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOpenAI } from '@langchain/openai';
import { LangChainModelBackend, messageText, toLangChainMessages } from '../services/llm/LangChainModelBackend';
import { LangChainTextEmbedder } from '../services/llm/LangChainTextEmbedder';
import { chatModelFromConfig, createChatModel, providerFromEnv } from '../services/llm/providers';
import { buildPredictRequest, responseText } from '../services/report/modelOutput';
import { PredictResponse } from '../types/backend.types';
import { InvalidInputError } from '../utils/errors';

function request() {
  return buildPredictRequest({
    modelName: 'patent-strategy-llm',
    messages: [
      { role: 'system', content: 'You are a patent analyst.' },
      { role: 'user', content: 'Summarise claim 1.' }
    ],
    task: 'fto',
    requestId: 'req-1',
    stream: false
  });
}

describe('LangChainModelBackend', () => {
  it('should map request messages to LangChain message classes', () => {
    const messages = toLangChainMessages([
      { role: 'system', content: 's' },
      { role: 'user', content: 'u' },
      { role: 'assistant', content: 'a' }
    ]);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[2]).toBeInstanceOf(AIMessage);
  });

  it('should join the text parts of a multi-part message', () => {
    expect(messageText('plain')).toBe('plain');
    expect(
      messageText([
        { type: 'text', text: 'Claim 1 ' },
        { type: 'image_url', image_url: 'https://example.com/figure.png' },
        { type: 'text', text: 'is broad.' }
      ])
    ).toBe('Claim 1 is broad.');
  });

  it('should return the model reply as the text output', async () => {
    const backend = new LangChainModelBackend(new FakeListChatModel({ responses: ['Claim 1 is anticipated.'] }));
    const resp = await backend.predict(request());

    expect(responseText(resp)).toBe('Claim 1 is anticipated.');
    expect(resp.modelName).toBe('patent-strategy-llm');
    expect(resp.metadata).toEqual({ task: 'fto', request_id: 'req-1', stream: 'false' });
  });

  it('should stream the reply as a sequence of text outputs', async () => {
    const backend = new LangChainModelBackend(new FakeListChatModel({ responses: ['novel'] }));
    const stream = await backend.predictStream(request());

    const pieces: PredictResponse[] = [];
    for await (const piece of stream) {
      pieces.push(piece);
    }
    expect(pieces.map(responseText).join('')).toBe('novel');
  });

  it('should refuse calls once closed', async () => {
    const backend = new LangChainModelBackend(new FakeListChatModel({ responses: ['ok'] }));
    await expect(backend.healthy()).resolves.toBeUndefined();

    await backend.close();
    await expect(backend.predict(request())).rejects.toThrow('model backend is closed');
    await expect(backend.healthy()).rejects.toThrow('model backend is closed');
  });

  it('should call the model when a health check prompt is set', async () => {
    const model = new FakeListChatModel({ responses: ['pong'] });
    const invoke = jest.spyOn(model, 'invoke');
    await new LangChainModelBackend(model, { healthCheckPrompt: 'ping' }).healthy();
    expect(invoke).toHaveBeenCalledTimes(1);
  });
});

describe('LangChainTextEmbedder', () => {
  it('should embed queries and document batches', async () => {
    const fake = new FakeEmbeddings();
    const embedder = new LangChainTextEmbedder(fake);

    expect(await embedder.embed('compound')).toEqual(await fake.embedQuery('compound'));
    expect(await embedder.batchEmbed(['a', 'b'])).toHaveLength(2);
    expect(await embedder.batchEmbed([])).toEqual([]);
  });

  it('should honour an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    await expect(new LangChainTextEmbedder(new FakeEmbeddings()).embed('x', controller.signal)).rejects.toThrow(
      'cancelled'
    );
  });
});

describe('providers', () => {
  it('should read the provider from the environment', () => {
    expect(providerFromEnv({})).toBe('openai');
    expect(providerFromEnv({ LLM_PROVIDER: ' Anthropic ' })).toBe('anthropic');
    expect(() => providerFromEnv({ LLM_PROVIDER: 'acme' })).toThrow('unsupported LLM provider: acme');
  });

  it('should build the chat model for the provider', () => {
    expect(createChatModel('openai', { apiKey: 'test-secret' }, {})).toBeInstanceOf(ChatOpenAI);
    expect(createChatModel('anthropic', {}, { ANTHROPIC_API_KEY: 'test-secret' })).toBeInstanceOf(ChatAnthropic);
  });

  it('should build the configured provider with the report sampling settings', () => {
    const chat = chatModelFromConfig({ maxOutputTokens: 256, temperature: 0.1 }, { OPENAI_API_KEY: 'test-secret' });

    expect(chat).toBeInstanceOf(ChatOpenAI);
    expect(chat instanceof ChatOpenAI && [chat.temperature, chat.maxTokens]).toEqual([0.1, 256]);
    expect(
      chatModelFromConfig({ maxOutputTokens: 64, temperature: 0 }, { LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret' })
    ).toBeInstanceOf(ChatAnthropic);
  });

  it('should require an API key', () => {
    expect(() => createChatModel('anthropic', {}, {})).toThrow(InvalidInputError);
    expect(() => createChatModel('google', {}, {})).toThrow('no API key for google: set GOOGLE_API_KEY');
  });
});
