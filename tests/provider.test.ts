import { describe, it, expect } from '@jest/globals';
import { Response } from 'node-fetch';
import { defineContract, field } from '../src/contracts';
import { CancelledError, DeserializationError, TimeoutError } from '../src/errors';
import { GeminiBackend } from '../src/llm/backends/gemini';
import { OllamaBackend } from '../src/llm/backends/ollama';
import { withDeadline } from '../src/llm/deadline';
import { LlmProvider, createBackend } from '../src/llm/provider';
import { DocumentStream } from '../src/pipeline/documentStream';
import { silentLogger } from '../src/utils/logger';
import { ScriptedBackend, hangUntilAborted } from './helpers/scriptedBackend';

const Greeting = defineContract('Greeting', {
  message: field.string({ required: true }),
  loud: field.boolean({ defaultValue: false }),
});

function providerWith(backend: ScriptedBackend) {
  return new LlmProvider(backend, silentLogger);
}

describe('LlmProvider', () => {
  it('decodes fenced JSON into the contract type', async () => {
    const backend = new ScriptedBackend(['```json\n{"message":"hoi"}\n```']);

    const reply = await providerWith(backend).sendStructuredPrompt(Greeting, 'Say hi');

    expect(reply.data).toEqual({ message: 'hoi', loud: false });
    expect(reply.rawText).toBe('{"message":"hoi"}');
    expect(reply.model).toBe('test-text-model');
    expect(backend.requests[0].json).toBe(true);
  });

  it('records each exchange in the conversation and sends prior turns as history', async () => {
    const backend = new ScriptedBackend(['{"message":"one"}', '{"message":"two"}']);
    const provider = providerWith(backend);
    const conversation = provider.createConversation();

    await provider.sendStructuredPrompt(Greeting, 'first', { conversation, stepName: 'StepA' });
    await provider.sendStructuredPrompt(Greeting, 'second', { conversation, stepName: 'StepB' });

    expect(conversation.messages.map((m) => [m.role, m.content, m.stepName])).toEqual([
      ['user', 'first', 'StepA'],
      ['model', '{"message":"one"}', 'StepA'],
      ['user', 'second', 'StepB'],
      ['model', '{"message":"two"}', 'StepB'],
    ]);
    expect(backend.requests[1].history.map((m) => m.content)).toEqual([
      'first',
      '{"message":"one"}',
    ]);
    expect(backend.requests[1].prompt).toBe('second');
  });

  it('sends attachments base64-encoded to the multimodal model', async () => {
    const backend = new ScriptedBackend(['{"message":"seen"}', 'plain text']);
    const provider = providerWith(backend);
    const document = new DocumentStream(Buffer.from('hi'));
    document.read(1);

    const reply = await provider.sendMultimodalStructuredPrompt(Greeting, 'Look', [
      { stream: document, mimeType: 'image/png' },
    ]);
    await provider.sendMultimodalPrompt('Look again', [
      { stream: Buffer.from('hi'), mimeType: 'image/jpeg' },
    ]);

    expect(reply.model).toBe('test-vision-model');
    expect(backend.requests[0].model).toBe('test-vision-model');
    expect(backend.requests[0].images).toEqual([{ mimeType: 'image/png', data: 'aGk=' }]);
    expect(backend.requests[1].images).toEqual([{ mimeType: 'image/jpeg', data: 'aGk=' }]);
    expect(backend.requests[1].json).toBe(false);
  });

  it('estimates usage when the backend reports none', async () => {
    const backend = new ScriptedBackend(['pong pong']);

    const reply = await providerWith(backend).sendTextPrompt('ping');

    expect(reply).toEqual({
      text: 'pong pong',
      model: 'test-text-model',
      usage: { promptTokens: 1, completionTokens: 3, totalTokens: 4 },
    });
  });

  it('passes through usage reported by the backend', async () => {
    const usage = { promptTokens: 100, completionTokens: 20, totalTokens: 120 };
    const backend = new ScriptedBackend([async () => ({ text: 'ok', usage })]);

    const reply = await providerWith(backend).sendTextPrompt('ping');

    expect(reply.usage).toEqual(usage);
  });

  it('raises DeserializationError for text that is not JSON, after recording the reply', async () => {
    const backend = new ScriptedBackend(['I cannot answer that']);
    const provider = providerWith(backend);
    const conversation = provider.createConversation();

    const error = await provider
      .sendStructuredPrompt(Greeting, 'Say hi', { conversation })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeserializationError);
    if (!(error instanceof DeserializationError)) return;
    expect(error.contractId).toBe('Greeting');
    expect(error.responseText).toBe('I cannot answer that');
    expect(conversation.length).toBe(2);
  });

  it('raises DeserializationError when a required field is missing', async () => {
    const backend = new ScriptedBackend(['{"loud":true}']);

    const error = await providerWith(backend)
      .sendStructuredPrompt(Greeting, 'Say hi')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeserializationError);
    if (!(error instanceof DeserializationError)) return;
    expect(error.detail).toBe('- message: Required');
    expect(error.message).toBe(
      'Response could not be read as Greeting: - message: Required\nResponse text: {"loud":true}'
    );
  });

  it('cuts long response text in the DeserializationError message', () => {
    const error = new DeserializationError('Greeting', 'x'.repeat(250), 'Unexpected token');

    expect(error.message).toBe(
      `Response could not be read as Greeting: Unexpected token\nResponse text: ${'x'.repeat(200)}...`
    );
    expect(error.responseText).toHaveLength(250);
  });

  it('times out a slow backend and leaves only the prompt in the conversation', async () => {
    const backend = new ScriptedBackend([hangUntilAborted], 20);
    const provider = providerWith(backend);
    const conversation = provider.createConversation();

    const error = await provider
      .sendTextPrompt('slow', { conversation, stepName: 'Slow' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    if (!(error instanceof TimeoutError)) return;
    expect(error.message).toBe('gemini call for Slow timed out after 20ms');
    expect(conversation.length).toBe(1);
    expect(backend.requests[0].signal.aborted).toBe(true);
  });

  it('cancels an in-flight call when the caller aborts', async () => {
    const backend = new ScriptedBackend([hangUntilAborted]);
    const controller = new AbortController();

    const pending = providerWith(backend).sendTextPrompt('wait', { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('does not call the backend when already cancelled', async () => {
    const backend = new ScriptedBackend(['unused']);
    const controller = new AbortController();
    controller.abort();

    await expect(
      providerWith(backend).sendTextPrompt('never', { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(backend.requests).toHaveLength(0);
  });
});

describe('withDeadline', () => {
  it('resolves with the operation result', async () => {
    await expect(
      withDeadline(async () => 'done', { label: 'quick', timeoutMs: 1000 })
    ).resolves.toBe('done');
  });

  it('propagates the operation error', async () => {
    await expect(
      withDeadline(() => Promise.reject(new Error('boom')), { label: 'failing', timeoutMs: 1000 })
    ).rejects.toThrow('boom');
  });
});

describe('createBackend', () => {
  it('builds the configured backend', () => {
    const gemini = createBackend(
      { backend: 'gemini', apiKey: 'test-api-key' },
      { geminiClient: { getGenerativeModel: () => ({ generateContent: () => Promise.reject(new Error('unused')) }) } }
    );
    const ollama = createBackend(
      {
        backend: 'ollama',
        baseUrl: 'http://localhost:11434',
        textModel: 'llama3.1',
        multimodalModel: 'llava',
      },
      { fetch: () => Promise.resolve(new Response('{}')) }
    );

    expect(gemini).toBeInstanceOf(GeminiBackend);
    expect(ollama).toBeInstanceOf(OllamaBackend);
    expect(ollama.textModel).toBe('llama3.1');
  });
});
