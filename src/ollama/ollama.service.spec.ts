import { ConfigService } from '@nestjs/config';
import { OllamaService } from './ollama.service';
import {
  CancelledError,
  ProviderFatalError,
  ProviderTransientError,
} from '../common/errors';
import type { CompletionChunk } from '../llm/llm.types';

describe('OllamaService', () => {
  let service: OllamaService;
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    service = new OllamaService(
      new ConfigService({
        OLLAMA_BASE_URL: 'http://ollama.test',
        OLLAMA_LLM_MODEL: 'chat-model',
        OLLAMA_SMALL_MODEL: 'small-model',
      }),
    );
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  function requestBody(call = 0): unknown {
    const init = fetchMock.mock.calls[call][1];
    return JSON.parse(String(init?.body));
  }

  it('completes a chat and sums prompt and output tokens', async () => {
    fetchMock.mockResolvedValue(
      new Response(
        JSON.stringify({
          model: 'small-model',
          message: { role: 'assistant', content: 'Hi!' },
          done: true,
          done_reason: 'stop',
          prompt_eval_count: 30,
          eval_count: 12,
        }),
      ),
    );

    const completion = await service.complete([{ role: 'user', content: 'Hello' }], {
      model: 'small',
      temperature: 0.3,
      maxTokens: 300,
    });

    expect(completion).toEqual({ text: 'Hi!', tokensUsed: 42, finishReason: 'stop' });
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test/api/chat');
    expect(requestBody()).toEqual({
      model: 'small-model',
      messages: [{ role: 'user', content: 'Hello' }],
      stream: false,
      options: { temperature: 0.3, num_predict: 300 },
    });
  });

  it('treats overload responses as transient', async () => {
    fetchMock.mockResolvedValue(new Response('busy', { status: 503 }));

    const error = await service.complete([{ role: 'user', content: 'Hello' }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderTransientError);
    expect(error).toMatchObject({ status: 503, message: 'Ollama /api/chat failed: 503 busy' });
  });

  it('treats bad requests as fatal', async () => {
    fetchMock.mockResolvedValue(new Response('model not found', { status: 400 }));

    await expect(service.complete([{ role: 'user', content: 'Hello' }])).rejects.toBeInstanceOf(
      ProviderFatalError,
    );
  });

  it('reports connection failures as transient', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(service.complete([{ role: 'user', content: 'Hello' }])).rejects.toEqual(
      new ProviderTransientError('LLM service unreachable'),
    );
  });

  it('reports a caller abort as a cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    fetchMock.mockRejectedValue(new Error('This operation was aborted'));

    await expect(
      service.complete([{ role: 'user', content: 'Hello' }], { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
  });

  it('streams newline-delimited chunks', async () => {
    const body = [
      { model: 'chat-model', message: { role: 'assistant', content: 'Hel' }, done: false },
      { model: 'chat-model', message: { role: 'assistant', content: 'lo' }, done: false },
      {
        model: 'chat-model',
        message: { role: 'assistant', content: '' },
        done: true,
        done_reason: 'length',
        prompt_eval_count: 10,
        eval_count: 2,
      },
    ]
      .map((line) => JSON.stringify(line))
      .join('\n');
    fetchMock.mockResolvedValue(new Response(body));

    const chunks: CompletionChunk[] = [];
    for await (const chunk of service.stream([{ role: 'user', content: 'Hello' }])) {
      chunks.push(chunk);
    }

    expect(chunks).toEqual([
      { textDelta: 'Hel' },
      { textDelta: 'lo' },
      { textDelta: '', finishReason: 'length', tokensUsed: 12 },
    ]);
    expect(requestBody()).toMatchObject({ model: 'chat-model', stream: true });
  });

  describe('stream deadline', () => {
    const line = (content: string, done = false) =>
      JSON.stringify({
        model: 'chat-model',
        message: { role: 'assistant', content },
        done,
        ...(done ? { done_reason: 'stop', eval_count: 3 } : {}),
      }) + '\n';

    // Emits one chunk every `gapMs`, erroring like fetch does when the request is aborted
    function slowBody(chunks: string[], gapMs: number, signal?: AbortSignal | null) {
      const encoder = new TextEncoder();
      let next = 0;
      return new ReadableStream<Uint8Array>({
        pull(controller) {
          return new Promise<void>((resolve, reject) => {
            if (next >= chunks.length) {
              controller.close();
              resolve();
              return;
            }
            const timer = setTimeout(() => {
              controller.enqueue(encoder.encode(chunks[next++]));
              resolve();
            }, gapMs);
            signal?.addEventListener(
              'abort',
              () => {
                clearTimeout(timer);
                reject(new Error('This operation was aborted'));
              },
              { once: true },
            );
          });
        },
      });
    }

    function timedService(timeoutMs: number) {
      return new OllamaService(
        new ConfigService({
          OLLAMA_BASE_URL: 'http://ollama.test',
          OLLAMA_LLM_MODEL: 'chat-model',
          LLM_TIMEOUT_MS: timeoutMs,
        }),
      );
    }

    it('lets a reply outlast the timeout while chunks keep arriving', async () => {
      fetchMock.mockImplementation(async (_url, init) =>
        new Response(slowBody([line('a'), line('b'), line('c', true)], 120, init?.signal)),
      );

      const text: string[] = [];
      for await (const chunk of timedService(200).stream([{ role: 'user', content: 'Hello' }])) {
        text.push(chunk.textDelta);
      }

      expect(text).toEqual(['a', 'b', 'c']);
    });

    it('times out when the stream goes quiet', async () => {
      fetchMock.mockImplementation(async (_url, init) =>
        new Response(slowBody([line('a'), line('b', true)], 300, init?.signal)),
      );

      const consume = async () => {
        for await (const chunk of timedService(100).stream([{ role: 'user', content: 'Hello' }])) {
          void chunk;
        }
      };

      await expect(consume()).rejects.toEqual(
        new ProviderTransientError('Ollama request timed out after 100ms'),
      );
    });
  });

  it('returns one embedding per input text', async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ model: 'embed', embeddings: [[0.1, 0.2], [0.3, 0.4]] })),
    );

    await expect(service.embed(['a', 'b'])).resolves.toEqual([
      [0.1, 0.2],
      [0.3, 0.4],
    ]);
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test/api/embed');
  });
});
