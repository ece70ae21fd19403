import { FetchTransport, postJson, type Transport } from '../../src/core/transport.js';
import { ProviderUnavailableError } from '../../src/utils/errors.js';

describe('FetchTransport', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the body and resolves with the response text', async () => {
    fetchMock.mockResolvedValue(new Response('reply-body', { status: 200 }));

    const transport = new FetchTransport();
    const text = await transport.post('https://llm.test/chat', '{"a":1}', { 'X-Test': '1' });

    expect(text).toBe('reply-body');
    expect(fetchMock).toHaveBeenCalledWith('https://llm.test/chat', {
      method: 'POST',
      headers: { 'X-Test': '1' },
      body: '{"a":1}',
      signal: expect.any(AbortSignal),
    });
  });

  it('reports non-2xx statuses with the body', async () => {
    fetchMock.mockResolvedValue(new Response('rate limited', { status: 429 }));

    await expect(new FetchTransport().post('https://llm.test', '{}', {})).rejects.toThrow(
      new ProviderUnavailableError('Provider returned HTTP 429: rate limited'),
    );
  });

  it('wraps network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(new FetchTransport().post('https://llm.test', '{}', {})).rejects.toThrow(
      'Failed to reach provider endpoint: fetch failed',
    );
  });

  it('reports timeouts in seconds', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    fetchMock.mockRejectedValue(timeout);

    const transport = new FetchTransport({ timeoutMs: 5_000 });
    await expect(transport.post('https://llm.test', '{}', {})).rejects.toThrow(
      'Provider did not respond within 5s.',
    );
  });
});

describe('postJson', () => {
  it('serializes the payload and adds the JSON content type', async () => {
    const post = vi.fn<Transport['post']>().mockResolvedValue('ok');

    const result = await postJson({ post }, 'https://llm.test', { model: 'm' }, {
      Authorization: 'Bearer test-key',
    });

    expect(result).toBe('ok');
    expect(post).toHaveBeenCalledWith('https://llm.test', '{"model":"m"}', {
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
  });

  it('passes provider errors through unchanged', async () => {
    const failure = new ProviderUnavailableError('Provider returned HTTP 500: boom');
    const post = vi.fn<Transport['post']>().mockRejectedValue(failure);

    await expect(postJson({ post }, 'https://llm.test', {}, {})).rejects.toBe(failure);
  });

  it('wraps any other failure', async () => {
    const post = vi.fn<Transport['post']>().mockRejectedValue(new Error('socket hang up'));

    const attempt = postJson({ post }, 'https://llm.test', {}, {});
    await expect(attempt).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(attempt).rejects.toThrow('Provider request failed: socket hang up');
  });
});
