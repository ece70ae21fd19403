import { Ollama } from 'ollama';

import {
  OllamaChatClient,
  extractReplyContent,
  toReplyShape,
  type ChatReplyShape,
} from '../../src/core/ollama-client.js';

const { chatMock } = vi.hoisted(() => ({ chatMock: vi.fn() }));

vi.mock('ollama', () => ({
  Ollama: vi.fn().mockImplementation(function () {
    return { chat: chatMock };
  }),
}));

describe('toReplyShape', () => {
  it('classifies message objects', () => {
    expect(toReplyShape({ message: { role: 'assistant', content: 'hi' } })).toEqual({
      kind: 'message',
      content: 'hi',
    });
  });

  it('classifies bare strings', () => {
    expect(toReplyShape('plain')).toEqual({ kind: 'text', text: 'plain' });
  });

  it('falls back to unknown', () => {
    expect(toReplyShape(null)).toEqual({ kind: 'unknown' });
    expect(toReplyShape(42)).toEqual({ kind: 'unknown' });
    expect(toReplyShape({ message: 'not an object' })).toEqual({ kind: 'unknown' });
    expect(toReplyShape({ done: true })).toEqual({ kind: 'unknown' });
  });
});

describe('extractReplyContent', () => {
  it('reads text from each shape', () => {
    expect(extractReplyContent({ kind: 'message', content: 'a' })).toBe('a');
    expect(extractReplyContent({ kind: 'text', text: 'b' })).toBe('b');
    expect(extractReplyContent({ kind: 'unknown' })).toBe('');
  });

  it('ignores non-string message content', () => {
    expect(extractReplyContent({ kind: 'message', content: 42 })).toBe('');
    expect(extractReplyContent({ kind: 'message', content: undefined })).toBe('');
  });
});

describe('OllamaChatClient', () => {
  const messages = [{ role: 'user' as const, content: 'Task: x' }];

  beforeEach(() => {
    chatMock.mockReset();
    vi.mocked(Ollama).mockClear();
  });

  it('uses the default host unless one is given', () => {
    new OllamaChatClient();
    new OllamaChatClient({ host: 'http://127.0.0.1:11434' });

    expect(vi.mocked(Ollama).mock.calls).toEqual([[undefined], [{ host: 'http://127.0.0.1:11434' }]]);
  });

  it('returns a single classified reply', async () => {
    chatMock.mockResolvedValue({ message: { role: 'assistant', content: 'hello' } });

    const reply = await new OllamaChatClient().send('llama3', messages, false);

    expect(reply).toEqual({ mode: 'single', reply: { kind: 'message', content: 'hello' } });
    expect(chatMock).toHaveBeenCalledWith({ model: 'llama3', messages, stream: false });
  });

  it('classifies every streamed chunk', async () => {
    chatMock.mockResolvedValue(
      (async function* () {
        yield { message: { content: 'one ' } };
        yield { done: true };
        yield { message: { content: 'two' } };
      })(),
    );

    const reply = await new OllamaChatClient().send('llama3', messages, true);
    expect(reply.mode).toBe('stream');
    expect(chatMock).toHaveBeenCalledWith({ model: 'llama3', messages, stream: true });

    const chunks: ChatReplyShape[] = [];
    if (reply.mode === 'stream') {
      for await (const chunk of reply.chunks) chunks.push(chunk);
    }
    expect(chunks).toEqual([
      { kind: 'message', content: 'one ' },
      { kind: 'unknown' },
      { kind: 'message', content: 'two' },
    ]);
  });
});
