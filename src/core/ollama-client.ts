import { Ollama } from 'ollama';

import type { ConversationMessage } from './conversation.js';

/**
 * Reply representations a chat client may hand back. Anything the runtime returns is
 * classified into one of these at the client boundary.
 */
export type ChatReplyShape =
  | { kind: 'message'; content: unknown }
  | { kind: 'text'; text: string }
  | { kind: 'unknown' };

export type ChatReply =
  | { mode: 'single'; reply: ChatReplyShape }
  | { mode: 'stream'; chunks: AsyncIterable<ChatReplyShape> };

export interface ChatClient {
  send(model: string, messages: ConversationMessage[], stream: boolean): Promise<ChatReply>;
}

export function toReplyShape(value: unknown): ChatReplyShape {
  if (typeof value === 'string') {
    return { kind: 'text', text: value };
  }
  if (typeof value === 'object' && value !== null && 'message' in value) {
    const message = value.message;
    if (typeof message === 'object' && message !== null && 'content' in message) {
      return { kind: 'message', content: message.content };
    }
  }
  return { kind: 'unknown' };
}

export function extractReplyContent(shape: ChatReplyShape): string {
  switch (shape.kind) {
    case 'message':
      return typeof shape.content === 'string' ? shape.content : '';
    case 'text':
      return shape.text;
    case 'unknown':
      return '';
    default: {
      const _exhaustive: never = shape;
      return _exhaustive;
    }
  }
}

async function* classifyChunks(source: AsyncIterable<unknown>): AsyncGenerator<ChatReplyShape> {
  for await (const chunk of source) {
    yield toReplyShape(chunk);
  }
}

/** Chat client backed by a local Ollama daemon. */
export class OllamaChatClient implements ChatClient {
  private readonly client: Ollama;

  constructor(options: { host?: string } = {}) {
    this.client = new Ollama(options.host ? { host: options.host } : undefined);
  }

  async send(model: string, messages: ConversationMessage[], stream: boolean): Promise<ChatReply> {
    if (stream) {
      const iterator = await this.client.chat({ model, messages, stream: true });
      return { mode: 'stream', chunks: classifyChunks(iterator) };
    }
    const response = await this.client.chat({ model, messages, stream: false });
    return { mode: 'single', reply: toReplyShape(response) };
  }
}
