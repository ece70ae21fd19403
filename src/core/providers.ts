import { z } from 'zod';

import { buildConversation, type ConversationMessage } from './conversation.js';
import type { EnvironmentSource } from './environment.js';
import {
  OllamaChatClient,
  extractReplyContent,
  type ChatClient,
  type ChatReply,
} from './ollama-client.js';
import { FetchTransport, postJson, type Transport } from './transport.js';
import {
  OllamaUnavailableError,
  ProviderConfigError,
  ProviderUnavailableError,
} from '../utils/errors.js';

export type ProviderOptions = Readonly<Record<string, string>>;

export interface PlanTextRequest {
  provider: string;
  description: string;
  model?: string;
  constrained: boolean;
  chainOfThought: boolean;
  stream: boolean;
  options: ProviderOptions;
}

/** Collaborators swapped out in tests; production falls back to fetch, the Ollama daemon and process.env. */
export interface ProviderOverrides {
  transport?: Transport;
  chatClient?: ChatClient;
  env?: EnvironmentSource;
}

export const OPENAI_COMPATIBLE_ENDPOINTS: ReadonlyMap<string, string> = new Map([
  ['openrouter', 'https://openrouter.ai/api/v1/chat/completions'],
  ['huggingface', 'https://api-inference.huggingface.co/v1/chat/completions'],
]);

export const GEMINI_DEFAULT_BASE = 'https://generativelanguage.googleapis.com/v1beta';
export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-flash';
export const COHERE_DEFAULT_ENDPOINT = 'https://api.cohere.com/v1/chat';
export const COHERE_DEFAULT_VERSION = '2024-10-22';

export const SUPPORTED_PROVIDERS = [
  'heuristic',
  'ollama',
  ...OPENAI_COMPATIBLE_ENDPOINTS.keys(),
  'gemini',
  'cohere',
];

// ── Option validation ──────────────────────────────────────────────────

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().optional());
const optionalUrl = z.preprocess(blankToUndefined, z.string().url().optional());

// Ollama takes a bare `host:port` as well as a URL
const optionalHost = z.preprocess((value) => {
  const candidate = blankToUndefined(value);
  if (typeof candidate !== 'string') return candidate;
  const host = candidate.trim();
  return /^[a-z][a-z\d+.-]*:\/\//i.test(host) ? host : `http://${host}`;
}, z.string().url().optional());

const ollamaOptionsSchema = z.object({
  api_base: optionalHost,
});

const restOptionsSchema = z.object({
  api_key: optionalText,
  api_key_env: optionalText,
  api_base: optionalUrl,
});

const cohereOptionsSchema = restOptionsSchema.extend({
  cohere_version: optionalText,
});

/** Option keys some provider reads; anything else is ignored. */
export const KNOWN_PROVIDER_OPTIONS: ReadonlySet<string> = new Set(
  cohereOptionsSchema.keyof().options,
);

function parseOptions<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: ProviderOptions,
  provider: string,
): T {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ProviderConfigError(`Invalid options for provider '${provider}': ${issues}`);
  }
  return parsed.data;
}

export function resolveApiKey(
  options: { api_key?: string; api_key_env?: string },
  env: EnvironmentSource = process.env,
): string | null {
  if (options.api_key) {
    return options.api_key;
  }
  if (options.api_key_env) {
    return env[options.api_key_env] || null;
  }
  return null;
}

/** Ollama host from `api_base`, or undefined for the client default. */
export function ollamaHost(options: ProviderOptions): string | undefined {
  return parseOptions(ollamaOptionsSchema, options, 'ollama').api_base;
}

// ── Dispatch ───────────────────────────────────────────────────────────

export async function requestPlanText(
  request: PlanTextRequest,
  overrides: ProviderOverrides = {},
): Promise<string> {
  const provider = request.provider.trim().toLowerCase();
  if (provider === '' || provider === 'heuristic') {
    throw new ProviderUnavailableError('The heuristic provider does not produce remote responses.');
  }

  const env = overrides.env ?? process.env;
  const messages = buildConversation({
    description: request.description,
    chainOfThought: request.chainOfThought,
    constrained: request.constrained,
  });

  if (provider === 'ollama') {
    const host = ollamaHost(request.options);
    if (!request.model) {
      throw new ProviderConfigError('Specify --model when using the Ollama provider.');
    }
    const chatClient = overrides.chatClient ?? new OllamaChatClient({ host });
    return requestFromChatClient(chatClient, request.model, messages, request.stream);
  }

  const transport = overrides.transport ?? new FetchTransport();

  const openAiEndpoint = OPENAI_COMPATIBLE_ENDPOINTS.get(provider);
  if (openAiEndpoint !== undefined) {
    const options = parseOptions(restOptionsSchema, request.options, provider);
    const apiKey = resolveApiKey(options, env);
    if (!apiKey) {
      throw new ProviderConfigError(
        'An API key is required for OpenAI-compatible providers. Set --api-key or configure llm.api_key_env.',
      );
    }
    if (!request.model) {
      throw new ProviderConfigError('Specify --model for the selected provider.');
    }
    const response = await postJson(
      transport,
      options.api_base ?? openAiEndpoint,
      buildOpenAiPayload(messages, request.model),
      { Authorization: `Bearer ${apiKey}` },
    );
    return extractOpenAiContent(response);
  }

  if (provider === 'gemini') {
    const options = parseOptions(restOptionsSchema, request.options, provider);
    const apiKey = resolveApiKey(options, env);
    if (!apiKey) {
      throw new ProviderConfigError(
        'Gemini requires an API key. Configure llm.api_key_env or pass --api-key.',
      );
    }
    const model = request.model || GEMINI_DEFAULT_MODEL;
    const base = (options.api_base ?? GEMINI_DEFAULT_BASE).replace(/\/+$/, '');
    const query = new URLSearchParams({ key: apiKey }).toString();
    const response = await postJson(
      transport,
      `${base}/models/${model}:generateContent?${query}`,
      buildGeminiPayload(messages),
      {},
    );
    return extractGeminiContent(response);
  }

  if (provider === 'cohere') {
    const options = parseOptions(cohereOptionsSchema, request.options, provider);
    const apiKey = resolveApiKey(options, env);
    if (!apiKey) {
      throw new ProviderConfigError(
        'Cohere requires an API key. Configure llm.api_key_env or pass --api-key.',
      );
    }
    if (!request.model) {
      throw new ProviderConfigError('Specify --model for the Cohere provider.');
    }
    const response = await postJson(
      transport,
      options.api_base ?? COHERE_DEFAULT_ENDPOINT,
      buildCoherePayload(messages, request.model),
      {
        Authorization: `Bearer ${apiKey}`,
        'Cohere-Version': options.cohere_version ?? COHERE_DEFAULT_VERSION,
      },
    );
    return extractCohereContent(response);
  }

  throw new ProviderConfigError(`Unknown provider '${request.provider}'.`);
}

function toOllamaError(error: unknown): ProviderUnavailableError {
  if (error instanceof ProviderUnavailableError) return error;
  return new OllamaUnavailableError(
    `Ollama request failed: ${error instanceof Error ? error.message : String(error)}`,
  );
}

async function requestFromChatClient(
  chatClient: ChatClient,
  model: string,
  messages: ConversationMessage[],
  stream: boolean,
): Promise<string> {
  let reply: ChatReply;
  try {
    reply = await chatClient.send(model, messages, stream);
  } catch (error) {
    throw toOllamaError(error);
  }

  if (reply.mode === 'single') {
    return extractReplyContent(reply.reply);
  }

  const chunks: string[] = [];
  try {
    for await (const chunk of reply.chunks) {
      const content = extractReplyContent(chunk);
      if (content) chunks.push(content);
    }
  } catch (error) {
    throw toOllamaError(error);
  }
  return chunks.join('');
}

// ── Wire formats ───────────────────────────────────────────────────────

export function buildOpenAiPayload(messages: ConversationMessage[], model: string) {
  return { model, messages };
}

export interface GeminiPayload {
  contents: { role: 'user' | 'model'; parts: { text: string }[] }[];
  system_instruction?: { parts: { text: string }[] };
}

export function buildGeminiPayload(messages: ConversationMessage[]): GeminiPayload {
  let systemPrompt = '';
  const contents: GeminiPayload['contents'] = [];
  for (const message of messages) {
    if (message.role === 'system') {
      systemPrompt = message.content;
      continue;
    }
    contents.push({
      role: message.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: message.content }],
    });
  }

  const payload: GeminiPayload = { contents };
  if (systemPrompt) {
    payload.system_instruction = { parts: [{ text: systemPrompt }] };
  }
  return payload;
}

export interface CoherePayload {
  model: string;
  message: string;
  chat_history: { role: 'USER' | 'CHATBOT'; message: string }[];
  preamble?: string;
}

/** The latest user turn becomes `message`; every other turn stays in `chat_history`, in order. */
export function buildCoherePayload(messages: ConversationMessage[], model: string): CoherePayload {
  let preamble = '';
  const turns: ConversationMessage[] = [];
  for (const message of messages) {
    if (message.role === 'system') {
      preamble = message.content;
    } else {
      turns.push(message);
    }
  }

  let latestUser = -1;
  turns.forEach((turn, i) => {
    if (turn.role === 'user') latestUser = i;
  });

  const chatHistory: CoherePayload['chat_history'] = turns
    .filter((_, i) => i !== latestUser)
    .map((turn) => ({
      role: turn.role === 'assistant' ? 'CHATBOT' : 'USER',
      message: turn.content,
    }));

  const payload: CoherePayload = {
    model,
    message: latestUser >= 0 ? turns[latestUser].content : '',
    chat_history: chatHistory,
  };
  if (preamble) {
    payload.preamble = preamble;
  }
  return payload;
}

// ── Reply extraction ───────────────────────────────────────────────────

const textFieldSchema = z.object({ text: z.string() });
const openAiChoiceSchema = z.object({ message: z.object({ content: z.string() }) });
const geminiCandidateSchema = z.object({ content: z.object({ parts: z.array(z.unknown()) }) });
const choicesSchema = z.object({ choices: z.array(z.unknown()) });
const candidatesSchema = z.object({ candidates: z.array(z.unknown()) });
const generationsSchema = z.object({ generations: z.array(z.unknown()) });

function parseReply(raw: string, failure: string): unknown {
  try {
    const data: unknown = JSON.parse(raw);
    return data;
  } catch {
    throw new ProviderUnavailableError(failure);
  }
}

export function extractOpenAiContent(raw: string): string {
  const data = parseReply(raw, 'Unable to parse provider response as JSON.');
  const choices = choicesSchema.safeParse(data);
  for (const choice of choices.success ? choices.data.choices : []) {
    const parsed = openAiChoiceSchema.safeParse(choice);
    if (parsed.success) return parsed.data.message.content;
  }
  throw new ProviderUnavailableError('Provider response did not include message content.');
}

export function extractGeminiContent(raw: string): string {
  const data = parseReply(raw, 'Unable to parse Gemini response.');
  const candidates = candidatesSchema.safeParse(data);
  for (const candidate of candidates.success ? candidates.data.candidates : []) {
    const parsed = geminiCandidateSchema.safeParse(candidate);
    if (!parsed.success) continue;
    for (const part of parsed.data.content.parts) {
      const text = textFieldSchema.safeParse(part);
      if (text.success) return text.data.text;
    }
  }
  throw new ProviderUnavailableError('Gemini response did not include text content.');
}

export function extractCohereContent(raw: string): string {
  const data = parseReply(raw, 'Unable to parse Cohere response.');
  const direct = textFieldSchema.safeParse(data);
  if (direct.success) return direct.data.text;
  const generations = generationsSchema.safeParse(data);
  for (const generation of generations.success ? generations.data.generations : []) {
    const parsed = textFieldSchema.safeParse(generation);
    if (parsed.success) return parsed.data.text;
  }
  throw new ProviderUnavailableError('Cohere response did not include text content.');
}
