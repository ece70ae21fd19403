import { ProviderUnavailableError } from '../utils/errors.js';

export interface Transport {
  /** POST `body` to `url` and resolve with the raw response text. */
  post(url: string, body: string, headers: Record<string, string>): Promise<string>;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

export class FetchTransport implements Transport {
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async post(url: string, body: string, headers: Record<string, string>): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new ProviderUnavailableError(
          `Provider did not respond within ${Math.round(this.timeoutMs / 1000)}s.`,
        );
      }
      throw new ProviderUnavailableError(
        `Failed to reach provider endpoint: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ProviderUnavailableError(
        `Failed to read provider response: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!response.ok) {
      throw new ProviderUnavailableError(`Provider returned HTTP ${response.status}: ${text}`);
    }
    return text;
  }
}

/** POST `payload` as JSON through `transport`, normalising any failure to a ProviderUnavailableError. */
export async function postJson(
  transport: Transport,
  url: string,
  payload: unknown,
  headers: Record<string, string>,
): Promise<string> {
  const merged = { 'Content-Type': 'application/json', ...headers };
  try {
    return await transport.post(url, JSON.stringify(payload), merged);
  } catch (error) {
    if (error instanceof ProviderUnavailableError) throw error;
    throw new ProviderUnavailableError(
      `Provider request failed: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
