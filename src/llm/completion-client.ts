import OpenAI, { APIConnectionError, APIError } from 'openai';
import { config } from '../config';
import { createLogger, errorMessage } from '../observability/logger';

const log = createLogger('completion');

export const MISSING_CREDENTIAL_TEXT = 'Please enter a valid API key.';
export const EMPTY_INPUT_TEXT = 'Please enter a valid message.';
export const NO_RESPONSE_TEXT = 'No response';

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type CompletionResult =
  | { kind: 'ok'; text: string }
  | { kind: 'missing_credential' }
  | { kind: 'empty_input' }
  | { kind: 'transport'; description: string }
  | { kind: 'http'; status: number; description: string; body?: string }
  | { kind: 'malformed'; description: string; body?: string };

export type CompletionClientOptions = {
  baseURL?: string;
  model?: string;
  fetch?: FetchLike;
};

function isBlank(value: string | undefined | null): boolean {
  return !value || value.trim().length === 0;
}

function extractContent(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('choices' in data)) return undefined;
  const { choices } = data;
  if (!Array.isArray(choices) || choices.length === 0) return undefined;
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return undefined;
  const { message } = first;
  if (typeof message !== 'object' || message === null || !('content' in message)) return undefined;
  const { content } = message;
  return typeof content === 'string' ? content : undefined;
}

function describeConnectionError(err: APIConnectionError): string {
  const cause = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message} (${cause.message})`;
  }
  return err.message;
}

/**
 * Renders a result the way the transcript shows it: the completion text,
 * a fixed prompt for the two guard cases, or an inline error report.
 */
export function describeResult(result: CompletionResult): string {
  switch (result.kind) {
    case 'ok':
      return result.text;
    case 'missing_credential':
      return MISSING_CREDENTIAL_TEXT;
    case 'empty_input':
      return EMPTY_INPUT_TEXT;
    case 'transport':
      return `Error: ${result.description}\nResponse: ${NO_RESPONSE_TEXT}`;
    case 'http':
    case 'malformed':
      // an empty body counts as no response
      return `Error: ${result.description}\nResponse: ${result.body || NO_RESPONSE_TEXT}`;
  }
}

/**
 * Single-turn client for an OpenAI-compatible chat completions endpoint.
 *
 * Holds no conversation state: each call sends exactly one user message.
 * The credential arrives with every call, so an SDK client is built per call.
 */
export class CompletionClient {
  private baseURL: string;
  private model: string;
  private fetchImpl: FetchLike;

  constructor(opts: CompletionClientOptions = {}) {
    this.baseURL = opts.baseURL ?? config.chatApiBaseUrl;
    this.model = opts.model ?? config.chatModel;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async request(credential: string, userText: string): Promise<CompletionResult> {
    if (isBlank(credential)) return { kind: 'missing_credential' };
    if (isBlank(userText)) return { kind: 'empty_input' };

    // the SDK parses error bodies away; keep the raw text for the transcript
    let rawBody: string | undefined;
    const fetchImpl = this.fetchImpl;
    const client = new OpenAI({
      apiKey: credential,
      baseURL: this.baseURL,
      maxRetries: 0,
      fetch: async (input, init) => {
        const response = await fetchImpl(input, init);
        rawBody = await response.clone().text();
        return response;
      }
    });

    let data: unknown;
    try {
      data = await client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: userText }]
      });
    } catch (err) {
      return this.classifyFailure(err, rawBody);
    }

    const text = extractContent(data);
    if (text === undefined) {
      log.warn('completion body missing choices[0].message.content', { model: this.model });
      return {
        kind: 'malformed',
        description: 'completion response did not contain choices[0].message.content',
        body: rawBody
      };
    }
    return { kind: 'ok', text };
  }

  async complete(credential: string, userText: string): Promise<string> {
    return describeResult(await this.request(credential, userText));
  }

  private classifyFailure(err: unknown, rawBody: string | undefined): CompletionResult {
    if (err instanceof APIError && typeof err.status === 'number') {
      log.warn('completion http error', { status: err.status });
      return { kind: 'http', status: err.status, description: err.message, body: rawBody || undefined };
    }
    if (err instanceof APIConnectionError) {
      log.warn('completion transport error', { error: err.message });
      return { kind: 'transport', description: describeConnectionError(err) };
    }
    if (rawBody !== undefined) {
      log.warn('completion body unreadable', { error: errorMessage(err) });
      return { kind: 'malformed', description: errorMessage(err), body: rawBody };
    }
    log.warn('completion failed before a response', { error: errorMessage(err) });
    return { kind: 'transport', description: errorMessage(err) };
  }
}
