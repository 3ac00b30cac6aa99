import { isJsonifibleObject } from '@duplexmcp/protocol';

import {
  DEFAULT_GENERATION_BASE_URL,
  DEFAULT_GENERATION_MAX_TOKENS,
  DEFAULT_GENERATION_MODEL,
  DEFAULT_GENERATION_PATH,
  DEFAULT_GENERATION_TEMPERATURE,
  DEFAULT_GENERATION_TIMEOUT_MS,
  SAMPLING_ERROR_PREFIX,
} from '#constants/defaults';
import { ExternalError } from '#errors';

import type { Log } from '@duplexmcp/core';
import type {
  CreateMessageRequest,
  CreateMessageResult,
  JsonifibleObject,
  JsonifibleValue,
  Role,
  SamplingMessage,
} from '@duplexmcp/protocol';

/** produces generations on behalf of a server */
export interface GenerationProvider {
  /** model reported when a generation fails */
  readonly model?: string;
  /**
   * runs one generation
   * @param request messages and bounds of the generation
   * @returns the generated message
   */
  createMessage(
    request: CreateMessageRequest['params'],
  ): Promise<CreateMessageResult>;
}

/** configuration of an http generation provider */
export interface HttpGenerationProviderOptions {
  /** base url of the model server (default: http://127.0.0.1:8080) */
  baseUrl?: string;
  /** path of the chat completions endpoint (default: /v1/chat/completions) */
  path?: string;
  /** model name sent with every completion (default: local-llm) */
  model?: string;
  /** sampling temperature (default: 0.7) */
  temperature?: number;
  /** token bound used when the request carries none (default: 512) */
  maxTokens?: number;
  /** time allowed for one completion in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** fetch implementation (default: the global fetch) */
  fetch?: typeof fetch;
  /** logs provider operations */
  log?: Log;
}

/**
 * builds the error-flavoured generation returned instead of a failure
 * @param exception why the generation failed
 * @param model model to report
 * @returns an assistant message labelled as a sampling error
 */
export function createSamplingErrorResult(
  exception: unknown,
  model?: string,
): CreateMessageResult {
  const reason =
    exception instanceof Error ? exception.message : String(exception);

  return {
    role: 'assistant',
    content: { type: 'text', text: `${SAMPLING_ERROR_PREFIX} ${reason}` },
    ...(model !== undefined && { model }),
    stopReason: 'error',
  };
}

/**
 * extracts the text of a sampling message, non-text content reading as empty
 * @param message message to read
 * @returns the text carried by the message
 */
function readMessageText({ content }: SamplingMessage): string {
  return content.type === 'text' ? content.text : '';
}

/**
 * reads the text of a completion message content
 * @param content content field of the completion message
 * @returns the joined text
 */
function readCompletionText(content: JsonifibleValue): string {
  if (typeof content === 'string') {
    return content;
  }

  if (Array.isArray(content)) {
    const parts: unknown[] = content;

    return parts
      .map((part) =>
        isJsonifibleObject(part) && typeof part.text === 'string'
          ? part.text
          : '',
      )
      .join('');
  }

  return content === undefined || content === null ? '' : String(content);
}

/**
 * reads a string field when present
 * @param source object to read from
 * @param key field name
 * @returns the string value, undefined otherwise
 */
function readString(source: JsonifibleObject, key: string): string | undefined {
  const value = source[key];

  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * generation provider backed by an openai-compatible chat completions endpoint
 *
 * failures never escape: they are turned into an assistant message whose text
 * starts with [sampling error] and whose stop reason is error.
 */
export class HttpGenerationProvider implements GenerationProvider {
  readonly #url: string;
  readonly #model: string;
  readonly #temperature: number;
  readonly #maxTokens: number;
  readonly #timeoutMs: number;
  readonly #fetch: typeof fetch;
  readonly #log?: Log;

  constructor(options: HttpGenerationProviderOptions = {}) {
    const baseUrl = options.baseUrl ?? DEFAULT_GENERATION_BASE_URL;

    this.#url = `${baseUrl.replace(/\/+$/, '')}${options.path ?? DEFAULT_GENERATION_PATH}`;
    this.#model = options.model ?? DEFAULT_GENERATION_MODEL;
    this.#temperature = options.temperature ?? DEFAULT_GENERATION_TEMPERATURE;
    this.#maxTokens = options.maxTokens ?? DEFAULT_GENERATION_MAX_TOKENS;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.#fetch = options.fetch ?? fetch;
    this.#log = options.log;
  }

  /** model name sent with every completion */
  public get model(): string {
    return this.#model;
  }

  /** endpoint receiving the completions */
  public get url(): string {
    return this.#url;
  }

  public async createMessage(
    request: CreateMessageRequest['params'],
  ): Promise<CreateMessageResult> {
    const payload = this.buildPayload(request);

    this.#log?.('debug', 'submitting a completion', {
      url: this.#url,
      model: this.#model,
    });

    try {
      const body = await this.#post(payload);

      return this.parseCompletion(body);
    } catch (exception) {
      const reason =
        exception instanceof Error ? exception.message : String(exception);

      this.#log?.('warn', 'completion failed', { url: this.#url, reason });

      return createSamplingErrorResult(exception, this.#model);
    }
  }

  /**
   * builds the chat completions payload of a generation request
   * @param request generation request
   * @returns the json body posted to the endpoint
   */
  public buildPayload(request: CreateMessageRequest['params']): JsonifibleObject {
    const system = request.systemPrompt
      ? [{ role: 'system', content: request.systemPrompt }]
      : [];

    return {
      model: this.#model,
      messages: [
        ...system,
        ...request.messages.map((message) => ({
          role: message.role,
          content: readMessageText(message),
        })),
      ],
      temperature: this.#temperature,
      max_tokens: request.maxTokens || this.#maxTokens,
      stream: false,
    };
  }

  /**
   * turns a completion body into a generation
   * @param body parsed response body
   * @returns the generated message
   * @throws {ExternalError} if the body carries no completion
   */
  public parseCompletion(body: unknown): CreateMessageResult {
    if (!isJsonifibleObject(body)) {
      throw new ExternalError('Invalid response payload');
    }

    const choices = body.choices;
    const choice = Array.isArray(choices)
      ? choices[0]
      : 'content' in body
        ? body
        : undefined;

    if (!isJsonifibleObject(choice)) {
      throw new ExternalError('Invalid response payload');
    }

    const message = isJsonifibleObject(choice.message) ? choice.message : choice;
    const role: Role = message.role === 'user' ? 'user' : 'assistant';
    const stopReason =
      readString(choice, 'finish_reason') ?? readString(choice, 'stopReason');

    return {
      role,
      content: { type: 'text', text: readCompletionText(message.content).trim() },
      model:
        readString(body, 'model') ?? readString(choice, 'model') ?? this.#model,
      ...(stopReason !== undefined && { stopReason }),
    };
  }

  /**
   * posts a payload and parses the json answer
   * @param payload body to send
   * @returns the parsed response body
   * @throws {ExternalError} if the server answers with a non-success status
   */
  async #post(payload: JsonifibleObject): Promise<unknown> {
    const response = await this.#fetch(this.#url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.#timeoutMs),
    });

    if (!response.ok) {
      throw new ExternalError(`HTTP ${response.status}: ${await response.text()}`);
    }

    const body: unknown = await response.json();

    return body;
  }
}
