import OpenAI from 'openai';
import { UpstreamError, type UpstreamErrorKind } from '../errors';
import type { StageName, TokenUsage } from '../types';
import type { Logger } from '../util/logger';
import { silentLogger } from '../util/logger';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  stage: StageName;
  model: string;
  messages: ChatMessage[];
  json: boolean;
  temperature?: number;
}

export interface CompletionResult {
  text: string;
  model: string;
  usage?: TokenUsage;
}

/** One request in, one reply out. Implementations must reject with {@link UpstreamError}. */
export interface ModelClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
  logger?: Logger;
}

function readStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function classify(error: unknown, status: number | undefined): UpstreamErrorKind {
  if (error instanceof OpenAI.APIConnectionTimeoutError) return 'timeout';
  if (error instanceof OpenAI.APIConnectionError) return 'network';
  if (status === 429) return readCode(error) === 'insufficient_quota' ? 'quota' : 'rate_limit';
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'model_not_found';
  if (status === 400 || status === 422) return 'bad_request';
  if (status !== undefined && status >= 500) return 'server';
  return 'unknown';
}

/** Normalize anything the SDK (or a network layer below it) throws. */
export function toUpstreamError(error: unknown): UpstreamError {
  if (error instanceof UpstreamError) return error;
  const status = readStatus(error);
  const message = error instanceof Error && error.message.trim()
    ? error.message
    : 'Model request failed';
  return new UpstreamError(classify(error, status), message, status, { cause: error });
}

export function readCompletionText(completion: OpenAI.Chat.Completions.ChatCompletion): string {
  const content = completion.choices[0]?.message?.content;
  if (!content || !content.trim()) {
    throw new UpstreamError('empty_response', `Model ${completion.model} returned no content`);
  }
  return content;
}

export function readUsage(completion: OpenAI.Chat.Completions.ChatCompletion): TokenUsage | undefined {
  if (!completion.usage) return undefined;
  return {
    inputTokens: completion.usage.prompt_tokens,
    outputTokens: completion.usage.completion_tokens,
    requests: 1
  };
}

export class OpenAIModelClient implements ModelClient {
  private readonly openai: OpenAI;
  private readonly logger: Logger;

  constructor(options: OpenAIClientOptions) {
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      // Failures surface to the user; re-running is their call.
      maxRetries: 0,
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {})
    });
    this.logger = (options.logger ?? silentLogger).child('OpenAI');
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.openai.chat.completions.create({
        model: request.model,
        messages: request.messages,
        stream: false,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.json ? { response_format: { type: 'json_object' as const } } : {})
      });
    } catch (error) {
      const upstream = toUpstreamError(error);
      this.logger.error(`${request.stage} call failed`, { kind: upstream.kind, status: upstream.status, message: upstream.message });
      throw upstream;
    }

    const usage = readUsage(completion);
    if (usage) {
      this.logger.debug(`Tokens - Input: ${usage.inputTokens}, Output: ${usage.outputTokens}`, { stage: request.stage });
    }
    return { text: readCompletionText(completion), model: completion.model, usage };
  }
}
