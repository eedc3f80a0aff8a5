/**
 * Amazon Bedrock Converse integration.
 *
 * Every interpreter asks the model for a single JSON object. This module owns
 * the call (model id, inference settings, timeout) and the parsing of the reply;
 * the interpreters own the prompts and the meaning of the fields.
 */

import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ContentBlock,
  type ConverseCommandInput,
} from '@aws-sdk/client-bedrock-runtime';
import { ExtractionFailedError, RequestAbortedError } from '../utils/errors';
import { isRecord } from '../utils/guards';
import { LogContext, errorMessage, logger } from '../utils/logger';

// ─── Client ─────────────────────────────────────────────────────────────────

export function initBedrockClient(region?: string): BedrockRuntimeClient {
  return new BedrockRuntimeClient({
    region: region || process.env.BEDROCK_REGION || process.env.AWS_REGION || 'us-east-1',
  });
}

// ─── Model client contract ──────────────────────────────────────────────────

export interface ModelRequest {
  system: string;
  message: string;
  maxTokens?: number;
  temperature?: number;
  /** Overrides the client's default model (the router uses its own). */
  modelId?: string;
  /** Request-level cancellation; the client adds its own timeout on top. */
  signal?: AbortSignal;
  log?: LogContext;
}

export interface ModelClient {
  /** Resolve with the JSON object the model replied with, or reject with ExtractionFailedError. */
  completeJson(request: ModelRequest): Promise<Record<string, unknown>>;
}

// ─── Reply parsing ──────────────────────────────────────────────────────────

/**
 * Parse the JSON object in a model reply. Models sometimes wrap it in prose or
 * a code fence, so everything outside the outermost braces is ignored.
 */
export function parseJsonObject(text: string): Record<string, unknown> {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new ExtractionFailedError('Model reply contains no JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    throw new ExtractionFailedError(`Model reply is not valid JSON: ${errorMessage(err)}`, err);
  }

  if (!isRecord(parsed)) {
    throw new ExtractionFailedError('Model reply JSON is not an object');
  }
  return parsed;
}

function replyText(content: ContentBlock[] | undefined): string {
  return (content ?? [])
    .map((block) => block.text ?? '')
    .join('')
    .trim();
}

/** One signal that fires on the caller's abort or after `timeoutMs`. */
function linkSignals(timeoutMs: number, signal?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  const timer = setTimeout(onAbort, timeoutMs);

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

// ─── Bedrock implementation ─────────────────────────────────────────────────

export interface BedrockModelOptions {
  modelId: string;
  timeoutMs: number;
}

export class BedrockModelClient implements ModelClient {
  private readonly client: BedrockRuntimeClient;
  private readonly options: BedrockModelOptions;

  constructor(client: BedrockRuntimeClient, options: BedrockModelOptions) {
    this.client = client;
    this.options = options;
  }

  async completeJson(request: ModelRequest): Promise<Record<string, unknown>> {
    const modelId = request.modelId ?? this.options.modelId;
    const ctx = request.log ?? {};

    const input: ConverseCommandInput = {
      modelId,
      system: [{ text: request.system }],
      messages: [{ role: 'user', content: [{ text: request.message }] }],
      inferenceConfig: {
        maxTokens: request.maxTokens ?? 800,
        temperature: request.temperature ?? 0.1,
      },
    };

    logger.info('Calling Bedrock Converse', ctx, { modelId });

    const linked = linkSignals(this.options.timeoutMs, request.signal);
    let text: string;
    try {
      const response = await this.client.send(new ConverseCommand(input), {
        abortSignal: linked.signal,
      });
      text = replyText(response.output?.message?.content);
    } catch (err) {
      if (request.signal?.aborted) {
        throw new RequestAbortedError('Request aborted during model call');
      }
      const reason = linked.signal.aborted
        ? `timed out after ${this.options.timeoutMs} ms`
        : errorMessage(err);
      logger.error('Bedrock Converse failed', ctx, { modelId, error: reason });
      throw new ExtractionFailedError(`Bedrock call failed: ${reason}`, err);
    } finally {
      linked.dispose();
    }

    if (!text) {
      throw new ExtractionFailedError('Bedrock returned no text content');
    }

    logger.debug('Bedrock reply received', ctx, { length: text.length });
    return parseJsonObject(text);
  }
}
