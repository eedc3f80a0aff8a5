/**
 * Knowledge base retrieval through the RAG worker Lambda.
 *
 * Retrieval only enriches prompts, so every failure degrades to "no documents".
 */

import { InvokeCommand, LambdaClient } from '@aws-sdk/client-lambda';
import { KnowledgeDocument } from '../models/interpret';
import { isRecord } from '../utils/guards';
import { LogContext, errorMessage, logger } from '../utils/logger';

export function initLambdaClient(region?: string): LambdaClient {
  return new LambdaClient({
    region: region || process.env.AWS_REGION || 'us-east-1',
  });
}

export interface RetrieveOptions {
  userId?: string;
  maxResults?: number;
  signal?: AbortSignal;
  log?: LogContext;
}

export interface KnowledgeBase {
  retrieve(query: string, options?: RetrieveOptions): Promise<KnowledgeDocument[]>;
}

/** Keep the documents that carry text content; a missing source reads "Desconocida". */
export function parseDocuments(payload: unknown): KnowledgeDocument[] {
  if (!isRecord(payload) || !Array.isArray(payload.documents)) {
    return [];
  }

  const documents: KnowledgeDocument[] = [];
  for (const entry of payload.documents) {
    if (!isRecord(entry) || typeof entry.content !== 'string' || entry.content.trim() === '') {
      continue;
    }
    documents.push({
      content: entry.content,
      source: typeof entry.source === 'string' && entry.source ? entry.source : 'Desconocida',
    });
  }
  return documents;
}

/** Render documents as a prompt section; empty string when there are none. */
export function formatDocumentsForPrompt(documents: readonly KnowledgeDocument[]): string {
  return documents
    .map((doc, index) => `[Documento ${index + 1} - Fuente: ${doc.source}]\n${doc.content}`)
    .join('\n\n');
}

export class LambdaKnowledgeBase implements KnowledgeBase {
  private readonly client: LambdaClient;
  private readonly functionArn: string;
  private readonly defaultMaxResults: number;

  constructor(client: LambdaClient, functionArn: string, defaultMaxResults = 5) {
    this.client = client;
    this.functionArn = functionArn;
    this.defaultMaxResults = defaultMaxResults;
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<KnowledgeDocument[]> {
    const ctx = options.log ?? {};
    const payload = {
      query,
      max_results: options.maxResults ?? this.defaultMaxResults,
      ...(options.userId ? { user_id: options.userId } : {}),
    };

    logger.info('Invoking RAG worker', ctx, { query: query.slice(0, 50) });

    try {
      const response = await this.client.send(
        new InvokeCommand({
          FunctionName: this.functionArn,
          InvocationType: 'RequestResponse',
          Payload: Buffer.from(JSON.stringify(payload)),
        }),
        { abortSignal: options.signal },
      );

      const body: unknown = response.Payload
        ? JSON.parse(Buffer.from(response.Payload).toString('utf8'))
        : {};

      if (response.FunctionError) {
        const detail = isRecord(body) && typeof body.errorMessage === 'string' ? body.errorMessage : 'Unknown error';
        logger.error('RAG worker returned a function error', ctx, {
          functionError: response.FunctionError,
          error: detail,
        });
        return [];
      }

      const documents = parseDocuments(body);
      logger.info('Retrieved documents from RAG worker', ctx, { count: documents.length });
      return documents;
    } catch (err) {
      logger.error('Failed to retrieve context from RAG worker', ctx, { error: errorMessage(err) });
      return [];
    }
  }
}

/** Used when no RAG worker is configured. */
export const emptyKnowledgeBase: KnowledgeBase = {
  async retrieve(): Promise<KnowledgeDocument[]> {
    return [];
  },
};
