/**
 * Session persistence: one record per user in a TTL-enabled DynamoDB table.
 *
 * Expired and malformed records read as absent. Every write replaces the whole
 * record, refreshes the TTL and is conditional on the version that was read.
 */

import { DeleteCommand, DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { RiskState, SessionRecord, Turn, parseSessionRecord } from '../models/session';
import { SessionUnavailableError, SessionVersionConflictError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import { isConditionalCheckFailure } from './dynamodb';

export interface SessionDraft {
  turns: Turn[];
  risk_state?: RiskState;
}

export interface SessionSnapshot {
  /** Live session, or null when absent, expired or malformed. */
  session: SessionRecord | null;
  /** Version of the stored item, live or not; null when no versioned item exists. */
  version: number | null;
}

export interface PutOptions {
  /** Version the caller read; null requires that no versioned item exists. */
  expectedVersion?: number | null;
}

export interface SessionStore {
  load(userId: string): Promise<SessionSnapshot>;
  get(userId: string): Promise<SessionRecord | null>;
  /** Returns the written record, or null when an empty draft deleted it. */
  put(userId: string, draft: SessionDraft, ttlSeconds: number, options?: PutOptions): Promise<SessionRecord | null>;
}

export type Clock = () => number;

/** Build the record that a put would store, shared by every store implementation. */
export function buildSessionRecord(
  userId: string,
  draft: SessionDraft,
  ttlSeconds: number,
  version: number,
  nowMs: number,
): SessionRecord {
  const ttl = Math.floor(nowMs / 1000) + ttlSeconds;
  return {
    user_id: userId,
    turns: draft.turns,
    expires_at: new Date(ttl * 1000).toISOString(),
    ttl,
    version,
    updated_at: new Date(nowMs).toISOString(),
    ...(draft.risk_state ? { risk_state: draft.risk_state } : {}),
  };
}

/** A record is live while its TTL lies in the future and it holds at least one turn. */
export function isLive(session: SessionRecord, nowMs: number): boolean {
  return session.ttl > Math.floor(nowMs / 1000) && session.turns.length > 0;
}

export class DynamoSessionStore implements SessionStore {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly now: Clock;

  constructor(docClient: DynamoDBDocumentClient, tableName: string, now: Clock = Date.now) {
    this.docClient = docClient;
    this.tableName = tableName;
    this.now = now;
  }

  async load(userId: string): Promise<SessionSnapshot> {
    let item: Record<string, unknown> | undefined;
    try {
      const result = await this.docClient.send(new GetCommand({
        TableName: this.tableName,
        Key: { user_id: userId },
        ConsistentRead: true,
      }));
      item = result.Item;
    } catch (err) {
      throw new SessionUnavailableError(`Failed to read session: ${errorMessage(err)}`, err);
    }

    if (!item) {
      return { session: null, version: null };
    }

    const version = typeof item.version === 'number' ? item.version : null;
    const parsed = parseSessionRecord(item);
    if (!parsed.valid) {
      logger.warn('Malformed session record, treating as absent', { userId }, { error: parsed.error });
      return { session: null, version };
    }

    if (!isLive(parsed.session, this.now())) {
      logger.debug('Session expired', { userId }, { expiresAt: parsed.session.expires_at });
      return { session: null, version };
    }

    return { session: parsed.session, version };
  }

  async get(userId: string): Promise<SessionRecord | null> {
    const { session } = await this.load(userId);
    return session;
  }

  async put(
    userId: string,
    draft: SessionDraft,
    ttlSeconds: number,
    options: PutOptions = {},
  ): Promise<SessionRecord | null> {
    if (draft.turns.length === 0) {
      await this.delete(userId);
      return null;
    }

    const expectedVersion = options.expectedVersion;
    const record = buildSessionRecord(userId, draft, ttlSeconds, (expectedVersion ?? 0) + 1, this.now());

    const condition = expectedVersion === undefined
      ? {}
      : expectedVersion === null
        ? {
          ConditionExpression: 'attribute_not_exists(#version)',
          ExpressionAttributeNames: { '#version': 'version' },
        }
        : {
          ConditionExpression: '#version = :expected',
          ExpressionAttributeNames: { '#version': 'version' },
          ExpressionAttributeValues: { ':expected': expectedVersion },
        };

    try {
      await this.docClient.send(new PutCommand({
        TableName: this.tableName,
        Item: record,
        ...condition,
      }));
    } catch (err) {
      if (isConditionalCheckFailure(err)) {
        throw new SessionVersionConflictError(userId, expectedVersion ?? null);
      }
      throw new SessionUnavailableError(`Failed to write session: ${errorMessage(err)}`, err);
    }

    logger.debug('Session written', { userId }, {
      turnCount: record.turns.length,
      version: record.version,
    });
    return record;
  }

  private async delete(userId: string): Promise<void> {
    try {
      await this.docClient.send(new DeleteCommand({
        TableName: this.tableName,
        Key: { user_id: userId },
      }));
    } catch (err) {
      throw new SessionUnavailableError(`Failed to delete session: ${errorMessage(err)}`, err);
    }
    logger.debug('Empty session deleted', { userId });
  }
}
