/**
 * Shared DynamoDB document client.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

export function initDocClient(region?: string): DynamoDBDocumentClient {
  const ddbClient = new DynamoDBClient({
    region: region || process.env.AWS_REGION || 'us-east-1',
  });
  return DynamoDBDocumentClient.from(ddbClient, {
    marshallOptions: { removeUndefinedValues: true },
  });
}

export function isConditionalCheckFailure(err: unknown): boolean {
  return err instanceof Error && err.name === 'ConditionalCheckFailedException';
}
