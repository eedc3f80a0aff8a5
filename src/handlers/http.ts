/**
 * Shared plumbing of the API Gateway handlers: body parsing, CORS headers,
 * the request deadline and the mapping of errors to status codes.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { getConductor, getConfig } from '../app';
import { InterpretRequest, validateInterpretRequest } from '../models/interpret';
import { IntakeConductor, IntakeRequest } from '../services/conductor';
import { AppError, RequestAbortedError } from '../utils/errors';
import { LogContext, errorMessage, logger } from '../utils/logger';

/** Time kept back from the Lambda deadline to return the 504 ourselves. */
const DEADLINE_MARGIN_MS = 1_000;

export function corsHeaders(event: APIGatewayProxyEvent, allowedOrigins: readonly string[]): Record<string, string> {
  const origin = event.headers?.origin ?? event.headers?.Origin;
  let allowOrigin = allowedOrigins[0] ?? '*';
  if (allowedOrigins.includes('*')) {
    allowOrigin = '*';
  } else if (origin && allowedOrigins.includes(origin)) {
    allowOrigin = origin;
  }

  return {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': allowOrigin,
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Allow-Methods': 'POST,OPTIONS',
  };
}

function respond(statusCode: number, body: unknown, headers: Record<string, string>): APIGatewayProxyResult {
  return { statusCode, headers, body: JSON.stringify(body) };
}

export function parseBody(
  event: APIGatewayProxyEvent,
): { valid: true; request: InterpretRequest } | { valid: false; error: string } {
  let body: unknown;
  try {
    const raw = event.isBase64Encoded && event.body ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
    body = JSON.parse(raw || '{}');
  } catch {
    return { valid: false, error: 'El cuerpo de la solicitud no es JSON válido' };
  }
  return validateInterpretRequest(body);
}

/** Signal that fires shortly before the Lambda runs out of time. */
export function deadlineSignal(context?: Context): { signal?: AbortSignal; dispose: () => void } {
  if (!context) return { dispose: () => undefined };

  const controller = new AbortController();
  const budget = Math.max(0, context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS);
  const timer = setTimeout(() => controller.abort(), budget);
  return { signal: controller.signal, dispose: () => clearTimeout(timer) };
}

type Operation = (conductor: IntakeConductor, request: IntakeRequest) => Promise<unknown>;

/** Build an API Gateway handler around one conductor operation. */
export function intakeHandler(name: string, operation: Operation) {
  return async (event: APIGatewayProxyEvent, context?: Context): Promise<APIGatewayProxyResult> => {
    const requestId = context?.awsRequestId ?? event.requestContext?.requestId;
    const headers = corsHeaders(event, getConfig().allowedOrigins);

    if (event.httpMethod === 'OPTIONS') {
      return { statusCode: 204, headers, body: '' };
    }

    const parsed = parseBody(event);
    if (!parsed.valid) {
      logger.warn('Invalid request', { requestId }, { handler: name, error: parsed.error });
      return respond(400, { error: 'bad_request', message: parsed.error }, headers);
    }

    const ctx: LogContext = { userId: parsed.request.user_id, requestId };
    logger.info('Request received', ctx, { handler: name });

    const deadline = deadlineSignal(context);
    try {
      const result = await operation(getConductor(), {
        userId: parsed.request.user_id,
        message: parsed.request.message,
        requestId,
        signal: deadline.signal,
      });
      return respond(200, result, headers);
    } catch (err) {
      if (err instanceof RequestAbortedError) {
        logger.warn('Request aborted', ctx, { handler: name, error: err.message });
        return respond(504, { error: err.code, message: 'La solicitud tardó demasiado. Inténtalo de nuevo.' }, headers);
      }
      if (err instanceof AppError && err.statusCode < 500) {
        return respond(err.statusCode, { error: err.code, message: err.message }, headers);
      }
      logger.error('Unhandled error', ctx, { handler: name, error: errorMessage(err) });
      return respond(500, { error: 'internal_error', message: 'Error interno del servidor' }, headers);
    } finally {
      deadline.dispose();
    }
  };
}
