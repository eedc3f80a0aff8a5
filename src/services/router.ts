/**
 * Agent router: picks the interpreter for a free-text message.
 *
 * A follow-up answer ("en Miraflores") says nothing about its target on its
 * own, so the router is told which interpreter asked the open question.
 */

import { SessionRecord, TARGET_ENDPOINTS, Target, targetFromEndpoint } from '../models/session';
import { ExtractionFailedError } from '../utils/errors';
import { LogContext, errorMessage, logger } from '../utils/logger';
import { ModelClient } from './bedrock';

export const ROUTER_SYSTEM_PROMPT = `Eres un asistente de salud cuya única función es CLASIFICAR el mensaje del usuario y decidir a qué servicio derivarlo. No haces triaje clínico, no interpretas síntomas y no das recomendaciones.

Servicios disponibles:

1. triage/interpret
- El usuario describe síntomas, malestares, dolor o molestias físicas o emocionales.
- Pregunta si algo es grave o urgente, o qué hacer.
- Menciona la duración de sus síntomas o señales de alarma.

2. doctors/interpret
- Quiere agendar, cancelar o ver citas médicas.
- Pregunta a qué doctor o especialista ir.
- Busca disponibilidad, horarios o modalidad (virtual/presencial) de médicos.

3. workshops/interpret
- Busca talleres de bienestar: estrés, sueño, ansiedad leve, nutrición, hábitos saludables.
- Pide actividades preventivas o de autocuidado.

Si el mensaje responde a una pregunta pendiente, deriva al servicio que la hizo.

Responde EXCLUSIVAMENTE con JSON:
{
  "endpoint": "triage/interpret" | "doctors/interpret" | "workshops/interpret",
  "confidence": número entre 0.0 y 1.0,
  "reasoning": "breve explicación en español"
}`;

export interface RoutingDecision {
  target: Target;
  endpoint: string;
  confidence: number;
  reasoning: string;
  /** True when the model could not be used and the decision came from history. */
  fallback: boolean;
}

export interface ClassifyOptions {
  modelId?: string;
  signal?: AbortSignal;
  log?: LogContext;
}

/** The question the newest turn left open; a later turn retires an older one. */
function openQuestion(session: SessionRecord | null): { target: Target; question: string } | null {
  const newest = session?.turns[session.turns.length - 1];
  if (!newest?.pendingQuestion) return null;
  return { target: newest.target, question: newest.pendingQuestion };
}

function clampConfidence(raw: unknown): number {
  const value = typeof raw === 'string' ? Number(raw) : raw;
  if (typeof value !== 'number' || Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function fallbackDecision(session: SessionRecord | null, reason: string): RoutingDecision {
  const target = openQuestion(session)?.target ?? 'triage';
  return {
    target,
    endpoint: TARGET_ENDPOINTS[target],
    confidence: 0,
    reasoning: reason,
    fallback: true,
  };
}

export async function classifyMessage(
  model: ModelClient,
  message: string,
  session: SessionRecord | null,
  options: ClassifyOptions = {},
): Promise<RoutingDecision> {
  const pending = openQuestion(session);
  const prompt = pending
    ? `Pregunta pendiente de ${TARGET_ENDPOINTS[pending.target]}: "${pending.question}"\n\nMensaje del usuario: "${message}"`
    : `Mensaje del usuario: "${message}"`;

  try {
    const reply = await model.completeJson({
      system: ROUTER_SYSTEM_PROMPT,
      message: prompt,
      maxTokens: 300,
      temperature: 0,
      modelId: options.modelId,
      signal: options.signal,
      log: options.log,
    });

    const target = targetFromEndpoint(reply.endpoint);
    if (!target) {
      throw new ExtractionFailedError(`Router returned an unknown endpoint: ${String(reply.endpoint)}`);
    }

    return {
      target,
      endpoint: TARGET_ENDPOINTS[target],
      confidence: clampConfidence(reply.confidence),
      reasoning: typeof reply.reasoning === 'string' ? reply.reasoning : '',
      fallback: false,
    };
  } catch (err) {
    if (!(err instanceof ExtractionFailedError)) throw err;

    logger.warn('Router classification failed, falling back', options.log ?? {}, {
      error: errorMessage(err),
    });
    return fallbackDecision(session, 'Clasificación no disponible; se usa el historial de la conversación.');
  }
}
