/**
 * Interpreter contracts and the HTTP payloads of the interpret endpoints.
 */

import { isRecord } from '../utils/guards';
import { AccumulatedContext } from './context';
import { RiskTier, Target, TurnFields } from './session';

// ─── Dispatcher boundary ────────────────────────────────────────────────────

export interface ExtractionRequest {
  userId: string;
  message: string;
  context: AccumulatedContext;
  /** High-water mark so far (triage only). */
  priorRiskTier: RiskTier | null;
  signal?: AbortSignal;
  requestId?: string;
}

export interface ExtractionResult {
  target: Target;
  /** Fields extracted from this turn only. */
  fields: TurnFields;
  pendingQuestion: string | null;
  /** Tier of this turn taken alone (triage only); null when the model gave none. */
  riskTier: RiskTier | null;
  requiresMoreInfo: boolean;
  /** Doctors "accion" or workshops "operation". */
  action: string | null;
  /** Endpoint the interpreter suggests handing over to. */
  referral: string | null;
}

export interface Interpreter {
  readonly target: Target;
  interpret(request: ExtractionRequest): Promise<ExtractionResult>;
}

// ─── HTTP request ───────────────────────────────────────────────────────────

export interface InterpretRequest {
  user_id: string;
  message: string;
}

const MAX_MESSAGE_LENGTH = 4000;

export function validateInterpretRequest(
  data: unknown,
): { valid: true; request: InterpretRequest } | { valid: false; error: string } {
  if (!isRecord(data)) {
    return { valid: false, error: 'El cuerpo debe ser un objeto JSON' };
  }

  const { user_id, message } = data;

  if (typeof user_id !== 'string' || user_id.trim().length === 0) {
    return { valid: false, error: 'user_id es requerido para mantener el historial.' };
  }

  if (typeof message !== 'string' || message.trim().length === 0) {
    return { valid: false, error: 'message es requerido.' };
  }

  if (message.length > MAX_MESSAGE_LENGTH) {
    return { valid: false, error: `message no puede superar ${MAX_MESSAGE_LENGTH} caracteres.` };
  }

  return { valid: true, request: { user_id: user_id.trim(), message: message.trim() } };
}

// ─── Responses ──────────────────────────────────────────────────────────────

export const DISCLAIMER =
  'Este asistente no reemplaza una evaluación médica profesional. Si tus síntomas empeoran o ' +
  'presentas signos de alarma (dificultad para respirar, dolor de pecho intenso, confusión, ' +
  'sangrado abundante, pérdida de conciencia), acude de inmediato a un servicio de emergencia.';

export interface TriageResponse {
  capa: RiskTier;
  /** Tier the model gave for this message alone. */
  capa_modelo: RiskTier | null;
  razones: string[];
  especialidad_sugerida: string | null;
  taller_sugerido: string | null;
  accion_recomendada: string;
  requiere_mas_informacion: boolean;
  pregunta_pendiente: string | null;
  derivar_a: string | null;
  advertencia: string;
  escalado: boolean;
  combinacion_detectada: string | null;
}

export interface DoctorRecord {
  doctor_id: string;
  [attribute: string]: unknown;
}

export interface ScheduleRecord {
  doctor_id: string;
  [attribute: string]: unknown;
}

export interface DoctorsResponse {
  accion: string;
  criterios: TurnFields;
  doctores_encontrados: DoctorRecord[];
  horarios_disponibles: ScheduleRecord[];
  requiere_mas_informacion: boolean;
  pregunta_pendiente: string | null;
  derivar_a: string | null;
  advertencia: string;
}

export interface WorkshopSummary {
  workshop_id: string;
  title: string;
  topic: string;
  dia_semana: string;
  start_time: string;
  end_time: string;
  modality: string;
  location: string | null;
  description: string | null;
}

export interface KnowledgeDocument {
  content: string;
  source: string;
}

export interface WorkshopsResponse {
  operation: string;
  filters: TurnFields;
  workshops: WorkshopSummary[];
  message: string;
  requiere_mas_informacion: boolean;
  pregunta_pendiente: string | null;
  rag_documents: KnowledgeDocument[];
}

export type InterpretResponse = TriageResponse | DoctorsResponse | WorkshopsResponse;

export interface RouteResponse {
  endpoint: string;
  confidence: number;
  reasoning: string;
  response: InterpretResponse;
}
