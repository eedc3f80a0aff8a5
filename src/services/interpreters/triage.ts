/**
 * Triage interpreter: classifies the user's symptoms into an urgency tier.
 *
 * The tier produced here is the tier of this message taken alone; the
 * conductor combines it with the session's high-water mark.
 */

import { ExtractionRequest, ExtractionResult, Interpreter } from '../../models/interpret';
import { REASONS_FIELD } from '../../models/context';
import { TARGET_ENDPOINTS, TurnFields } from '../../models/session';
import { ModelClient } from '../bedrock';
import { renderContext } from '../contextSummarizer';
import { KnowledgeBase, formatDocumentsForPrompt } from '../knowledgeBase';
import { TIER_ACTIONS, parseTier } from '../riskEscalation';
import { oneOf, optionalString, setField, strictBoolean, stringList } from './normalize';

export const TRIAGE_SYSTEM_PROMPT = `Eres el Agente de Triaje del sistema de salud. Analizas los síntomas que describe el usuario, los clasificas en una capa de atención (1 a 4) y respondes ÚNICAMENTE con un objeto JSON.

No diagnosticas enfermedades, no prescribes medicamentos y no inventas causas. Respondes siempre en español.

Capas de atención:
- Capa 1: médico virtual. Síntomas leves, 7 días o menos, sin signos de alarma. accion_recomendada "contactar_medico_virtual".
- Capa 2: médico a domicilio. Cuadro agudo moderado sin signos de emergencia. accion_recomendada "solicitar_medico_a_domicilio".
- Capa 3: consulta presencial o especialista. Enfermedad crónica, seguimiento, estudios, síntomas de más de 7 días. accion_recomendada "consulta_presencial".
- Capa 4: emergencia. Cualquier signo de alarma: dificultad para respirar, dolor de pecho intenso, pérdida de conciencia, confusión, dificultad para hablar, debilidad súbita de un lado del cuerpo, fiebre muy alta con rigidez de cuello o convulsiones, sangrado abundante, dolor abdominal muy intenso con vómitos persistentes, trauma importante. accion_recomendada "llamar_emergencias".

Ante la duda entre dos capas elige siempre la más alta. Si ya conoces datos de mensajes anteriores, úsalos y no los vuelvas a pedir.

En "razones" escribe los síntomas como frases cortas en minúsculas (por ejemplo "fiebre alta", "dolor de pecho", "latidos rápidos").

"especialidad_sugerida" usa valores como "medicina_interna", "medicina_familiar", "cardiologia", "neumologia", "pediatria", "psiquiatria", "traumatologia", "neurologia", o null.
"taller_sugerido" usa valores como "taller_manejo_estres", "taller_nutricion_saludable", "taller_salud_mental", o null.

Si faltan datos clave (duración, intensidad, localización) clasifica igualmente y marca "requiere_mas_informacion": true con la pregunta concreta en "pregunta_pendiente".

Formato obligatorio:
{
  "capa": 1 | 2 | 3 | 4,
  "razones": ["texto"],
  "especialidad_sugerida": "texto o null",
  "taller_sugerido": "texto o null",
  "accion_recomendada": "contactar_medico_virtual" | "solicitar_medico_a_domicilio" | "consulta_presencial" | "llamar_emergencias",
  "requiere_mas_informacion": true | false,
  "pregunta_pendiente": "texto o null",
  "derivar_a": null | "doctors/interpret" | "workshops/interpret"
}

No agregues texto, comentarios ni markdown fuera del JSON.`;

const TRIAGE_ACTIONS = Object.values(TIER_ACTIONS);

const REFERRALS = [TARGET_ENDPOINTS.doctors, TARGET_ENDPOINTS.workshops];

export interface TriageInterpreterOptions {
  knowledgeBase?: KnowledgeBase;
  ragMaxResults?: number;
}

export class TriageInterpreter implements Interpreter {
  readonly target = 'triage' as const;

  private readonly model: ModelClient;
  private readonly knowledgeBase: KnowledgeBase | null;
  private readonly ragMaxResults: number;

  constructor(model: ModelClient, options: TriageInterpreterOptions = {}) {
    this.model = model;
    this.knowledgeBase = options.knowledgeBase ?? null;
    this.ragMaxResults = options.ragMaxResults ?? 3;
  }

  async interpret(request: ExtractionRequest): Promise<ExtractionResult> {
    const log = { userId: request.userId, requestId: request.requestId, target: this.target };
    const sections: string[] = [];

    const known = renderContext(request.context);
    if (known) sections.push(`Contexto de la conversación:\n${known}`);

    if (request.priorRiskTier !== null) {
      sections.push(`Capa más alta asignada hasta ahora: ${request.priorRiskTier}`);
    }

    if (this.knowledgeBase) {
      const documents = await this.knowledgeBase.retrieve(request.message, {
        userId: request.userId,
        maxResults: this.ragMaxResults,
        signal: request.signal,
        log,
      });
      const reference = formatDocumentsForPrompt(documents);
      if (reference) sections.push(`Información de referencia:\n${reference}`);
    }

    sections.push(`Mensaje del usuario: "${request.message}"`);

    const reply = await this.model.completeJson({
      system: TRIAGE_SYSTEM_PROMPT,
      message: sections.join('\n\n'),
      maxTokens: 600,
      signal: request.signal,
      log,
    });

    return normalizeTriageReply(reply);
  }
}

export function normalizeTriageReply(reply: Record<string, unknown>): ExtractionResult {
  const riskTier = parseTier(reply.capa);
  const fields: TurnFields = {};

  if (riskTier !== null) fields.capa = riskTier;
  setField(fields, REASONS_FIELD, stringList(reply.razones));
  setField(fields, 'especialidad_sugerida', optionalString(reply.especialidad_sugerida));
  setField(fields, 'taller_sugerido', optionalString(reply.taller_sugerido));
  setField(fields, 'accion_recomendada', oneOf(reply.accion_recomendada, TRIAGE_ACTIONS));
  const referral = oneOf(reply.derivar_a, REFERRALS);
  setField(fields, 'derivar_a', referral);

  const pendingQuestion = optionalString(reply.pregunta_pendiente);

  return {
    target: 'triage',
    fields,
    pendingQuestion,
    riskTier,
    requiresMoreInfo: strictBoolean(reply.requiere_mas_informacion) || pendingQuestion !== null,
    action: null,
    referral,
  };
}
