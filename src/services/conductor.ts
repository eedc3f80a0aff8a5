/**
 * Intake Conductor: runs one request through the intake pipeline.
 *
 * Flow:
 * 1. Load the user's session (an unreachable store reads as no session)
 * 2. Summarize the history into the interpreter's context
 * 3. Call the interpreter; a failed extraction yields empty fields
 * 4. Merge current fields into the context
 * 5. Triage: run the risk escalation state machine
 *    Doctors / workshops: query the directory or the catalogue
 * 6. Record the turn, unless the request was cancelled
 */

import {
  AccumulatedContext,
  DOCTOR_FIELDS,
  WORKSHOP_FIELDS,
  contextValues,
  stringField,
} from '../models/context';
import {
  DISCLAIMER,
  DoctorsResponse,
  ExtractionResult,
  InterpretResponse,
  Interpreter,
  KnowledgeDocument,
  RouteResponse,
  TriageResponse,
  WorkshopsResponse,
} from '../models/interpret';
import { RiskState, SessionRecord, Target, TurnFields } from '../models/session';
import { ExtractionFailedError, RequestAbortedError, SessionUnavailableError } from '../utils/errors';
import { LogContext, errorMessage, logger } from '../utils/logger';
import { ModelClient } from './bedrock';
import { accumulate, missingFields } from './criteriaAccumulator';
import { summarize } from './contextSummarizer';
import { DoctorDirectory, canonicalSpecialty } from './doctorDirectory';
import { stringList } from './interpreters/normalize';
import { KnowledgeBase, emptyKnowledgeBase } from './knowledgeBase';
import { DangerTrigger, TIER_ACTIONS, deriveRiskState, escalate } from './riskEscalation';
import { classifyMessage } from './router';
import { SessionStore } from './sessionStore';
import { TurnRecorder } from './turnRecorder';
import { WorkshopCatalog } from './workshopCatalog';

export interface ConductorDeps {
  store: SessionStore;
  recorder: TurnRecorder;
  interpreters: Record<Target, Interpreter>;
  triggers: readonly DangerTrigger[];
  directory: DoctorDirectory;
  catalog: WorkshopCatalog;
  knowledgeBase?: KnowledgeBase;
  /** Model and model id used by the router. */
  router: { model: ModelClient; modelId?: string };
  now?: () => Date;
}

export interface IntakeRequest {
  userId: string;
  message: string;
  requestId?: string;
  signal?: AbortSignal;
}

/** What a processed turn contributes to the session. */
interface TurnOutcome<R extends InterpretResponse> {
  response: R;
  fields: TurnFields;
  pendingQuestion: string | null;
  riskState?: RiskState;
}

export const FALLBACK_QUESTIONS: Record<Target, string> = {
  triage: '¿Podrías describir tus síntomas con más detalle: qué sientes, desde cuándo y con qué intensidad?',
  doctors: '¿Con qué especialidad médica deseas atenderte?',
  workshops: '¿Sobre qué tema te gustaría un taller: estrés, sueño, ansiedad, nutrición o bienestar general?',
};

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RequestAbortedError(`Request aborted ${stage}`);
  }
}

function emptyExtraction(target: Target): ExtractionResult {
  return {
    target,
    fields: {},
    pendingQuestion: null,
    riskTier: null,
    requiresMoreInfo: true,
    action: null,
    referral: null,
  };
}

function pick(values: Readonly<TurnFields>, names: readonly string[]): TurnFields {
  const picked: TurnFields = {};
  for (const name of names) {
    const value = values[name];
    if (value !== undefined) picked[name] = value;
  }
  return picked;
}

export class IntakeConductor {
  private readonly deps: ConductorDeps;
  private readonly knowledgeBase: KnowledgeBase;
  private readonly now: () => Date;

  constructor(deps: ConductorDeps) {
    this.deps = deps;
    this.knowledgeBase = deps.knowledgeBase ?? emptyKnowledgeBase;
    this.now = deps.now ?? (() => new Date());
  }

  // ─── Entry points ─────────────────────────────────────────────────────────

  async interpret(target: Target, request: IntakeRequest): Promise<InterpretResponse> {
    const ctx: LogContext = { userId: request.userId, requestId: request.requestId, target };
    throwIfAborted(request.signal, 'before processing');

    const session = await this.loadSession(request.userId, ctx);
    return this.process(target, request, session, ctx);
  }

  async route(request: IntakeRequest): Promise<RouteResponse> {
    const ctx: LogContext = { userId: request.userId, requestId: request.requestId };
    throwIfAborted(request.signal, 'before routing');

    const session = await this.loadSession(request.userId, ctx);
    const decision = await classifyMessage(this.deps.router.model, request.message, session, {
      modelId: this.deps.router.modelId,
      signal: request.signal,
      log: ctx,
    });

    logger.info('Message routed', ctx, {
      endpoint: decision.endpoint,
      confidence: decision.confidence,
      fallback: decision.fallback,
    });

    const response = await this.process(decision.target, request, session, { ...ctx, target: decision.target });
    return {
      endpoint: decision.endpoint,
      confidence: decision.confidence,
      reasoning: decision.reasoning,
      response,
    };
  }

  // ─── Pipeline ─────────────────────────────────────────────────────────────

  private async loadSession(userId: string, ctx: LogContext): Promise<SessionRecord | null> {
    try {
      return await this.deps.store.get(userId);
    } catch (err) {
      if (!(err instanceof SessionUnavailableError)) throw err;
      logger.warn('Session store unavailable, continuing without history', ctx, { error: errorMessage(err) });
      return null;
    }
  }

  private async process(
    target: Target,
    request: IntakeRequest,
    session: SessionRecord | null,
    ctx: LogContext,
  ): Promise<InterpretResponse> {
    const context = summarize(session, target);
    const priorRisk = target === 'triage' ? deriveRiskState(session) : null;

    let extraction: ExtractionResult;
    let failed = false;
    try {
      extraction = await this.deps.interpreters[target].interpret({
        userId: request.userId,
        message: request.message,
        context,
        priorRiskTier: priorRisk?.highWaterMark ?? null,
        signal: request.signal,
        requestId: request.requestId,
      });
    } catch (err) {
      if (!(err instanceof ExtractionFailedError)) throw err;
      logger.warn('Extraction failed, recording turn without fields', ctx, { error: errorMessage(err) });
      extraction = emptyExtraction(target);
      failed = true;
    }
    throwIfAborted(request.signal, 'after extraction');

    const merged = accumulate(context, extraction.fields);

    const outcome = await this.resolve(target, merged, extraction, priorRisk, failed, request, ctx);

    // A cancelled request must leave the session untouched.
    throwIfAborted(request.signal, 'before recording the turn');

    const recorded = await this.deps.recorder.recordTurn(
      request.userId,
      {
        message: request.message,
        target,
        fields: failed ? {} : outcome.fields,
        pendingQuestion: outcome.pendingQuestion,
        createdAt: this.now().toISOString(),
      },
      outcome.riskState ? { riskState: outcome.riskState } : {},
    );
    if (recorded.status !== 'recorded') {
      logger.warn('Turn not recorded', ctx, { status: recorded.status });
    }

    return outcome.response;
  }

  private async resolve(
    target: Target,
    merged: AccumulatedContext,
    extraction: ExtractionResult,
    priorRisk: RiskState | null,
    failed: boolean,
    request: IntakeRequest,
    ctx: LogContext,
  ): Promise<TurnOutcome<InterpretResponse>> {
    switch (target) {
      case 'triage':
        return this.triage(merged, extraction, priorRisk, failed, ctx);
      case 'doctors':
        return this.doctors(merged, extraction, failed, request, ctx);
      case 'workshops':
        return this.workshops(merged, extraction, failed, request, ctx);
    }
  }

  private triage(
    merged: AccumulatedContext,
    extraction: ExtractionResult,
    priorRisk: RiskState | null,
    failed: boolean,
    ctx: LogContext,
  ): TurnOutcome<TriageResponse> {
    const decision = escalate(
      priorRisk,
      { tier: extraction.riskTier, reasons: stringList(extraction.fields.razones) },
      this.deps.triggers,
    );
    if (decision.tierMissing && !failed) {
      logger.warn('Model gave no valid tier, keeping the high-water mark', ctx, { tier: decision.reportedTier });
    }
    if (decision.triggeredBy) {
      logger.warn('Danger combination detected', ctx, { trigger: decision.triggeredBy });
    }
    const tier = decision.reportedTier;
    const action = TIER_ACTIONS[tier];

    const pendingQuestion = extraction.pendingQuestion ?? (failed || decision.tierMissing ? FALLBACK_QUESTIONS.triage : null);

    const response: TriageResponse = {
      capa: tier,
      capa_modelo: decision.isolatedTier,
      razones: decision.state.reasons,
      especialidad_sugerida: stringField(merged, 'especialidad_sugerida'),
      taller_sugerido: stringField(merged, 'taller_sugerido'),
      accion_recomendada: action,
      requiere_mas_informacion: failed || extraction.requiresMoreInfo || decision.tierMissing,
      pregunta_pendiente: pendingQuestion,
      // An emergency is never handed over to another service.
      derivar_a: tier === 4 ? null : extraction.referral,
      advertencia: DISCLAIMER,
      escalado: decision.escalated,
      combinacion_detectada: decision.triggeredBy,
    };

    return {
      response,
      fields: { ...extraction.fields, capa: tier, accion_recomendada: action },
      pendingQuestion,
      riskState: decision.state,
    };
  }

  private async doctors(
    merged: AccumulatedContext,
    extraction: ExtractionResult,
    failed: boolean,
    request: IntakeRequest,
    ctx: LogContext,
  ): Promise<TurnOutcome<DoctorsResponse>> {
    const criteria = pick(contextValues(merged), DOCTOR_FIELDS);

    const suggested = stringField(merged, 'especialidad_sugerida');
    if (suggested && missingFields(merged, ['especialidad']).length > 0) {
      criteria.especialidad = canonicalSpecialty(suggested);
    }

    const action = failed ? 'necesita_mas_informacion' : extraction.action ?? 'buscar';
    const searchable = action === 'buscar' || action === 'agendar';
    const found = searchable
      ? await this.deps.directory.search(criteria, { signal: request.signal, log: ctx })
      : { doctors: [], schedules: [] };

    const missingSpecialty = criteria.especialidad === undefined;
    const requiresMoreInfo = failed || extraction.requiresMoreInfo || missingSpecialty;
    const pendingQuestion = extraction.pendingQuestion ?? (requiresMoreInfo ? FALLBACK_QUESTIONS.doctors : null);

    return {
      response: {
        accion: action,
        criterios: criteria,
        doctores_encontrados: found.doctors,
        horarios_disponibles: found.schedules,
        requiere_mas_informacion: requiresMoreInfo,
        pregunta_pendiente: pendingQuestion,
        derivar_a: extraction.referral,
        advertencia: DISCLAIMER,
      },
      fields: extraction.fields,
      pendingQuestion,
    };
  }

  private async workshops(
    merged: AccumulatedContext,
    extraction: ExtractionResult,
    failed: boolean,
    request: IntakeRequest,
    ctx: LogContext,
  ): Promise<TurnOutcome<WorkshopsResponse>> {
    const filters = pick(contextValues(merged), WORKSHOP_FIELDS);
    const operation = extraction.action ?? 'SEARCH';

    let message: string;
    let workshops: WorkshopsResponse['workshops'] = [];
    let documents: KnowledgeDocument[] = [];

    if (failed) {
      message = 'No pude interpretar tu solicitud sobre talleres.';
    } else if (operation !== 'SEARCH') {
      message = 'La inscripción y la consulta de tus talleres no están disponibles por este canal.';
    } else {
      workshops = this.deps.catalog.search(filters);
      documents = await this.knowledgeBase.retrieve(request.message, {
        userId: request.userId,
        signal: request.signal,
        log: ctx,
      });
      message = workshops.length > 0
        ? `Encontré ${workshops.length} taller(es) que coinciden con tu búsqueda.`
        : 'No encontré talleres con esos criterios.';
    }

    const requiresMoreInfo = failed || extraction.requiresMoreInfo;
    const pendingQuestion = extraction.pendingQuestion ?? (requiresMoreInfo ? FALLBACK_QUESTIONS.workshops : null);

    return {
      response: {
        operation,
        filters,
        workshops,
        message,
        requiere_mas_informacion: requiresMoreInfo,
        pregunta_pendiente: pendingQuestion,
        rag_documents: documents,
      },
      fields: extraction.fields,
      pendingQuestion,
    };
  }
}
