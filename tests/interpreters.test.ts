/**
 * Tests for the three interpreters: reply normalisation and prompt assembly.
 */

import { emptyContext } from '../src/models/context';
import { ExtractionRequest, KnowledgeDocument } from '../src/models/interpret';
import { KnowledgeBase } from '../src/services/knowledgeBase';
import { DoctorsInterpreter, normalizeDoctorsReply } from '../src/services/interpreters/doctors';
import { TRIAGE_SYSTEM_PROMPT, TriageInterpreter, normalizeTriageReply } from '../src/services/interpreters/triage';
import { WorkshopsInterpreter, normalizeWorkshopsReply } from '../src/services/interpreters/workshops';
import { ScriptedModelClient } from './support/fakeModel';

function request(overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
  return {
    userId: 'u1',
    message: 'me duele la cabeza',
    context: emptyContext('triage'),
    priorRiskTier: null,
    ...overrides,
  };
}

describe('normalizeTriageReply', () => {
  test('keeps on-schema values in canonical form', () => {
    const result = normalizeTriageReply({
      capa: '3',
      razones: ['dolor lumbar', ' '],
      especialidad_sugerida: 'medicina_interna',
      taller_sugerido: 'null',
      accion_recomendada: 'Consulta_Presencial',
      requiere_mas_informacion: false,
      pregunta_pendiente: null,
      derivar_a: 'doctors/interpret',
    });

    expect(result).toEqual({
      target: 'triage',
      fields: {
        capa: 3,
        razones: ['dolor lumbar'],
        especialidad_sugerida: 'medicina_interna',
        accion_recomendada: 'consulta_presencial',
        derivar_a: 'doctors/interpret',
      },
      pendingQuestion: null,
      riskTier: 3,
      requiresMoreInfo: false,
      action: null,
      referral: 'doctors/interpret',
    });
  });

  test('an invalid tier is left out', () => {
    const result = normalizeTriageReply({ capa: 'alta', razones: 'tos' });

    expect(result.riskTier).toBeNull();
    expect(result.fields).toEqual({ razones: ['tos'] });
  });

  test('unknown actions and referrals are dropped', () => {
    const result = normalizeTriageReply({ capa: 1, accion_recomendada: 'tomar_paracetamol', derivar_a: 'farmacia' });

    expect(result.fields).toEqual({ capa: 1 });
    expect(result.referral).toBeNull();
  });

  test('an open question means more information is needed', () => {
    const result = normalizeTriageReply({ capa: 2, pregunta_pendiente: '¿Desde cuándo tienes fiebre?' });

    expect(result.pendingQuestion).toBe('¿Desde cuándo tienes fiebre?');
    expect(result.requiresMoreInfo).toBe(true);
  });
});

describe('TriageInterpreter', () => {
  test('sends the bare message when nothing else is known', async () => {
    const model = new ScriptedModelClient([{ capa: 1 }]);

    await new TriageInterpreter(model).interpret(request());

    expect(model.requests).toHaveLength(1);
    expect(model.requests[0].system).toBe(TRIAGE_SYSTEM_PROMPT);
    expect(model.requests[0].message).toBe('Mensaje del usuario: "me duele la cabeza"');
    expect(model.requests[0].maxTokens).toBe(600);
  });

  test('adds the prior tier and reference documents', async () => {
    const documents: KnowledgeDocument[] = [{ content: 'La cefalea tensional es frecuente.', source: 'guia.pdf' }];
    const knowledgeBase: KnowledgeBase = { retrieve: jest.fn().mockResolvedValue(documents) };
    const model = new ScriptedModelClient([{ capa: 2 }]);

    const result = await new TriageInterpreter(model, { knowledgeBase }).interpret(request({ priorRiskTier: 2 }));

    expect(result.riskTier).toBe(2);
    expect(knowledgeBase.retrieve).toHaveBeenCalledWith(
      'me duele la cabeza',
      expect.objectContaining({ userId: 'u1', maxResults: 3 }),
    );
    expect(model.requests[0].message).toBe([
      'Capa más alta asignada hasta ahora: 2',
      'Información de referencia:\n[Documento 1 - Fuente: guia.pdf]\nLa cefalea tensional es frecuente.',
      'Mensaje del usuario: "me duele la cabeza"',
    ].join('\n\n'));
  });

  test('includes what the conversation already established', async () => {
    const model = new ScriptedModelClient([{ capa: 2 }]);
    const context = { ...emptyContext('triage'), razones: ['fiebre alta'] };

    await new TriageInterpreter(model).interpret(request({ context }));

    expect(model.requests[0].message).toContain('Contexto de la conversación:\n');
    expect(model.requests[0].message).toContain('Razones acumuladas: fiebre alta');
  });

  test('model failures propagate to the caller', async () => {
    const model = new ScriptedModelClient([new Error('boom')]);

    await expect(new TriageInterpreter(model).interpret(request())).rejects.toThrow('boom');
  });
});

describe('normalizeDoctorsReply', () => {
  test('maps criteria onto doctor fields', () => {
    const result = normalizeDoctorsReply({
      accion: 'Agendar',
      criterios: {
        especialidad: 'cardiologia',
        genero_preferido: 'Femenino',
        modalidad: 'hibrida',
        fecha: '2026-02-30',
        dia_semana: 'miercoles',
        hora_preferida: { rango: null, inicio: '09:00', fin: '11:30' },
        distrito: 'Miraflores',
        idioma_preferido: 'none',
      },
      derivar_a: 'triage/interpret',
    });

    expect(result).toEqual({
      target: 'doctors',
      fields: {
        especialidad: 'Cardiología',
        genero_preferido: 'femenino',
        dia_semana: 'Miércoles',
        hora_preferida: '09:00-11:30',
        distrito: 'Miraflores',
      },
      pendingQuestion: null,
      riskTier: null,
      requiresMoreInfo: false,
      action: 'agendar',
      referral: 'triage/interpret',
    });
  });

  test('an unlisted specialty is kept as written', () => {
    const result = normalizeDoctorsReply({ criterios: { especialidad: 'Oftalmología' } });

    expect(result.fields).toEqual({ especialidad: 'Oftalmología' });
    expect(result.action).toBe('buscar');
  });

  test('reads a time range given as text', () => {
    expect(normalizeDoctorsReply({ criterios: { hora_preferida: 'Tarde' } }).fields).toEqual({ hora_preferida: 'tarde' });
  });

  test('drops explicit hours that do not form a range', () => {
    const result = normalizeDoctorsReply({ criterios: { hora_preferida: { inicio: '15:00', fin: '10:00' } } });

    expect(result.fields).toEqual({});
  });

  test('a missing criteria object gives no fields', () => {
    const result = normalizeDoctorsReply({ requiere_mas_informacion: true, pregunta_pendiente: '¿Qué especialidad buscas?' });

    expect(result.fields).toEqual({});
    expect(result.requiresMoreInfo).toBe(true);
  });
});

describe('DoctorsInterpreter', () => {
  test('gives the model the current date', async () => {
    const model = new ScriptedModelClient([{ criterios: {} }]);
    const interpreter = new DoctorsInterpreter(model, { today: () => new Date('2026-03-10T12:00:00Z') });

    await interpreter.interpret(request({ message: 'quiero un cardiólogo', context: emptyContext('doctors') }));

    expect(model.requests[0].system).toContain('La fecha actual es 2026-03-10.');
    expect(model.requests[0].message).toBe('Mensaje del usuario: "quiero un cardiólogo"');
  });
});

describe('normalizeWorkshopsReply', () => {
  test('"any" and blank filters are absent, aliases become codes', () => {
    const result = normalizeWorkshopsReply({
      operation: 'register',
      filters: {
        topic: 'any',
        date: '2026-04-01',
        time_of_day: 'tarde',
        modality: 'in_person',
        location: '  ',
      },
    });

    expect(result).toEqual({
      target: 'workshops',
      fields: { date: '2026-04-01', time_of_day: 'afternoon', modality: 'in_person' },
      pendingQuestion: null,
      riskTier: null,
      requiresMoreInfo: false,
      action: 'REGISTER',
      referral: null,
    });
  });

  test('defaults to a search', () => {
    const result = normalizeWorkshopsReply({ filters: { topic: 'nutrition', modality: 'any' } });

    expect(result.action).toBe('SEARCH');
    expect(result.fields).toEqual({ topic: 'nutrition' });
  });
});

describe('WorkshopsInterpreter', () => {
  test('sends the message with the current date', async () => {
    const model = new ScriptedModelClient([{ operation: 'SEARCH', filters: {} }]);
    const interpreter = new WorkshopsInterpreter(model, { today: () => new Date('2026-03-10T12:00:00Z') });

    await interpreter.interpret(request({ message: 'talleres de sueño', context: emptyContext('workshops') }));

    expect(model.requests[0].system).toContain('La fecha actual es 2026-03-10.');
    expect(model.requests[0].message).toBe('Mensaje: "talleres de sueño"');
    expect(model.requests[0].maxTokens).toBe(500);
  });
});
