/**
 * Tests for message classification and its history-based fallback.
 */

import { classifyMessage, fallbackDecision } from '../src/services/router';
import { ExtractionFailedError, RequestAbortedError } from '../src/utils/errors';
import { ScriptedModelClient } from './support/fakeModel';
import { makeSession, makeTurn } from './support/fixtures';

describe('classifyMessage', () => {
  test('returns the endpoint the model picked', async () => {
    const model = new ScriptedModelClient([
      { endpoint: 'doctors/interpret', confidence: 0.92, reasoning: 'Quiere una cita.' },
    ]);

    const decision = await classifyMessage(model, 'quiero una cita con un cardiólogo', null, { modelId: 'router-model' });

    expect(decision).toEqual({
      target: 'doctors',
      endpoint: 'doctors/interpret',
      confidence: 0.92,
      reasoning: 'Quiere una cita.',
      fallback: false,
    });
    expect(model.requests[0]).toMatchObject({
      message: 'Mensaje del usuario: "quiero una cita con un cardiólogo"',
      maxTokens: 300,
      temperature: 0,
      modelId: 'router-model',
    });
  });

  test('tells the model which interpreter asked the open question', async () => {
    const session = makeSession([
      makeTurn('doctors', {}, { pendingQuestion: '¿En qué distrito?' }),
    ]);
    const model = new ScriptedModelClient([{ endpoint: 'doctors/interpret', confidence: 0.8 }]);

    await classifyMessage(model, 'en Miraflores', session);

    expect(model.requests[0].message).toBe(
      'Pregunta pendiente de doctors/interpret: "¿En qué distrito?"\n\nMensaje del usuario: "en Miraflores"',
    );
  });

  test('a question answered by a later turn is no longer open', async () => {
    const session = makeSession([
      makeTurn('doctors', {}, { pendingQuestion: '¿En qué distrito?' }),
      makeTurn('triage', { capa: 2 }),
    ]);
    const model = new ScriptedModelClient([{ endpoint: 'pharmacy/interpret' }]);

    const decision = await classifyMessage(model, 'me duele la garganta', session);

    expect(model.requests[0].message).toBe('Mensaje del usuario: "me duele la garganta"');
    expect(decision.target).toBe('triage');
    expect(decision.fallback).toBe(true);
  });

  test('confidence is clamped and missing reasoning is empty', async () => {
    const model = new ScriptedModelClient([{ endpoint: 'workshops/interpret', confidence: '1.7' }]);

    const decision = await classifyMessage(model, 'talleres de estrés', null);

    expect(decision.confidence).toBe(1);
    expect(decision.reasoning).toBe('');
  });

  test('an unknown endpoint falls back to the open question target', async () => {
    const session = makeSession([
      makeTurn('triage', { capa: 1 }),
      makeTurn('workshops', {}, { pendingQuestion: '¿Prefieres virtual o presencial?' }),
    ]);
    const model = new ScriptedModelClient([{ endpoint: 'pharmacy/interpret' }]);

    const decision = await classifyMessage(model, 'virtual', session);

    expect(decision).toEqual({
      target: 'workshops',
      endpoint: 'workshops/interpret',
      confidence: 0,
      reasoning: 'Clasificación no disponible; se usa el historial de la conversación.',
      fallback: true,
    });
  });

  test('a failed model call falls back to triage without history', async () => {
    const model = new ScriptedModelClient([new ExtractionFailedError('Bedrock call failed: timeout')]);

    const decision = await classifyMessage(model, 'hola', null);

    expect(decision.target).toBe('triage');
    expect(decision.fallback).toBe(true);
  });

  test('an aborted request is not masked by the fallback', async () => {
    const model = new ScriptedModelClient([new RequestAbortedError()]);

    await expect(classifyMessage(model, 'hola', null)).rejects.toBeInstanceOf(RequestAbortedError);
  });
});

describe('fallbackDecision', () => {
  test('uses the newest open question', () => {
    const session = makeSession([
      makeTurn('triage', {}, { pendingQuestion: '¿Desde cuándo?' }),
      makeTurn('doctors', {}, { pendingQuestion: '¿Qué día?' }),
    ]);

    expect(fallbackDecision(session, 'sin modelo').target).toBe('doctors');
  });

  test('ignores a question an older turn left', () => {
    const session = makeSession([
      makeTurn('workshops', {}, { pendingQuestion: '¿Qué fecha?' }),
      makeTurn('doctors', { especialidad: 'Cardiología' }),
    ]);

    expect(fallbackDecision(session, 'sin modelo').target).toBe('triage');
  });
});
