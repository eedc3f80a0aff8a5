/**
 * Tests for accumulate() and its per-field merge policy.
 */

import { AccumulatedContext } from '../src/models/context';
import { accumulate, missingFields, sameMeaning } from '../src/services/criteriaAccumulator';

const prior: AccumulatedContext = {
  target: 'doctors',
  fields: {
    especialidad: { value: 'Cardiología', source: 0 },
  },
  razones: ['dolor de pecho'],
  pendingQuestion: '¿Prefieres consulta presencial o virtual?',
};

describe('accumulate', () => {
  test('a field the current turn does not mention is kept', () => {
    const merged = accumulate(prior, {});
    expect(merged.fields.especialidad).toEqual({ value: 'Cardiología', source: 0 });
  });

  test('a different value is a correction and wins', () => {
    const merged = accumulate(prior, { especialidad: 'Neurología' });
    expect(merged.fields.especialidad).toEqual({ value: 'Neurología', source: 'current' });
  });

  test('the same value spelled differently keeps the prior entry', () => {
    const merged = accumulate(prior, { especialidad: ' cardiologia ' });
    expect(merged.fields.especialidad).toEqual({ value: 'Cardiología', source: 0 });
  });

  test('new fields are added alongside existing ones', () => {
    const merged = accumulate(prior, { modalidad: 'virtual' });
    expect(merged.fields).toEqual({
      especialidad: { value: 'Cardiología', source: 0 },
      modalidad: { value: 'virtual', source: 'current' },
    });
  });

  test('never fabricates a field neither side has', () => {
    const merged = accumulate(prior, { modalidad: 'virtual' });
    expect(merged.fields).not.toHaveProperty('distrito');
    expect(merged.fields).not.toHaveProperty('fecha');
  });

  test('null and empty values count as no value', () => {
    const merged = accumulate(prior, { especialidad: null, distrito: '', idioma_preferido: undefined });
    expect(merged.fields).toEqual(prior.fields);
  });

  test('fields outside the target schema are ignored', () => {
    const merged = accumulate(prior, { topic: 'nutrition', color: 'azul' });
    expect(merged.fields).not.toHaveProperty('topic');
    expect(merged.fields).not.toHaveProperty('color');
  });

  test('reasons are unioned and the open question is kept', () => {
    const merged = accumulate(prior, { razones: ['Dolor de pecho', 'sudoración fría'] });
    expect(merged.razones).toEqual(['dolor de pecho', 'sudoración fría']);
    expect(merged.pendingQuestion).toBe('¿Prefieres consulta presencial o virtual?');
  });

  test('same inputs give the same output and the prior is not mutated', () => {
    const first = accumulate(prior, { especialidad: 'Neurología', distrito: 'Surco' });
    const second = accumulate(prior, { especialidad: 'Neurología', distrito: 'Surco' });

    expect(first).toEqual(second);
    expect(prior.fields).toEqual({ especialidad: { value: 'Cardiología', source: 0 } });
  });
});

describe('sameMeaning', () => {
  test('ignores case, accents and list order', () => {
    expect(sameMeaning('Neumología', 'neumologia')).toBe(true);
    expect(sameMeaning(['Inglés', 'español'], ['Español', 'ingles'])).toBe(true);
    expect(sameMeaning('virtual', 'presencial')).toBe(false);
    expect(sameMeaning(3, 3)).toBe(true);
    expect(sameMeaning(3, '3')).toBe(false);
  });
});

describe('missingFields', () => {
  test('lists required fields without a value, in order', () => {
    expect(missingFields(prior, ['distrito', 'especialidad', 'modalidad'])).toEqual(['distrito', 'modalidad']);
  });
});
