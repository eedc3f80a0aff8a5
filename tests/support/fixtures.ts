import path from 'path';
import { SessionRecord, Target, Turn, TurnFields } from '../../src/models/session';
import { DangerTrigger, loadTriggerTable } from '../../src/services/riskEscalation';

export const CONFIG_DIR = path.join(__dirname, '..', '..', 'config');

export function triggerTable(): DangerTrigger[] {
  return loadTriggerTable(path.join(CONFIG_DIR, 'danger-combinations.json'));
}

export function makeTurn(
  target: Target,
  fields: TurnFields = {},
  overrides: Partial<Turn> = {},
): Turn {
  return {
    message: `mensaje ${target}`,
    target,
    fields,
    pendingQuestion: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeSession(turns: Turn[], overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    user_id: 'user-1',
    turns,
    expires_at: '2026-01-01T01:00:00.000Z',
    ttl: 1767229200,
    version: 1,
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}
