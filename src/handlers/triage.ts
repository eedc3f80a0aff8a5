/**
 * POST /triage/interpret
 */

import { intakeHandler } from './http';

export const handler = intakeHandler('triage', (conductor, request) => conductor.interpret('triage', request));
