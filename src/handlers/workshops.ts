/**
 * POST /workshops/interpret
 */

import { intakeHandler } from './http';

export const handler = intakeHandler('workshops', (conductor, request) => conductor.interpret('workshops', request));
