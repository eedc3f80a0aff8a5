/**
 * POST /doctors/interpret
 */

import { intakeHandler } from './http';

export const handler = intakeHandler('doctors', (conductor, request) => conductor.interpret('doctors', request));
