/**
 * POST /agent/route: classifies the message and runs the chosen interpreter.
 */

import { intakeHandler } from './http';

export const handler = intakeHandler('route', (conductor, request) => conductor.route(request));
