/**
 * AWS Lambda entry points
 *
 * `handler` wraps the Express app with serverless-http to run behind
 * API Gateway. `invoke` takes the raw `{ "input": "..." }` payload of a
 * direct invocation and returns `{ "result": "..." }`, which Lambda
 * serializes itself.
 */

import serverless from 'serverless-http';
import app from './app.js';
import { parseUppercaseRequest, type UppercaseResponse } from './models/uppercase.js';
import { handleUppercase } from './services/uppercaseService.js';
import { ValidationError } from './errors.js';

export const handler = serverless(app);

export async function invoke(event: unknown): Promise<UppercaseResponse> {
  try {
    return handleUppercase(parseUppercaseRequest(event));
  } catch (error) {
    if (error instanceof ValidationError) {
      console.warn(`Rejected invocation: ${error.message}`);
    }
    throw error;
  }
}
