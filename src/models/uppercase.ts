import { z } from 'zod';
import { ValidationError } from '../errors.js';

export const UppercaseRequestSchema = z.object(
  {
    input: z.string({
      required_error: 'missing input field',
      invalid_type_error: 'input must be a string',
    }),
  },
  {
    required_error: 'request body must be a JSON object',
    invalid_type_error: 'request body must be a JSON object',
  }
);

export type UppercaseRequest = Readonly<z.infer<typeof UppercaseRequestSchema>>;

export interface UppercaseResponse {
  readonly result: string;
}

/**
 * Validate an untyped invocation payload.
 *
 * @throws ValidationError carrying the first issue as its message and the
 * formatted zod issues as `details`
 */
export function parseUppercaseRequest(payload: unknown): UppercaseRequest {
  const parseResult = UppercaseRequestSchema.safeParse(payload);

  if (!parseResult.success) {
    const message = parseResult.error.issues[0]?.message ?? 'Invalid request';
    throw new ValidationError(message, parseResult.error.format());
  }

  return parseResult.data;
}
