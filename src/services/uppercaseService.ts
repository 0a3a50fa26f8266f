import type { UppercaseRequest, UppercaseResponse } from '../models/uppercase.js';

export type TextTransform = (text: string) => string;

export type UppercaseHandler = (request: UppercaseRequest) => UppercaseResponse;

// Fixed English casing so a Turkish or Azeri host locale never yields a dotted capital I
const CASING_LOCALE = 'en-US';

export function toUpperCaseEnglish(text: string): string {
  return text.toLocaleUpperCase(CASING_LOCALE);
}

export function createUppercaseHandler(transform: TextTransform): UppercaseHandler {
  return (request) => ({ result: transform(request.input) });
}

export const handleUppercase = createUppercaseHandler(toUpperCaseEnglish);
