import { z } from 'zod';
import { ParseError } from '../core/errors.js';
import type { SecretPayload } from '../core/types.js';

const secretPayloadSchema = z.record(z.string(), z.string());

const decoder = new TextDecoder('utf-8', { fatal: true });

function describeValueIssues(error: z.ZodError): string {
  const keys = Array.from(new Set(error.issues.map((i) => String(i.path[0] ?? '')))).filter(
    (k) => k.length > 0,
  );
  return keys.length > 0
    ? `values must be strings (offending keys: ${keys.join(', ')})`
    : 'top-level value must be a JSON object';
}

/**
 * Decodes a source payload: UTF-8 JSON whose top level is an object of string values.
 * Error messages name keys but never echo payload content.
 */
export function parseSecretPayload(raw: Uint8Array): SecretPayload {
  let text: string;
  try {
    text = decoder.decode(raw);
  } catch (err) {
    throw new ParseError('secret payload is not valid UTF-8', err);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    // The engine's SyntaxError message quotes the input, which is secret material
    throw new ParseError('secret payload is not valid JSON');
  }

  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new ParseError('top-level value must be a JSON object');
  }

  const checked = secretPayloadSchema.safeParse(json);
  if (!checked.success) {
    throw new ParseError(describeValueIssues(checked.error));
  }

  // Built from the parsed object itself so keys such as "__proto__" survive as data
  const payload: SecretPayload = new Map();
  for (const [key, value] of Object.entries(json)) {
    if (typeof value === 'string') payload.set(key, value);
  }
  return payload;
}
