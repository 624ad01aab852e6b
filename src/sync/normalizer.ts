import type { Logger } from 'pino';
import type { KeyCollision, KeyRename, NormalizedPayload, SecretPayload } from '../core/types.js';
import { getLogger } from '../utils/logging.js';

/** Kubernetes secret data keys: alphanumerics, '-', '_' and '.'. */
export const SECRET_KEY_PATTERN = /^[-._a-zA-Z0-9]+$/;

const ALLOWED_CHAR = /^[-._a-zA-Z0-9]$/;
const COMBINING_MARK = /^\p{M}$/u;

// Letters NFKD leaves intact because they have no decomposition
const LETTER_FOLDS = new Map<string, string>([
  ['ı', 'i'],
  ['ß', 'ss'],
  ['æ', 'ae'],
  ['Æ', 'AE'],
  ['œ', 'oe'],
  ['Œ', 'OE'],
  ['ø', 'o'],
  ['Ø', 'O'],
  ['đ', 'd'],
  ['Đ', 'D'],
  ['ð', 'd'],
  ['Ð', 'D'],
  ['ł', 'l'],
  ['Ł', 'L'],
  ['þ', 'th'],
  ['Þ', 'TH'],
]);

/**
 * Maps an arbitrary key to a Kubernetes-compliant one.
 *
 * Compatibility decomposition strips diacritics and folds compatibility forms
 * ("İ" to "I", "ﬁ" to "fi"), a fixed table covers letters without a decomposition,
 * and every remaining code point outside `[-._a-zA-Z0-9]` becomes `_`.
 * Pure and idempotent; the empty string maps to itself.
 */
export function normalizeKey(key: string): string {
  let out = '';
  for (const ch of key.normalize('NFKD')) {
    if (COMBINING_MARK.test(ch)) continue;
    const folded = LETTER_FOLDS.get(ch);
    if (folded !== undefined) {
      out += folded;
    } else {
      out += ALLOWED_CHAR.test(ch) ? ch : '_';
    }
  }
  return out;
}

/**
 * Normalizes every key of a payload. When two source keys land on the same
 * normalized key the later one wins; renames and collisions are logged by key only.
 */
export function normalizePayload(
  payload: SecretPayload,
  log: Logger = getLogger(),
): NormalizedPayload {
  const entries = new Map<string, { original: string; value: string }>();
  const renamed: KeyRename[] = [];
  const collisions: KeyCollision[] = [];

  for (const [original, value] of payload) {
    const key = normalizeKey(original);
    if (key !== original) {
      renamed.push({ from: original, to: key });
      log.warn({ from: original, to: key }, 'secret key normalized');
    }
    const previous = entries.get(key);
    if (previous) {
      collisions.push({ key, kept: original, dropped: previous.original });
      log.warn({ key, kept: original, dropped: previous.original }, 'secret key collision');
    }
    entries.set(key, { original, value });
  }

  const data = Object.fromEntries(
    Array.from(entries, ([key, entry]) => [key, entry.value] as const),
  );
  return { data, renamed, collisions };
}
