import { ValidationError } from '../errors';

/**
 * MAC address codec.
 *
 * Accepts any punctuation and case ("aa-bb-cc-dd-ee-ff", "AABB.CCDD.EEFF",
 * "aabbccddeeff") and produces one canonical form, "AA:BB:CC:DD:EE:FF",
 * which the registry uses as its unique key.
 */

const CANONICAL_MAC_LENGTH = 17;
const MAC_HEX_DIGITS = 12;

/**
 * Normalize a MAC address to canonical colon-separated uppercase form.
 * Returns an empty string when the input does not contain exactly 12 hex digits.
 */
function normalizeMAC(input: unknown): string {
  if (typeof input !== 'string') {
    return '';
  }

  const hexOnly = input.replace(/[^0-9A-Fa-f]/g, '');
  if (hexOnly.length !== MAC_HEX_DIGITS) {
    return '';
  }

  const groups: string[] = [];
  for (let i = 0; i < MAC_HEX_DIGITS; i += 2) {
    groups.push(hexOnly.slice(i, i + 2).toUpperCase());
  }
  return groups.join(':');
}

function isValidMAC(input: unknown): boolean {
  return normalizeMAC(input).length === CANONICAL_MAC_LENGTH;
}

/**
 * Convert a MAC address to its 6-byte wire form.
 * Callers are expected to validate first; invalid input throws ValidationError.
 */
function macToBytes(mac: string): Buffer {
  const normalized = normalizeMAC(mac);
  if (!normalized) {
    throw new ValidationError(`Invalid MAC address: '${mac}'`);
  }

  return Buffer.from(normalized.split(':').map((group) => parseInt(group, 16)));
}

export { normalizeMAC, isValidMAC, macToBytes };
