/**
 * Request Helpers
 * Parsing of path ids, query filters and write payloads shared by the routers
 */

import { z } from 'zod';
import { BadRequestError } from '../errors.js';
import type { Connection } from '../storage/sqlite.js';

// ============================================
// Path and query parameters
// ============================================

/** Parse a numeric path id; anything else yields null so the caller can 404 */
export function parseId(param: string | string[] | undefined): number | null {
  const value = Array.isArray(param) ? param[0] : param;
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  const id = Number(value);
  return Number.isSafeInteger(id) ? id : null;
}

// Unparseable filter values are dropped rather than rejected
const intQueryParam = z
  .preprocess(
    (value) => (Array.isArray(value) ? value[0] : value),
    z.string().regex(/^-?\d+$/).transform(Number).optional()
  )
  .catch(undefined);

export const gameListQuerySchema = z.object({
  category: intQueryParam,
  publisher: intQueryParam,
});

// ============================================
// Payloads
// ============================================

export type Payload = Record<string, unknown>;

function isPayload(body: unknown): body is Payload {
  return typeof body === 'object' && body !== null && !Array.isArray(body);
}

/**
 * Require a non-empty JSON object body
 */
export function requirePayload(body: unknown): Payload {
  if (!isPayload(body) || Object.keys(body).length === 0) {
    throw new BadRequestError('No data provided');
  }
  return body;
}

/**
 * Throw for the first listed field that is absent or falsy
 */
export function requireFields(payload: Payload, fields: readonly string[]): void {
  for (const field of fields) {
    if (!payload[field]) {
      throw new BadRequestError(`Missing required field: ${field}`);
    }
  }
}

const referenceIdSchema = z.union([
  z.number().int().positive(),
  z.string().regex(/^\d+$/).transform(Number),
]);

interface ReferenceLookup {
  exists(conn: Connection, id: number): boolean;
}

/**
 * Resolve a foreign key from the payload, failing with "<label> not found"
 * when it is malformed or no such row exists
 */
export function resolveReference(
  conn: Connection,
  store: ReferenceLookup,
  value: unknown,
  label: string
): number {
  const parsed = referenceIdSchema.safeParse(value);
  if (!parsed.success || !store.exists(conn, parsed.data)) {
    throw new BadRequestError(`${label} not found`);
  }
  return parsed.data;
}
