/**
 * Idempotency Ledger
 *
 * Remembers, per (tenant, idempotency key), the hash of the request payload
 * and the ids it produced, so a retried import returns the same rows.
 *
 * Payload hash: SHA-256 (hex) of the canonical JSON of the normalized item
 * list. Canonical JSON sorts object keys at every level and keeps array
 * order. Each item is field-complete:
 *   { amount: "100.00", currency: "USD", description: string|null,
 *     external_id: string|null, posted_at: ISO-8601 }
 * Changing this encoding invalidates every stored hash.
 */

import { createHash } from 'crypto';
import { db, getLogger } from '../utils';
import { errorMessage } from '../db/errors';
import type { IdempotencyRecordRow } from '../db/schema';

const logger = getLogger('IdempotencyService');

// ============================================
// Types
// ============================================

/**
 * What a completed import stored against its key
 */
export interface IdempotencyResult {
  transactionIds: number[];
}

type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

// ============================================
// Hashing
// ============================================

/**
 * Serializes with sorted object keys and no whitespace.
 *
 * @example
 * canonicalJson({ b: 1, a: [2, { d: null, c: 'x' }] }) // '{"a":[2,{"c":"x","d":null}],"b":1}'
 */
export function canonicalJson(value: CanonicalValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value);
}

export function hashPayload(payload: CanonicalValue): string {
  return createHash('sha256').update(canonicalJson(payload)).digest('hex');
}

// ============================================
// Result encoding
// ============================================

export function encodeResult(result: IdempotencyResult): string {
  return JSON.stringify({ transactionIds: result.transactionIds });
}

/**
 * Reads a stored result descriptor. Anything unreadable counts as absent,
 * which makes the caller re-run the import instead of replaying.
 */
export function decodeResult(resultData: string | null): IdempotencyResult | null {
  if (!resultData) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(resultData);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'transactionIds' in parsed &&
      Array.isArray(parsed.transactionIds) &&
      parsed.transactionIds.every((id: unknown) => Number.isInteger(id))
    ) {
      return { transactionIds: parsed.transactionIds.map(Number) };
    }
  } catch (error) {
    logger.warn('Unreadable idempotency result', { error: errorMessage(error) });
  }

  return null;
}

// ============================================
// Ledger access
// ============================================

export async function findRecord(
  tenantId: number,
  idempotencyKey: string
): Promise<IdempotencyRecordRow | undefined> {
  return db
    .selectFrom('idempotency_records')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .where('idempotency_key', '=', idempotencyKey)
    .executeTakeFirst();
}

/**
 * Persists the outcome of an import under its key.
 *
 * A concurrent writer may have stored the key first; the unique index
 * decides, and the loser re-reads. Same hash: the result is refreshed.
 * Different hash: left alone and logged.
 *
 * Never throws. The transactions are already committed, so a failed write
 * only costs a future retry its short-circuit.
 */
export async function storeResult(
  tenantId: number,
  idempotencyKey: string,
  payloadHash: string,
  result: IdempotencyResult
): Promise<void> {
  const resultData = encodeResult(result);

  try {
    const inserted = await db
      .insertInto('idempotency_records')
      .values({
        tenant_id: tenantId,
        idempotency_key: idempotencyKey,
        payload_hash: payloadHash,
        result_data: resultData,
        created_at: new Date().toISOString(),
      })
      .onConflict((oc) => oc.columns(['tenant_id', 'idempotency_key']).doNothing())
      .returning('id')
      .executeTakeFirst();

    if (inserted) {
      return;
    }

    const existing = await findRecord(tenantId, idempotencyKey);

    if (existing && existing.payload_hash === payloadHash) {
      await db
        .updateTable('idempotency_records')
        .set({ result_data: resultData })
        .where('id', '=', existing.id)
        .execute();
      return;
    }

    logger.warn('Idempotency key stored concurrently with a different payload', {
      tenantId,
      idempotencyKey,
    });
  } catch (error) {
    logger.warn('Failed to store idempotency record', {
      tenantId,
      idempotencyKey,
      error: errorMessage(error),
    });
  }
}

// ============================================
// Export Service Object
// ============================================

export const idempotencyService = {
  canonicalJson,
  hashPayload,
  encodeResult,
  decodeResult,
  findRecord,
  storeResult,
};

export default idempotencyService;
