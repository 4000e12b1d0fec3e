import { z } from 'zod';
import { MATCH_STATUSES } from '../db/schema';
import { positiveId } from './common.schema';

export const listMatchesQuerySchema = z.object({
  status: z.enum(MATCH_STATUSES).optional(),
});

export const explainQuerySchema = z.object({
  invoice_id: positiveId('invoice_id'),
  transaction_id: positiveId('transaction_id'),
});

export const matchParams = z.object({
  tenantId: positiveId('tenantId'),
  matchId: positiveId('matchId'),
});
