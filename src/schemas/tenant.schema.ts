import { z } from 'zod';
import { requiredText } from './common.schema';

export const createTenantSchema = z.object({
  name: requiredText('name'),
});

export const createVendorSchema = z.object({
  name: requiredText('name'),
});

export type CreateTenantInput = z.input<typeof createTenantSchema>;
export type CreateVendorInput = z.input<typeof createVendorSchema>;
