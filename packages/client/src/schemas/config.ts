import { z } from 'zod';

/**
 * Effective client configuration, after defaults have been applied
 */
export const clientConfigSchema = z.object({
  address: z.string().url(),
  token: z.string().min(1),
  // Largest delay a timer accepts
  timeout: z.number().int().positive().max(2_147_483_647),
});
