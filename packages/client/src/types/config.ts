import type { z } from 'zod';
import type { clientConfigSchema } from '../schemas/config.js';

/**
 * Client configuration after defaults are applied and validated
 */
export type ResolvedConfig = z.infer<typeof clientConfigSchema>;
