/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually — they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import type { z } from 'zod';
import type { appConfigSchema, providerConfigSchema, testerConfigSchema } from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** Completion service settings. */
export type ProviderConfig = z.infer<typeof providerConfigSchema>;

/** Generated test file and runner settings. */
export type TesterConfig = z.infer<typeof testerConfigSchema>;
