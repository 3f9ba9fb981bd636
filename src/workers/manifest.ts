import { z } from 'zod';

import { HTTP_METHODS } from '../common/consts.js';
import { CAPABILITIES } from './capabilities.js';

/**
 * Sidecar `<name>.json` next to a worker. Every field is optional; a worker without a manifest gets the
 * defaults.
 */
export const ManifestSchema = z
  .object({
    entrypoint: z.string().min(1).default('_start'),
    contract: z.number().int().default(1),
    methods: z
      .array(
        z
          .string()
          .transform((method) => method.toUpperCase())
          .pipe(z.enum(HTTP_METHODS)),
      )
      .default([]),
    capabilities: z.array(z.enum(CAPABILITIES)).default([]),
    vars: z.record(z.string(), z.string()).default({}),
    kv: z
      .object({
        namespace: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    timeoutMs: z.number().int().positive().optional(),
    maxMemoryMb: z.number().int().positive().optional(),
  })
  .strict();

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Manifest of a worker that ships none.
 */
export function defaultManifest(): Manifest {
  return ManifestSchema.parse({});
}
