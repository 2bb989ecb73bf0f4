/**
 * Model descriptor schemas
 *
 * Validation for caller-supplied model selections before any request reaches
 * the managed service.
 */

import { z } from 'zod';
import { NonEmptyString } from './common.js';
import { CapabilityType, parseCapability } from '../capability.js';

/**
 * Model ids are opaque but never blank and never contain whitespace.
 */
export const ModelIdSchema = NonEmptyString.refine((value) => !/\s/.test(value), {
  message: 'Model id cannot contain whitespace',
});

export const CapabilitySchema = z.nativeEnum(CapabilityType, {
  errorMap: () => ({ message: 'Capability must be one of: STT, TTS, EMBEDDING' }),
});

/**
 * Mirrors: src/types/models.ts:ModelDescriptor
 */
export const ModelDescriptorSchema = z.object({
  modelId: ModelIdSchema,
  capability: CapabilitySchema,
});

export const ModelDescriptorListSchema = z.array(ModelDescriptorSchema);

/**
 * Capability-keyed map: `{ STT: 'Systran/faster-whisper-base' }`.
 * Keys are resolved through parseCapability; unknown keys are rejected.
 */
export const CapabilityModelMapSchema = z
  .record(z.string(), ModelIdSchema)
  .superRefine((value, ctx) => {
    for (const key of Object.keys(value)) {
      if (!parseCapability(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Unknown capability '${key}' (expected STT, TTS or EMBEDDING)`,
        });
      }
    }
  });
