import type { z } from 'zod';
import { config } from '../config/env.js';

/** Checks structured output against its schema while developing; a no-op otherwise. */
export function validateDev<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: T): T {
  if (config.NODE_ENV === 'development') {
    return schema.parse(value);
  }
  return value;
}
