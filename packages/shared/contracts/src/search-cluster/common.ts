import { z } from 'zod';

/** Numeric stat that older or differently configured clusters may omit */
export const StatValueSchema = z.number().optional();

export function statSection<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).optional();
}
