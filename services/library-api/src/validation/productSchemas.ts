import { z } from 'zod';
import type { ProductInput, ProductPatch } from '@library/shared';
import { omitUndefined, parseWith, text } from './parse';

export const productInputSchema = z.object({
  name: text(1, 100),
  price: z.number().positive(),
  category: z.string(),
  in_stock: z.boolean().default(true),
  description: text(0, 500).nullable().optional(),
});

export const productPatchSchema = productInputSchema.partial();

export function validateProductInput(input: unknown): ProductInput {
  return parseWith(productInputSchema, input);
}

export function validateProductPatch(patch: unknown): ProductPatch {
  return omitUndefined(parseWith(productPatchSchema, patch));
}
