/**
 * Products Schemas
 * ================
 * Request shapes for the catalog endpoints. Text fields are checked again by
 * the input guard in ProductsService.
 */

import { z } from "zod";

import { parseInput } from "../../shared/validation.js";

export const productInputSchema = z.object({
  id: z.string().trim().min(1).max(50).optional(),
  name: z.string().min(1).max(500),
  description: z.string().min(1).max(4000),
  price: z.number().finite(),
  currency: z.string().trim().default("USD"),
  category: z
    .string()
    .nullish()
    .transform((v) => {
      const trimmed = v?.trim() ?? "";
      return trimmed.length > 0 ? trimmed : null;
    }),
  isActive: z.boolean().default(true),
});

export type ProductInput = z.infer<typeof productInputSchema>;

export const updateProductInputSchema = productInputSchema.omit({ id: true });

export type UpdateProductInput = z.infer<typeof updateProductInputSchema>;

const optionalPrice = z
  .string()
  .trim()
  .min(1)
  .pipe(z.coerce.number().finite())
  .optional();

export const productsQuerySchema = z.object({
  q: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
  minPrice: optionalPrice,
  maxPrice: optionalPrice,
});

export type ProductsQuery = z.infer<typeof productsQuerySchema>;

export const productIdParamSchema = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .regex(/^[A-Za-z0-9_-]+$/, "Invalid product id");

export function validateProductId(data: unknown): string {
  return parseInput(productIdParamSchema, data, "product id");
}

export function validateProductInput(data: unknown): ProductInput {
  return parseInput(productInputSchema, data, "product data");
}

export function validateUpdateProductInput(data: unknown): UpdateProductInput {
  return parseInput(updateProductInputSchema, data, "product data");
}

export function validateProductsQuery(data: unknown): ProductsQuery {
  return parseInput(productsQuerySchema, data, "product query");
}
