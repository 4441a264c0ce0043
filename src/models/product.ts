/**
 * Product model types.
 */

import { z } from "zod";

/** Product row as stored in PostgreSQL. */
export const productRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  price: z.number(),
  stock: z.number().int().nullable(),
});

export type ProductRow = z.infer<typeof productRowSchema>;

export type NewProduct = Omit<ProductRow, "id">;

/**
 * Partial update. A key that is present is written, even when its value is
 * 0, "" or null; a key that is absent keeps the stored value.
 */
export type ProductChanges = Partial<NewProduct>;

/** Product as returned by API responses. */
export interface ProductView {
  id: number;
  name: string;
  description: string | null;
  price: number;
  stock: number | null;
}

export function toProductView(row: ProductRow): ProductView {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: row.price,
    stock: row.stock,
  };
}
