/**
 * Product store — CRUD over the products table.
 */

import type { Queryable } from "../config/database";
import { productRowSchema } from "../models/product";
import type { NewProduct, ProductChanges, ProductRow } from "../models/product";

const PRODUCT_COLUMNS = "id, name, description, price, stock";

/** Columns a partial update may touch, in the order they are written. */
const UPDATABLE_COLUMNS = ["name", "description", "price", "stock"] as const;

export interface ProductStore {
  list(): Promise<ProductRow[]>;
  findById(id: number): Promise<ProductRow | null>;
  create(product: NewProduct): Promise<ProductRow>;
  /** Returns null when no product has this id. */
  update(id: number, changes: ProductChanges): Promise<ProductRow | null>;
  /** Returns false when no product has this id. */
  remove(id: number): Promise<boolean>;
}

export class PgProductStore implements ProductStore {
  constructor(private readonly db: Queryable) {}

  async list(): Promise<ProductRow[]> {
    const result = await this.db.query(`SELECT ${PRODUCT_COLUMNS} FROM products ORDER BY id ASC`);
    return result.rows.map((row) => productRowSchema.parse(row));
  }

  async findById(id: number): Promise<ProductRow | null> {
    const result = await this.db.query(`SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row === undefined ? null : productRowSchema.parse(row);
  }

  async create(product: NewProduct): Promise<ProductRow> {
    const result = await this.db.query(
      `INSERT INTO products (name, description, price, stock)
       VALUES ($1, $2, $3, $4)
       RETURNING ${PRODUCT_COLUMNS}`,
      [product.name, product.description, product.price, product.stock]
    );
    return productRowSchema.parse(result.rows[0]);
  }

  async update(id: number, changes: ProductChanges): Promise<ProductRow | null> {
    const columns = UPDATABLE_COLUMNS.filter((column) => changes[column] !== undefined);

    if (columns.length === 0) {
      return this.findById(id);
    }

    const assignments = columns.map((column, i) => `${column} = $${i + 1}`);
    const values: unknown[] = columns.map((column) => changes[column]);

    const result = await this.db.query(
      `UPDATE products SET ${assignments.join(", ")}
       WHERE id = $${columns.length + 1}
       RETURNING ${PRODUCT_COLUMNS}`,
      [...values, id]
    );
    const row = result.rows[0];
    return row === undefined ? null : productRowSchema.parse(row);
  }

  async remove(id: number): Promise<boolean> {
    const result = await this.db.query("DELETE FROM products WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
