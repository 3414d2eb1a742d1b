/**
 * Products Repository
 * ===================
 * Product store interface and its PostgreSQL implementation.
 *
 * Deleted products stay in the table (`is_deleted`) and are invisible to
 * every read below except `findDeletedById` and `stats`.
 */

import type { Pool } from "pg";

import { ConflictError } from "../../shared/errors.js";
import type { NewProduct, Product, ProductData, ProductFilter, ProductStats } from "./products.types.js";

export interface ProductStore {
  list(filter?: ProductFilter): Promise<Product[]>;
  findById(id: string): Promise<Product | null>;
  /** Includes deleted products: ids are never reused. */
  existsById(id: string): Promise<boolean>;
  /** Case-insensitive; `excludeId` skips the product being updated. */
  existsByName(name: string, excludeId?: string): Promise<boolean>;
  /** Rejects with a DUPLICATE_PRODUCT ConflictError when the id exists. */
  create(product: NewProduct): Promise<Product>;
  update(id: string, data: ProductData): Promise<Product | null>;
  softDelete(id: string): Promise<boolean>;
  findDeletedById(id: string): Promise<Product | null>;
  /** Null unless the product exists and is deleted. */
  restore(id: string): Promise<Product | null>;
  stats(): Promise<ProductStats>;
}

export function duplicateProductError(id: string): ConflictError {
  return new ConflictError(`Product with ID '${id}' already exists`, "DUPLICATE_PRODUCT");
}

type ProductRow = {
  id: string;
  name: string;
  description: string;
  // DECIMAL comes back from pg as a string
  price: string | number;
  currency: string;
  category: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

const PRODUCT_COLUMNS = "id, name, description, price, currency, category, is_active, created_at, updated_at";

function toProduct(row: ProductRow): Product {
  return Object.freeze({
    id: row.id,
    name: row.name,
    description: row.description,
    price: Number(row.price),
    currency: row.currency,
    category: row.category,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, "\\$&");
}

export class PostgresProductStore implements ProductStore {
  constructor(private readonly pool: Pool) {}

  async list(filter: ProductFilter = {}): Promise<Product[]> {
    const where: string[] = ["is_deleted = false"];
    const params: unknown[] = [];

    if (filter.query) {
      params.push(`%${escapeLike(filter.query)}%`);
      where.push(`(name ILIKE $${params.length} ESCAPE '\\' OR description ILIKE $${params.length} ESCAPE '\\')`);
    }
    if (filter.category) {
      params.push(filter.category);
      where.push(`LOWER(category) = LOWER($${params.length})`);
    }
    if (filter.minPrice !== undefined) {
      params.push(filter.minPrice);
      where.push(`price >= $${params.length}`);
    }
    if (filter.maxPrice !== undefined) {
      params.push(filter.maxPrice);
      where.push(`price <= $${params.length}`);
    }

    const sql = `SELECT ${PRODUCT_COLUMNS} FROM products WHERE ${where.join(" AND ")} ORDER BY created_at ASC, id ASC`;
    const result = await this.pool.query<ProductRow>(sql, params);
    return result.rows.map(toProduct);
  }

  async findById(id: string): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1 AND is_deleted = false LIMIT 1`,
      [id]
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async existsById(id: string): Promise<boolean> {
    const result = await this.pool.query("SELECT 1 FROM products WHERE id = $1 LIMIT 1", [id]);
    return result.rows.length > 0;
  }

  async existsByName(name: string, excludeId?: string): Promise<boolean> {
    const result = await this.pool.query(
      "SELECT 1 FROM products WHERE LOWER(name) = LOWER($1) AND is_deleted = false AND ($2::varchar IS NULL OR id <> $2) LIMIT 1",
      [name, excludeId ?? null]
    );
    return result.rows.length > 0;
  }

  async create(product: NewProduct): Promise<Product> {
    const sql = `
      INSERT INTO products (id, name, description, price, currency, category, is_active)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${PRODUCT_COLUMNS}
    `;
    try {
      const result = await this.pool.query<ProductRow>(sql, [
        product.id,
        product.name,
        product.description,
        product.price,
        product.currency,
        product.category,
        product.isActive,
      ]);
      if (result.rows.length === 0) {throw new Error("INSERT INTO products returned no row");}
      return toProduct(result.rows[0]);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "23505") {
        throw duplicateProductError(product.id);
      }
      throw error;
    }
  }

  async update(id: string, data: ProductData): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `UPDATE products
         SET name = $2, description = $3, price = $4, currency = $5, category = $6, is_active = $7, updated_at = NOW()
       WHERE id = $1 AND is_deleted = false
       RETURNING ${PRODUCT_COLUMNS}`,
      [id, data.name, data.description, data.price, data.currency, data.category, data.isActive]
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async softDelete(id: string): Promise<boolean> {
    const result = await this.pool.query(
      "UPDATE products SET is_deleted = true, deleted_at = NOW(), updated_at = NOW() WHERE id = $1 AND is_deleted = false",
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findDeletedById(id: string): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1 AND is_deleted = true LIMIT 1`,
      [id]
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async restore(id: string): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `UPDATE products SET is_deleted = false, deleted_at = NULL, updated_at = NOW()
       WHERE id = $1 AND is_deleted = true
       RETURNING ${PRODUCT_COLUMNS}`,
      [id]
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async stats(): Promise<ProductStats> {
    // COUNT comes back from pg as a string
    const result = await this.pool.query<Record<keyof ProductStats, string>>(
      `SELECT COUNT(*) AS total,
              COUNT(*) FILTER (WHERE NOT is_deleted AND is_active) AS active,
              COUNT(*) FILTER (WHERE NOT is_deleted AND NOT is_active) AS inactive,
              COUNT(*) FILTER (WHERE is_deleted) AS deleted
         FROM products`
    );
    const row = result.rows[0];
    if (!row) {throw new Error("Product count query returned no row");}
    return {
      total: Number(row.total),
      active: Number(row.active),
      inactive: Number(row.inactive),
      deleted: Number(row.deleted),
    };
  }
}
