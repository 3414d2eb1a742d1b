/**
 * Products Service
 * ================
 * Catalog rules on top of the product store: every text field passes the
 * input guard, prices and currencies are range-checked, names are unique
 * (case-insensitive) among live products.
 */

import { randomUUID } from "node:crypto";

import { ConflictError, infrastructureCall, NotFoundError, ValidationError } from "../../shared/errors.js";
import {
  type FieldKind,
  isValidCurrency,
  isValidPrice,
  isValidPriceRange,
  MAX_PRICE,
  validateField,
  validateStrict,
} from "../../shared/input-guard.js";
import { type AppLogger, logger as rootLogger } from "../../shared/logger.js";
import type { FieldError } from "../auth/auth.types.js";
import type { ProductStore } from "./products.repository.js";
import type { ProductInput, ProductsQuery, UpdateProductInput } from "./products.schemas.js";
import type { Product, ProductData, ProductFilter, ProductStats, PublicProduct } from "./products.types.js";

export function toPublicProduct(product: Product): PublicProduct {
  return {
    id: product.id,
    name: product.name,
    description: product.description,
    price: product.price,
    currency: product.currency,
    category: product.category,
    is_active: product.isActive,
    created_at: product.createdAt.toISOString(),
    updated_at: product.updatedAt.toISOString(),
  };
}

function field(kind: FieldKind, name: string, raw: string, errors: FieldError[], message: string): string {
  const outcome = validateField(kind, raw);
  if (!outcome.valid || outcome.sanitizedValue === undefined) {
    errors.push({ field: name, message });
    return "";
  }
  return outcome.sanitizedValue;
}

function checkProductData(input: UpdateProductInput, errors: FieldError[]): ProductData {
  const name = field("name", "name", input.name, errors, "Name contains invalid characters");
  const description = field(
    "description",
    "description",
    input.description,
    errors,
    "Description contains invalid content"
  );

  let category: string | null = null;
  if (input.category !== null) {
    category = field("category", "category", input.category, errors, "Category contains invalid characters");
  }

  if (!isValidPrice(input.price)) {
    errors.push({ field: "price", message: `Price must be between 0.01 and ${MAX_PRICE} in whole cents` });
  }
  if (!isValidCurrency(input.currency)) {
    errors.push({ field: "currency", message: "Currency must be a 3-letter code" });
  }

  return {
    name,
    description,
    price: input.price,
    currency: input.currency.trim().toUpperCase(),
    category,
    isActive: input.isActive,
  };
}

export class ProductsService {
  private readonly log: AppLogger;

  constructor(
    private readonly products: ProductStore,
    log?: AppLogger
  ) {
    this.log = log ?? rootLogger.child("products");
  }

  async list(query: ProductsQuery = {}): Promise<Product[]> {
    const filter: ProductFilter = {};
    const errors: FieldError[] = [];

    if (query.q !== undefined) {
      filter.query = field("searchQuery", "q", query.q, errors, "Search query contains invalid characters");
    }
    if (query.category !== undefined) {
      filter.category = field("category", "category", query.category, errors, "Category contains invalid characters");
    }
    if (query.minPrice !== undefined) {
      if (isValidPrice(query.minPrice)) {filter.minPrice = query.minPrice;}
      else {errors.push({ field: "minPrice", message: "Invalid minimum price" });}
    }
    if (query.maxPrice !== undefined) {
      if (isValidPrice(query.maxPrice)) {filter.maxPrice = query.maxPrice;}
      else {errors.push({ field: "maxPrice", message: "Invalid maximum price" });}
    }
    if (
      filter.minPrice !== undefined &&
      filter.maxPrice !== undefined &&
      !isValidPriceRange(filter.minPrice, filter.maxPrice)
    ) {
      errors.push({ field: "minPrice", message: "Minimum price must not exceed maximum price" });
    }

    if (errors.length > 0) {throw new ValidationError("Invalid product query", errors);}
    return infrastructureCall("products.list", () => this.products.list(filter));
  }

  async get(id: string): Promise<Product> {
    const product = await infrastructureCall("products.findById", () => this.products.findById(id));
    if (!product) {throw new NotFoundError("Product", id);}
    return product;
  }

  async create(input: ProductInput): Promise<Product> {
    const errors: FieldError[] = [];

    let id: string = randomUUID();
    if (input.id !== undefined) {
      const outcome = validateStrict("identifier", input.id);
      if (outcome.valid && outcome.sanitizedValue !== undefined) {id = outcome.sanitizedValue;}
      else {errors.push({ field: "id", message: "ID must be 1-50 letters, digits, '_' or '-'" });}
    }

    const data = checkProductData(input, errors);
    if (errors.length > 0) {throw new ValidationError("Invalid product data", errors);}

    const [idTaken, nameTaken] = await infrastructureCall("products.exists", () =>
      Promise.all([this.products.existsById(id), this.products.existsByName(data.name)])
    );
    if (idTaken) {throw new ConflictError(`Product with ID '${id}' already exists`, "DUPLICATE_PRODUCT");}
    if (nameTaken) {
      throw new ConflictError(`Product with name '${data.name}' already exists`, "DUPLICATE_PRODUCT_NAME");
    }

    const created = await infrastructureCall("products.create", () => this.products.create({ id, ...data }));
    this.log.info("Product created", { productId: created.id });
    return created;
  }

  async update(id: string, input: UpdateProductInput): Promise<Product> {
    const errors: FieldError[] = [];
    const data = checkProductData(input, errors);
    if (errors.length > 0) {throw new ValidationError("Invalid product data", errors);}

    const nameTaken = await infrastructureCall("products.existsByName", () =>
      this.products.existsByName(data.name, id)
    );
    if (nameTaken) {
      throw new ConflictError(`Product with name '${data.name}' already exists`, "DUPLICATE_PRODUCT_NAME");
    }

    const updated = await infrastructureCall("products.update", () => this.products.update(id, data));
    if (!updated) {throw new NotFoundError("Product", id);}
    this.log.info("Product updated", { productId: id });
    return updated;
  }

  async remove(id: string): Promise<void> {
    const deleted = await infrastructureCall("products.softDelete", () => this.products.softDelete(id));
    if (!deleted) {throw new NotFoundError("Product", id);}
    this.log.info("Product deleted", { productId: id });
  }

  /** Brings back a deleted product unless a live product took its name meanwhile. */
  async restore(id: string): Promise<Product> {
    const deleted = await infrastructureCall("products.findDeletedById", () => this.products.findDeletedById(id));
    if (!deleted) {throw new NotFoundError("Deleted product", id);}

    const nameTaken = await infrastructureCall("products.existsByName", () =>
      this.products.existsByName(deleted.name, id)
    );
    if (nameTaken) {
      throw new ConflictError(`Product with name '${deleted.name}' already exists`, "DUPLICATE_PRODUCT_NAME");
    }

    const restored = await infrastructureCall("products.restore", () => this.products.restore(id));
    if (!restored) {throw new NotFoundError("Deleted product", id);}
    this.log.info("Product restored", { productId: id });
    return restored;
  }

  async stats(): Promise<ProductStats> {
    return infrastructureCall("products.stats", () => this.products.stats());
  }
}
