/**
 * Products Module
 * ===============
 * Collectibles catalog
 */

export * from "./products.schemas.js";
export type * from "./products.types.js";
export { ProductsService, toPublicProduct } from "./products.service.js";
export { PostgresProductStore, type ProductStore } from "./products.repository.js";
export { InMemoryProductStore } from "./products.repository.memory.js";
export { createProductsRouter } from "./products.routes.js";
