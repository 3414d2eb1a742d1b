import { duplicateProductError, type ProductStore } from "./products.repository.js";
import type { NewProduct, Product, ProductData, ProductFilter, ProductStats } from "./products.types.js";

type StoredProduct = {
  product: Product;
  deleted: boolean;
};

/**
 * Process-local product store for development and tests.
 */
export class InMemoryProductStore implements ProductStore {
  private readonly products = new Map<string, StoredProduct>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  private visible(): Product[] {
    return Array.from(this.products.values())
      .filter((p) => !p.deleted)
      .map((p) => p.product);
  }

  async list(filter: ProductFilter = {}): Promise<Product[]> {
    const query = filter.query?.toLowerCase();
    const category = filter.category?.toLowerCase();
    return this.visible().filter((p) => {
      if (query && !p.name.toLowerCase().includes(query) && !p.description.toLowerCase().includes(query)) {
        return false;
      }
      if (category && p.category?.toLowerCase() !== category) {return false;}
      if (filter.minPrice !== undefined && p.price < filter.minPrice) {return false;}
      if (filter.maxPrice !== undefined && p.price > filter.maxPrice) {return false;}
      return true;
    });
  }

  async findById(id: string): Promise<Product | null> {
    const stored = this.products.get(id);
    return stored && !stored.deleted ? stored.product : null;
  }

  async existsById(id: string): Promise<boolean> {
    return this.products.has(id);
  }

  async existsByName(name: string, excludeId?: string): Promise<boolean> {
    const needle = name.toLowerCase();
    return this.visible().some((p) => p.id !== excludeId && p.name.toLowerCase() === needle);
  }

  async create(product: NewProduct): Promise<Product> {
    if (this.products.has(product.id)) {throw duplicateProductError(product.id);}
    const at = this.now();
    const created: Product = Object.freeze({ ...product, createdAt: at, updatedAt: at });
    this.products.set(product.id, { product: created, deleted: false });
    return created;
  }

  async update(id: string, data: ProductData): Promise<Product | null> {
    const stored = this.products.get(id);
    if (!stored || stored.deleted) {return null;}
    const updated: Product = Object.freeze({ ...stored.product, ...data, updatedAt: this.now() });
    this.products.set(id, { product: updated, deleted: false });
    return updated;
  }

  async softDelete(id: string): Promise<boolean> {
    const stored = this.products.get(id);
    if (!stored || stored.deleted) {return false;}
    this.products.set(id, { ...stored, deleted: true });
    return true;
  }

  async findDeletedById(id: string): Promise<Product | null> {
    const stored = this.products.get(id);
    return stored && stored.deleted ? stored.product : null;
  }

  async restore(id: string): Promise<Product | null> {
    const stored = this.products.get(id);
    if (!stored || !stored.deleted) {return null;}
    const restored: Product = Object.freeze({ ...stored.product, updatedAt: this.now() });
    this.products.set(id, { product: restored, deleted: false });
    return restored;
  }

  async stats(): Promise<ProductStats> {
    const stats: ProductStats = { total: 0, active: 0, inactive: 0, deleted: 0 };
    for (const { product, deleted } of this.products.values()) {
      stats.total += 1;
      if (deleted) {stats.deleted += 1;}
      else if (product.isActive) {stats.active += 1;}
      else {stats.inactive += 1;}
    }
    return stats;
  }
}
