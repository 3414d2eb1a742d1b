export type Product = Readonly<{
  id: string;
  name: string;
  description: string;
  price: number;
  /** ISO 4217, upper case. */
  currency: string;
  category: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}>;

export type ProductData = {
  name: string;
  description: string;
  price: number;
  currency: string;
  category: string | null;
  isActive: boolean;
};

export type NewProduct = ProductData & { id: string };

export type ProductFilter = {
  /** Case-insensitive substring of name or description. */
  query?: string;
  /** Case-insensitive exact match. */
  category?: string;
  minPrice?: number;
  maxPrice?: number;
};

/** `total` counts every stored product, deleted ones included. */
export type ProductStats = {
  total: number;
  active: number;
  inactive: number;
  deleted: number;
};

export type PublicProduct = {
  id: string;
  name: string;
  description: string;
  price: number;
  currency: string;
  category: string | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
};
