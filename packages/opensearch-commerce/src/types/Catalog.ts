export type ProductAttribute = {
  name: string;
  value: string;
};

export type Product = {
  sku: string;
  name: string;
  description?: string;
  category?: string;
  brand?: string;
  price?: number;
  stock?: number;
  tags?: string[];
  attributes?: ProductAttribute[];
  averageRating?: number;
  viewCount?: number;
  location?: { lat: number; lon: number };
  createdAt?: Date | string;
};

export type ProductPage = { items: Product[]; nextPageCursor?: string | null };

export interface ProductSource {
  fetchProducts(page?: { after?: string | null; limit?: number }): Promise<ProductPage>;
}
