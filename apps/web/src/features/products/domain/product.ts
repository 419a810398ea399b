export type Product = {
  id: number;
  title: string;
  description: string;
  category: string;
  price: number;
  discountPercentage: number;
  rating: number;
  stock: number;
  tags: string[];
  brand?: string;
  sku: string;
  thumbnail: string;
  images: string[];
};

export type ProductsPage = {
  products: Product[];
  total: number;
  skip: number;
  limit: number;
};

export type GetProductsParams = {
  skip?: number;
  limit?: number;
};

export const DEFAULT_PAGE_SIZE = 30;

export function discountedPrice(product: Pick<Product, "price" | "discountPercentage">): number {
  return Math.round(product.price * (100 - product.discountPercentage)) / 100;
}
