import type { Result } from "@/core/functional/result";
import type { GetProductsParams, Product, ProductsPage } from "@/features/products/domain/product";

export interface ProductRepository {
  getProducts(params: GetProductsParams): Promise<Result<ProductsPage>>;
  getProductById(id: number): Promise<Result<Product>>;
  searchProducts(query: string, params?: GetProductsParams): Promise<Result<ProductsPage>>;
}
