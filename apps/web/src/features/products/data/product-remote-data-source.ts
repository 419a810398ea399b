import type { ApiClient } from "@/core/network/api-client";
import { AppUrls } from "@/core/network/app-urls";
import { DEFAULT_PAGE_SIZE, type GetProductsParams, type Product, type ProductsPage } from "@/features/products/domain/product";
import { productModelSchema, productsResponseSchema, toProduct, toProductsPage } from "@/features/products/data/product-model";

export interface ProductRemoteDataSource {
  getProducts(params: GetProductsParams): Promise<ProductsPage>;
  getProductById(id: number): Promise<Product>;
  getProductsByCategory(category: string, params?: GetProductsParams): Promise<ProductsPage>;
  searchProducts(query: string, params?: GetProductsParams): Promise<ProductsPage>;
}

function pageQuery(params: GetProductsParams = {}) {
  return {
    skip: params.skip ?? 0,
    limit: params.limit ?? DEFAULT_PAGE_SIZE,
  };
}

export class ProductRemoteDataSourceImpl implements ProductRemoteDataSource {
  constructor(private readonly client: ApiClient) {}

  async getProducts(params: GetProductsParams): Promise<ProductsPage> {
    const raw = await this.client.get(AppUrls.products, { query: pageQuery(params) });
    return toProductsPage(productsResponseSchema.parse(raw));
  }

  async getProductById(id: number): Promise<Product> {
    const raw = await this.client.get(AppUrls.productById(id));
    return toProduct(productModelSchema.parse(raw));
  }

  async getProductsByCategory(category: string, params?: GetProductsParams): Promise<ProductsPage> {
    const raw = await this.client.get(AppUrls.productsByCategory(category), { query: pageQuery(params) });
    return toProductsPage(productsResponseSchema.parse(raw));
  }

  async searchProducts(query: string, params?: GetProductsParams): Promise<ProductsPage> {
    const raw = await this.client.get(AppUrls.searchProducts, { query: { q: query, ...pageQuery(params) } });
    return toProductsPage(productsResponseSchema.parse(raw));
  }
}
