import type { ConnectivityService } from "@/core/connectivity/connectivity-service";
import { err, ok, type Result } from "@/core/functional/result";
import type { Logger } from "@/core/logging/logger";
import { getErrorMessage } from "@/core/utils/error-handler";
import type { ProductLocalDataSource } from "@/features/products/data/product-local-data-source";
import type { ProductRemoteDataSource } from "@/features/products/data/product-remote-data-source";
import type { GetProductsParams, Product, ProductsPage } from "@/features/products/domain/product";
import type { ProductRepository } from "@/features/products/domain/product-repository";

export const OFFLINE_EMPTY_MESSAGE = "No products available offline. Please connect to the internet.";

export class ProductRepositoryImpl implements ProductRepository {
  constructor(
    private readonly remote: ProductRemoteDataSource,
    private readonly local: ProductLocalDataSource,
    private readonly connectivity: ConnectivityService,
    private readonly logger: Logger,
  ) {}

  async getProducts(params: GetProductsParams): Promise<Result<ProductsPage>> {
    if (await this.connectivity.hasInternetConnection()) {
      try {
        const page = await this.remote.getProducts(params);
        await this.cache(page, !params.skip);
        return ok(page);
      } catch (error) {
        this.logger.warn({ err: error, skip: params.skip }, "remote products failed, reading local cache");
      }
    }
    return this.getLocalProducts(params);
  }

  async getProductById(id: number): Promise<Result<Product>> {
    try {
      return ok(await this.remote.getProductById(id));
    } catch (error) {
      return err(getErrorMessage(error));
    }
  }

  async searchProducts(query: string, params?: GetProductsParams): Promise<Result<ProductsPage>> {
    try {
      return ok(await this.remote.searchProducts(query, params));
    } catch (error) {
      return err(getErrorMessage(error));
    }
  }

  private async cache(page: ProductsPage, clearFirst: boolean): Promise<void> {
    try {
      await this.local.saveProducts(page, { clearFirst });
    } catch (error) {
      this.logger.error({ err: error }, "failed to save products to the local database");
    }
  }

  private async getLocalProducts(params: GetProductsParams): Promise<Result<ProductsPage>> {
    try {
      const page = await this.local.getProducts({ skip: params.skip, limit: params.limit });
      if (page.products.length === 0) {
        return err(OFFLINE_EMPTY_MESSAGE);
      }
      return ok(page);
    } catch (error) {
      return err(`Failed to load products from local storage: ${getErrorMessage(error)}`);
    }
  }
}
