import type { Locator } from "@/core/di/registry";
import { createLogger } from "@/core/logging/logger";
import { ProductLocalDataSourceImpl } from "@/features/products/data/product-local-data-source";
import { ProductRemoteDataSourceImpl } from "@/features/products/data/product-remote-data-source";
import { ProductRepositoryImpl } from "@/features/products/data/product-repository-impl";
import { GetProductsUseCase } from "@/features/products/domain/get-products-use-case";
import { createProductsStore } from "@/features/products/presentation/products-store";

export function initProductsInjector(sl: Locator): void {
  sl.registerLazySingleton("productRemoteDataSource", () => new ProductRemoteDataSourceImpl(sl.get("apiClient")));
  sl.registerLazySingleton("productLocalDataSource", () => new ProductLocalDataSourceImpl(sl.get("db")));
  sl.registerLazySingleton(
    "productRepository",
    () =>
      new ProductRepositoryImpl(
        sl.get("productRemoteDataSource"),
        sl.get("productLocalDataSource"),
        sl.get("connectivity"),
        createLogger(sl.get("logger"), "products"),
      ),
  );
  sl.registerLazySingleton("getProductsUseCase", () => new GetProductsUseCase(sl.get("productRepository")));
  // one store per products page
  sl.registerFactory("productsStore", () => createProductsStore(sl.get("getProductsUseCase")));
}
