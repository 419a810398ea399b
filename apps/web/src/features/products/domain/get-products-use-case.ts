import type { Result } from "@/core/functional/result";
import type { UseCase } from "@/core/functional/use-case";
import type { GetProductsParams, ProductsPage } from "@/features/products/domain/product";
import type { ProductRepository } from "@/features/products/domain/product-repository";

export class GetProductsUseCase implements UseCase<ProductsPage, GetProductsParams> {
  constructor(private readonly repository: ProductRepository) {}

  execute(params: GetProductsParams): Promise<Result<ProductsPage>> {
    return this.repository.getProducts(params);
  }
}
