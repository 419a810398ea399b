import type { AppDb, ProductRow } from "@/core/db/app-db";
import { DEFAULT_PAGE_SIZE, type GetProductsParams, type Product, type ProductsPage } from "@/features/products/domain/product";

export type SaveProductsOptions = {
  clearFirst?: boolean;
};

export interface ProductLocalDataSource {
  saveProducts(page: ProductsPage, options?: SaveProductsOptions): Promise<void>;
  getProducts(params?: GetProductsParams): Promise<ProductsPage>;
  clearProducts(): Promise<void>;
  getProductsCount(): Promise<number>;
}

function toRow(product: Product, createdAt: number): ProductRow {
  return { ...product, tags: [...product.tags], images: [...product.images], createdAt };
}

function fromRow(row: ProductRow): Product {
  const { createdAt: _createdAt, ...product } = row;
  return product;
}

export class ProductLocalDataSourceImpl implements ProductLocalDataSource {
  private lastStamp = 0;

  constructor(
    private readonly db: AppDb,
    private readonly now: () => number = Date.now,
  ) {}

  async saveProducts(page: ProductsPage, options: SaveProductsOptions = {}): Promise<void> {
    // rows of one page share a save stamp; earlier rows sort first within it
    const stamp = Math.max(this.now(), this.lastStamp + page.products.length + 1);
    this.lastStamp = stamp;
    const rows = page.products.map((product, index) => toRow(product, stamp - index));
    await this.db.transaction("rw", this.db.products, async () => {
      if (options.clearFirst) {
        await this.db.products.clear();
      }
      await this.db.products.bulkPut(rows);
    });
  }

  async getProducts(params: GetProductsParams = {}): Promise<ProductsPage> {
    let collection = this.db.products.orderBy("createdAt").reverse();
    const limit = params.skip !== undefined ? (params.limit ?? DEFAULT_PAGE_SIZE) : params.limit;
    if (params.skip !== undefined) {
      collection = collection.offset(params.skip);
    }
    if (limit !== undefined) {
      collection = collection.limit(limit);
    }
    const rows = await collection.toArray();
    const products = rows.map(fromRow);
    return {
      products,
      total: await this.getProductsCount(),
      skip: params.skip ?? 0,
      limit: limit ?? products.length,
    };
  }

  async clearProducts(): Promise<void> {
    await this.db.products.clear();
  }

  async getProductsCount(): Promise<number> {
    try {
      return await this.db.products.count();
    } catch {
      return 0;
    }
  }
}
