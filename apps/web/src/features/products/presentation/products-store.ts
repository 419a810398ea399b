import { createStore, type StoreApi } from "zustand/vanilla";
import { DEFAULT_PAGE_SIZE, type Product } from "@/features/products/domain/product";
import type { GetProductsUseCase } from "@/features/products/domain/get-products-use-case";

export type ProductsState = {
  products: Product[];
  isLoading: boolean;
  errorMessage: string | null;
  total: number;
  skip: number;
  limit: number;
  hasMore: boolean;
  loadProducts: (options?: { refresh?: boolean }) => Promise<void>;
  refreshProducts: () => Promise<void>;
  loadMoreProducts: () => Promise<void>;
};

export type ProductsStore = StoreApi<ProductsState>;

export function createProductsStore(getProducts: Pick<GetProductsUseCase, "execute">): ProductsStore {
  return createStore<ProductsState>((set, get) => ({
    products: [],
    isLoading: false,
    errorMessage: null,
    total: 0,
    skip: 0,
    limit: DEFAULT_PAGE_SIZE,
    hasMore: true,

    loadProducts: async ({ refresh = false } = {}) => {
      if (refresh) {
        set({ isLoading: true, errorMessage: null, skip: 0, products: [] });
      } else {
        set({ isLoading: true, errorMessage: null });
      }

      const { skip, limit } = get();
      const result = await getProducts.execute({ skip: refresh ? 0 : skip, limit });

      if (!result.ok) {
        set({ isLoading: false, errorMessage: result.error });
        return;
      }

      const page = result.value;
      const products = refresh ? page.products : [...get().products, ...page.products];
      set({
        products,
        isLoading: false,
        errorMessage: null,
        skip: (refresh ? page.skip : get().skip) + page.products.length,
        total: page.total,
        hasMore: products.length < page.total,
      });
    },

    refreshProducts: () => get().loadProducts({ refresh: true }),

    loadMoreProducts: async () => {
      const { hasMore, isLoading } = get();
      if (!hasMore || isLoading) {
        return;
      }
      await get().loadProducts();
    },
  }));
}
