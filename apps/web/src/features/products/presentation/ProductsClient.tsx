"use client";

import { useEffect, useState } from "react";
import { useTranslation } from "react-i18next";
import { useStore } from "zustand";
import { Button } from "@/components/ui/button";
import { useService } from "@/core/di/locator-context";
import { ProductCard } from "@/features/products/presentation/ProductCard";

export function ProductsClient() {
  const { t } = useTranslation();
  const store = useService("productsStore");
  const connectivity = useService("connectivity");
  const products = useStore(store, (s) => s.products);
  const isLoading = useStore(store, (s) => s.isLoading);
  const errorMessage = useStore(store, (s) => s.errorMessage);
  const total = useStore(store, (s) => s.total);
  const hasMore = useStore(store, (s) => s.hasMore);
  const [online, setOnline] = useState(() => connectivity.getCurrentConnectivity() === "online");

  useEffect(() => connectivity.onChange((state) => setOnline(state === "online")), [connectivity]);

  useEffect(() => {
    if (store.getState().products.length === 0) {
      void store.getState().loadProducts({ refresh: true });
    }
  }, [store]);

  return (
    <div className="mx-auto max-w-4xl space-y-4 px-4 py-6">
      <div className="flex items-center justify-between">
        <div>
          <h1 className="text-2xl font-bold">{t("products.title")}</h1>
          {total > 0 ? (
            <p className="text-xs text-ink/60 dark:text-cream/60">{t("products.count", { shown: products.length, total })}</p>
          ) : null}
        </div>
        <Button variant="ghost" onClick={() => void store.getState().refreshProducts()} disabled={isLoading}>
          {t("products.refresh")}
        </Button>
      </div>

      {!online ? (
        <p role="status" className="rounded-xl2 bg-sky/30 px-3 py-2 text-sm">
          {t("products.offline")}
        </p>
      ) : null}

      {errorMessage ? (
        <div role="alert" className="flex items-center justify-between gap-3 rounded-xl2 bg-coral/20 px-3 py-2 text-sm">
          <span>{errorMessage}</span>
          <Button variant="danger" onClick={() => void store.getState().loadProducts({ refresh: products.length === 0 })}>
            {t("products.retry")}
          </Button>
        </div>
      ) : null}

      {!isLoading && !errorMessage && products.length === 0 ? <p>{t("products.empty")}</p> : null}

      <ul className="space-y-3">
        {products.map((product) => (
          <li key={product.id}>
            <ProductCard product={product} />
          </li>
        ))}
      </ul>

      {isLoading ? <p className="text-center text-sm">{t("loading")}</p> : null}

      {hasMore && products.length > 0 && !isLoading ? (
        <Button className="w-full" variant="secondary" onClick={() => void store.getState().loadMoreProducts()}>
          {t("products.loadMore")}
        </Button>
      ) : null}
    </div>
  );
}
