import { useTranslation } from "react-i18next";
import { Badge } from "@/components/ui/badge";
import { Card } from "@/components/ui/card";
import { discountedPrice, type Product } from "@/features/products/domain/product";

const price = new Intl.NumberFormat("en-US", { style: "currency", currency: "USD" });

export function ProductCard({ product }: { product: Product }) {
  const { t } = useTranslation();
  const hasDiscount = product.discountPercentage > 0;

  return (
    <Card className="flex gap-4">
      <img
        src={product.thumbnail}
        alt={product.title}
        width={96}
        height={96}
        loading="lazy"
        className="h-24 w-24 shrink-0 rounded-xl2 bg-cream object-cover dark:bg-white/10"
      />
      <div className="min-w-0 flex-1">
        <div className="flex items-start justify-between gap-2">
          <h3 className="truncate font-semibold">{product.title}</h3>
          <Badge>{product.category}</Badge>
        </div>
        {product.brand ? <p className="text-xs text-ink/60 dark:text-cream/60">{product.brand}</p> : null}
        <p className="mt-1 line-clamp-2 text-sm text-ink/80 dark:text-cream/80">{product.description}</p>
        <div className="mt-2 flex items-center gap-3 text-sm">
          <span className="font-bold">{price.format(discountedPrice(product))}</span>
          {hasDiscount ? <span className="text-xs text-ink/50 line-through dark:text-cream/50">{price.format(product.price)}</span> : null}
          <span className="text-xs">★ {product.rating.toFixed(1)}</span>
          <span className="text-xs text-ink/60 dark:text-cream/60">{t("products.stock", { count: product.stock })}</span>
        </div>
      </div>
    </Card>
  );
}
