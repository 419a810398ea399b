import { ProductsClient } from "@/features/products/presentation/ProductsClient";

export default function ProductsPage() {
  return <ProductsClient />;
}
