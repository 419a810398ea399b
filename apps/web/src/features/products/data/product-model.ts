import { z } from "zod";
import type { Product, ProductsPage } from "@/features/products/domain/product";

export const productModelSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().default(""),
  category: z.string().default(""),
  price: z.number(),
  discountPercentage: z.number().default(0),
  rating: z.number().default(0),
  stock: z.number().int().default(0),
  tags: z.array(z.string()).default([]),
  brand: z.string().nullish(),
  sku: z.string().default(""),
  thumbnail: z.string().default(""),
  images: z.array(z.string()).default([]),
});

export const productsResponseSchema = z.object({
  products: z.array(productModelSchema),
  total: z.number().int().nonnegative(),
  skip: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
});

export type ProductModel = z.infer<typeof productModelSchema>;
export type ProductsResponse = z.infer<typeof productsResponseSchema>;

export function toProduct(model: ProductModel): Product {
  const { brand, ...rest } = model;
  return brand ? { ...rest, brand } : rest;
}

export function toProductsPage(response: ProductsResponse): ProductsPage {
  return {
    products: response.products.map(toProduct),
    total: response.total,
    skip: response.skip,
    limit: response.limit,
  };
}
