import { z } from "zod";

export const productSchema = z.object({
  id: z.number().int().positive(),
  title: z.string().min(1),
  description: z.string(),
  category: z.string().min(1),
  price: z.number().nonnegative(),
  discountPercentage: z.number().min(0).max(100),
  rating: z.number().min(0).max(5),
  stock: z.number().int().nonnegative(),
  tags: z.array(z.string()).default([]),
  brand: z.string().optional(),
  sku: z.string().min(1),
  thumbnail: z.string().url(),
  images: z.array(z.string().url()).default([]),
});

export const productCatalogSchema = z.array(productSchema);

export const productsQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).max(100).default(30),
});

export const searchProductsQuerySchema = productsQuerySchema.extend({
  q: z.string().default(""),
});

export const loginInputSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export const verifyOtpInputSchema = z.object({
  email: z.string().trim().email(),
  otp: z.string().regex(/^\d{6}$/),
});

export const refreshInputSchema = z.object({
  refreshToken: z.string().min(1),
});

export const createTaskInputSchema = z.object({
  title: z.string().trim().min(1).max(120),
  description: z.string().trim().max(2000).default(""),
  category: z.string().trim().max(60).optional(),
});

export const createNoteInputSchema = z.object({
  title: z.string().trim().min(1).max(120),
  content: z.string().trim().max(5000).default(""),
});

export type Product = z.infer<typeof productSchema>;
export type ProductsQuery = z.infer<typeof productsQuerySchema>;
export type LoginInput = z.infer<typeof loginInputSchema>;
export type CreateTaskInput = z.infer<typeof createTaskInputSchema>;
export type CreateNoteInput = z.infer<typeof createNoteInputSchema>;

export type ProductsPage = {
  products: Product[];
  total: number;
  skip: number;
  limit: number;
};

export type LoginResponse = {
  success: true;
  message: string;
  token: string;
  userId: string;
  email: string;
  refreshToken: string;
  expiresIn: number;
};

export type Task = {
  id: string;
  title: string;
  description: string;
  isCompleted: boolean;
  createdAt: string;
  updatedAt?: string;
  category?: string;
};

export type Note = {
  id: string;
  title: string;
  content: string;
  isCompleted: boolean;
  createdAt: string;
  updatedAt?: string;
};
