export const AppUrls = {
  login: "/auth/login",
  logout: "/auth/logout",
  refreshToken: "/auth/refresh",
  verifyOtp: "/auth/verify-otp",
  products: "/products",
  productById: (id: number) => `/products/${id}`,
  productsByCategory: (category: string) => `/products/category/${encodeURIComponent(category)}`,
  searchProducts: "/products/search",
  tasks: "/tasks",
  notes: "/notes",
} as const;
