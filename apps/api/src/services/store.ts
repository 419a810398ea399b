import type {
  CreateNoteInput,
  CreateTaskInput,
  Note,
  Product,
  ProductsPage,
  ProductsQuery,
  Task,
} from "../lib/schemas.js";

export interface DataStore {
  kind(): "memory";
  listProducts(query: ProductsQuery): Promise<ProductsPage>;
  getProduct(id: number): Promise<Product | null>;
  listProductsByCategory(category: string, query: ProductsQuery): Promise<ProductsPage>;
  searchProducts(text: string, query: ProductsQuery): Promise<ProductsPage>;

  listTasks(): Promise<Task[]>;
  createTask(input: CreateTaskInput): Promise<Task>;

  listNotes(): Promise<Note[]>;
  createNote(input: CreateNoteInput): Promise<Note>;

  close?(): Promise<void>;
}
