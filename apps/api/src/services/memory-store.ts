import fs from "node:fs";
import { fileURLToPath } from "node:url";
import {
  createNoteInputSchema,
  createTaskInputSchema,
  productCatalogSchema,
  type CreateNoteInput,
  type CreateTaskInput,
  type Note,
  type Product,
  type ProductsPage,
  type ProductsQuery,
  type Task,
} from "../lib/schemas.js";
import { newId, nowUtcIso, paginate } from "../lib/utils.js";
import type { DataStore } from "./store.js";

const defaultCatalogPath = fileURLToPath(new URL("../../data/products.json", import.meta.url));

export function loadProductCatalog(filePath = defaultCatalogPath): Product[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return productCatalogSchema.parse(raw);
}

function toPage(products: Product[], query: ProductsQuery): ProductsPage {
  const page = paginate(products, query.skip, query.limit);
  return {
    products: page.items,
    total: products.length,
    skip: page.skip,
    limit: page.limit,
  };
}

export class MemoryStore implements DataStore {
  private readonly products: Product[];
  private tasks = new Map<string, Task>();
  private notes = new Map<string, Note>();

  constructor(products: Product[] = loadProductCatalog()) {
    this.products = [...products].sort((a, b) => a.id - b.id);
  }

  kind(): "memory" {
    return "memory";
  }

  async listProducts(query: ProductsQuery): Promise<ProductsPage> {
    return toPage(this.products, query);
  }

  async getProduct(id: number): Promise<Product | null> {
    return this.products.find((product) => product.id === id) ?? null;
  }

  async listProductsByCategory(category: string, query: ProductsQuery): Promise<ProductsPage> {
    const normalized = category.trim().toLowerCase();
    return toPage(
      this.products.filter((product) => product.category.toLowerCase() === normalized),
      query,
    );
  }

  async searchProducts(text: string, query: ProductsQuery): Promise<ProductsPage> {
    const q = text.trim().toLowerCase();
    if (!q) {
      return toPage(this.products, query);
    }
    const matches = this.products.filter((product) =>
      [product.title, product.description, product.category, product.brand ?? "", product.tags.join(" ")]
        .join(" ")
        .toLowerCase()
        .includes(q),
    );
    return toPage(matches, query);
  }

  async listTasks(): Promise<Task[]> {
    return [...this.tasks.values()].reverse();
  }

  async createTask(input: CreateTaskInput): Promise<Task> {
    const parsed = createTaskInputSchema.parse(input);
    const task: Task = {
      id: newId(),
      title: parsed.title,
      description: parsed.description,
      isCompleted: false,
      createdAt: nowUtcIso(),
      category: parsed.category,
    };
    this.tasks.set(task.id, task);
    return task;
  }

  async listNotes(): Promise<Note[]> {
    return [...this.notes.values()].reverse();
  }

  async createNote(input: CreateNoteInput): Promise<Note> {
    const parsed = createNoteInputSchema.parse(input);
    const note: Note = {
      id: newId(),
      title: parsed.title,
      content: parsed.content,
      isCompleted: false,
      createdAt: nowUtcIso(),
    };
    this.notes.set(note.id, note);
    return note;
  }
}
