import Dexie, { type Table } from "dexie";
import type { Product } from "@/features/products/domain/product";

export const DB_NAME = "sample_architecture_v1";

export type ProductRow = Product & {
  createdAt: number;
};

export class AppDb extends Dexie {
  products!: Table<ProductRow, number>;

  constructor(name = DB_NAME) {
    super(name);
    this.version(1).stores({
      products: "id, createdAt",
    });
  }
}

let singleton: AppDb | null = null;

export function getDb(): AppDb {
  if (!singleton) {
    singleton = new AppDb();
  }
  return singleton;
}

export async function resetDbForTests(): Promise<void> {
  if (singleton) {
    singleton.close();
  }
  await Dexie.delete(DB_NAME);
  singleton = null;
}
