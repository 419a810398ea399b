import { v7 as uuidv7 } from "uuid";

export function newId(): string {
  return uuidv7();
}

export function nowUtcIso(): string {
  return new Date().toISOString();
}

export function paginate<T>(items: T[], skip: number, limit: number): { items: T[]; skip: number; limit: number } {
  const start = Math.min(skip, items.length);
  const sliced = limit === 0 ? items.slice(start) : items.slice(start, start + limit);
  return { items: sliced, skip, limit: limit === 0 ? sliced.length : limit };
}
