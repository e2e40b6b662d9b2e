/**
 * Base Repository
 *
 * Provides JSON file-based persistence with:
 * - In-memory cache for fast reads
 * - Write-through persistence
 * - Zod schema validation on all writes
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

export interface RepositoryConfig<T> {
  /** Path to the JSON file for this collection */
  filePath: string;
  /** Zod schema for validating items */
  schema: z.ZodType<T>;
  /** Field name for the primary key */
  idField: keyof T & string;
}

export class BaseRepository<T extends Record<string, unknown>> {
  protected items: Map<string, T> = new Map();
  protected loaded = false;
  protected readonly config: RepositoryConfig<T>;

  constructor(config: RepositoryConfig<T>) {
    this.config = config;
  }

  get filePath(): string {
    return this.config.filePath;
  }

  /**
   * Initialize the repository by loading from disk
   */
  async init(): Promise<void> {
    if (this.loaded) return;

    if (existsSync(this.config.filePath)) {
      const content = await readFile(this.config.filePath, "utf-8");
      const data = z.array(this.config.schema).safeParse(JSON.parse(content));
      if (!data.success) {
        throw new Error(
          `Schema validation failed loading ${this.config.filePath}: ${data.error.message}`
        );
      }
      for (const item of data.data) {
        this.items.set(this.idOf(item), item);
      }
    }

    this.loaded = true;
  }

  /**
   * Persist current state to disk
   */
  protected async persist(): Promise<void> {
    const data = Array.from(this.items.values());
    const content = JSON.stringify(data, null, 2);

    const dir = dirname(this.config.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    await writeFile(this.config.filePath, content, "utf-8");
  }

  /**
   * Get an item by ID
   */
  async get(id: string): Promise<T | undefined> {
    await this.init();
    return this.items.get(id);
  }

  /**
   * List all items, optionally filtered
   */
  async list(filter?: (item: T) => boolean): Promise<T[]> {
    await this.init();
    const all = Array.from(this.items.values());
    return filter ? all.filter(filter) : all;
  }

  async count(filter?: (item: T) => boolean): Promise<number> {
    const items = await this.list(filter);
    return items.length;
  }

  /**
   * Internal: Set an item (used by subclasses)
   */
  protected async _set(item: T): Promise<T> {
    await this.init();
    const validated = this.config.schema.parse(item);
    this.items.set(this.idOf(validated), validated);
    await this.persist();
    return validated;
  }

  private idOf(item: T): string {
    return String(item[this.config.idField]);
  }
}

/**
 * Get the data directory path (apps/api/data), unless overridden
 */
export function getDataDir(override?: string): string {
  return override ?? fileURLToPath(new URL("../../data/", import.meta.url));
}

/**
 * Get the full path for a collection file
 */
export function getCollectionPath(collection: string, dataDir?: string): string {
  return join(getDataDir(dataDir), `${collection}.json`);
}
