/**
 * Catalog Types — the restaurant menu.
 *
 * Loaded once at startup and shared read-only by every request.
 */

export interface CatalogItem {
  id: string;
  name: string;
  price: number;
  category: string;
  description?: string;
}

/** JSON shape of the menu file on disk */
export interface MenuFileItem {
  id: string;
  name: string;
  price: number;
  description?: string;
}

export interface MenuFile {
  restaurant?: { name: string; currency?: string };
  categories: Record<string, MenuFileItem[]>;
}

export interface MenuCategory {
  /** Spelling from the menu file */
  readonly name: string;
  readonly items: readonly CatalogItem[];
}

/** Response shape of the full menu */
export interface MenuView {
  restaurant?: { name: string; currency?: string };
  categories: Readonly<Record<string, readonly CatalogItem[]>>;
}

export interface CatalogSource {
  /** Human readable origin, used in errors and logs */
  readonly location: string;
  read(): string;
}
