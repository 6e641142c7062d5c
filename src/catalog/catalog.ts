import { CatalogItem, MenuCategory, MenuFile, MenuView } from './types';
import { CategoryNotFoundError, ItemNotFoundError } from '../errors';

/**
 * Immutable menu. Built once from a validated menu file; every structure it
 * hands out is frozen, so concurrent reads need no locking.
 */
export class Catalog {
  private readonly view: MenuView;
  private readonly byCategory = new Map<string, MenuCategory>();
  private readonly byItemId = new Map<string, CatalogItem>();

  constructor(menu: MenuFile) {
    const categories: Record<string, readonly CatalogItem[]> = {};

    for (const [category, entries] of Object.entries(menu.categories)) {
      const items = entries.map((entry) => {
        if (this.byItemId.has(entry.id)) {
          throw new Error(`Duplicate menu item id: ${entry.id}`);
        }
        const item: CatalogItem = Object.freeze({ ...entry, category });
        this.byItemId.set(item.id, item);
        return item;
      });
      const frozen = Object.freeze(items);
      categories[category] = frozen;
      // Lookup is case-insensitive; the response keeps the file's spelling
      this.byCategory.set(category.toLowerCase(), Object.freeze({ name: category, items: frozen }));
    }

    this.view = Object.freeze({
      ...(menu.restaurant ? { restaurant: Object.freeze({ ...menu.restaurant }) } : {}),
      categories: Object.freeze(categories),
    });
  }

  getAll(): MenuView {
    return this.view;
  }

  listCategories(): string[] {
    return Object.keys(this.view.categories);
  }

  /** Category under its menu-file spelling, whatever case the caller used */
  findCategory(name: string): MenuCategory {
    const category = this.byCategory.get(name.trim().toLowerCase());
    if (!category) throw new CategoryNotFoundError(name);
    return category;
  }

  getCategory(name: string): readonly CatalogItem[] {
    return this.findCategory(name).items;
  }

  findItem(itemId: string): CatalogItem {
    const item = this.byItemId.get(itemId);
    if (!item) throw new ItemNotFoundError(itemId);
    return item;
  }

  hasItem(itemId: string): boolean {
    return this.byItemId.has(itemId);
  }

  get itemCount(): number {
    return this.byItemId.size;
  }
}
