import { Catalog } from '../../src/catalog/catalog';
import { MenuFile } from '../../src/catalog/types';

export const testMenu: MenuFile = {
  restaurant: { name: 'Test Kitchen', currency: 'USD' },
  categories: {
    appetizers: [{ id: 'app1', name: 'Guacamole & Chips', price: 9.5 }],
    mains: [
      { id: 'main1', name: 'Carne Asada Plate', price: 24.99 },
      { id: 'main2', name: 'Fish Tacos', price: 17.5 },
    ],
    desserts: [{ id: 'dessert1', name: 'Churros', price: 7.5 }],
  },
};

export function buildTestCatalog(overrides: Partial<Record<string, number>> = {}): Catalog {
  const categories: MenuFile['categories'] = {};
  for (const [category, items] of Object.entries(testMenu.categories)) {
    categories[category] = items.map((item) => ({ ...item, price: overrides[item.id] ?? item.price }));
  }
  return new Catalog({ ...testMenu, categories });
}

/** Manually advanced clock for TTL tests */
export function createClock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}
