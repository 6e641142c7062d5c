import * as fs from 'fs';
import { Catalog } from './catalog';
import { CatalogSource, MenuFile } from './types';
import { CatalogLoadError, errorMessage } from '../errors';
import { ajv, describeErrors } from '../validation';
import { logger } from '../observability/logger';

const menuItemSchema = {
  type: 'object',
  required: ['id', 'name', 'price'],
  properties: {
    id: { type: 'string', minLength: 1 },
    name: { type: 'string', minLength: 1 },
    price: { type: 'number', minimum: 0 },
    description: { type: 'string' },
  },
  additionalProperties: true,
};

const menuFileSchema = {
  type: 'object',
  required: ['categories'],
  properties: {
    restaurant: {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string' },
        currency: { type: 'string' },
      },
    },
    categories: {
      type: 'object',
      minProperties: 1,
      additionalProperties: { type: 'array', items: menuItemSchema },
    },
  },
};

const validateMenuFile = ajv.compile<MenuFile>(menuFileSchema);

export function fileCatalogSource(filePath: string): CatalogSource {
  return {
    location: filePath,
    read: () => fs.readFileSync(filePath, 'utf-8'),
  };
}

/** Parse and validate raw menu JSON into a Catalog */
export function parseCatalog(raw: string, location: string): Catalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CatalogLoadError(`Menu at ${location} is not valid JSON: ${errorMessage(err)}`);
  }

  if (!validateMenuFile(parsed)) {
    throw new CatalogLoadError(`Menu at ${location} is malformed: ${describeErrors(validateMenuFile.errors)}`);
  }

  try {
    return new Catalog(parsed);
  } catch (err) {
    throw new CatalogLoadError(`Menu at ${location} is malformed: ${errorMessage(err)}`);
  }
}

/**
 * Loads the menu exactly once. Later calls return the cached instance
 * without touching the source again.
 */
export class CatalogLoader {
  private catalog?: Catalog;

  constructor(private readonly source: CatalogSource) {}

  load(): Catalog {
    if (this.catalog) return this.catalog;

    let raw: string;
    try {
      raw = this.source.read();
    } catch (err) {
      throw new CatalogLoadError(`Unable to read menu at ${this.source.location}: ${errorMessage(err)}`);
    }

    const catalog = parseCatalog(raw, this.source.location);
    this.catalog = catalog;
    logger.info(
      { location: this.source.location, categories: catalog.listCategories().length, items: catalog.itemCount },
      'Menu loaded',
    );
    return catalog;
  }
}
