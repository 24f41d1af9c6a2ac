/**
 * Product Catalog
 *
 * In-memory store behind the sample storefront routes.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { SecurityErrors } from '../utils/errors.js';

export const ProductSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  price: z.number().nonnegative(),
  category: z.string().min(1),
});

export type Product = z.infer<typeof ProductSchema>;

export class ProductCatalog {
  private readonly products = new Map<number, Product>();

  constructor(products: Product[] = []) {
    for (const product of products) {
      this.products.set(product.id, { ...product });
    }
  }

  list(): Product[] {
    return [...this.products.values()].sort((a, b) => a.id - b.id).map((p) => ({ ...p }));
  }

  get(id: number): Product | undefined {
    const product = this.products.get(id);
    return product ? { ...product } : undefined;
  }

  /**
   * @returns true if the product existed
   */
  remove(id: number): boolean {
    return this.products.delete(id);
  }
}

/**
 * Read and validate a products file (a JSON array of products).
 *
 * @throws {AuthSecurityError} CONFIGURATION_ERROR if the file cannot be read or an entry is invalid
 */
export async function loadProducts(path: string): Promise<Product[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw SecurityErrors.CONFIGURATION_ERROR(
      `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = z.array(ProductSchema).safeParse(raw);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw SecurityErrors.CONFIGURATION_ERROR(`invalid products in ${path}: ${summary}`);
  }

  return parsed.data;
}
