/**
 * In-memory product catalog
 *
 * Built once by the loader and never mutated afterwards. Records are frozen so
 * concurrent readers can share one instance.
 */

import { NotFoundError } from '../domain/errors.js';
import { normalizeText } from '../domain/ids.js';
import type { ProductRecord } from '../domain/types.js';

export interface ProductAlias {
  /** Normalized phrase (name, brand name or active ingredient) */
  phrase: string;
  product_id: string;
}

export class ProductCatalog {
  private readonly by_id = new Map<string, ProductRecord>();
  private readonly ordered: readonly ProductRecord[];
  private readonly category_list: readonly string[];
  private readonly alias_list: readonly ProductAlias[];

  constructor(products: ProductRecord[], categories: string[]) {
    const frozen = products.map((product) => freezeProduct(product));
    for (const product of frozen) {
      this.by_id.set(product.id, product);
    }
    this.ordered = Object.freeze(frozen);
    this.category_list = Object.freeze([...categories]);
    this.alias_list = Object.freeze(buildAliases(frozen));
  }

  lookup(id: string): ProductRecord {
    const product = this.by_id.get(id);
    if (!product) {
      throw new NotFoundError(`Unknown product identifier: ${id}`);
    }
    return product;
  }

  has(id: string): boolean {
    return this.by_id.has(id);
  }

  all(): readonly ProductRecord[] {
    return this.ordered;
  }

  categories(): readonly string[] {
    return this.category_list;
  }

  /**
   * Resolve a user-facing reference: identifier first, then name, brand name,
   * and finally active ingredient (first product in catalog order).
   */
  resolve(ref: string): ProductRecord {
    const direct = this.by_id.get(ref);
    if (direct) return direct;

    const needle = normalizeText(ref);
    if (needle) {
      const matchers: Array<(p: ProductRecord) => boolean> = [
        (p) => normalizeText(p.id) === needle,
        (p) => normalizeText(p.name) === needle,
        (p) => p.brand_names.some((b) => normalizeText(b) === needle),
        (p) => p.active_ingredients.some((i) => normalizeText(i) === needle),
      ];
      for (const matches of matchers) {
        const found = this.ordered.find(matches);
        if (found) return found;
      }
    }

    throw new NotFoundError(`No product matches "${ref}"`);
  }

  /**
   * Phrases that identify a product in free text, longest first. Identifiers
   * are left out: they are accepted only as explicit references by resolve().
   */
  aliases(): readonly ProductAlias[] {
    return this.alias_list;
  }
}

function freezeProduct(product: ProductRecord): ProductRecord {
  return Object.freeze({
    ...product,
    active_ingredients: Object.freeze([...product.active_ingredients]),
    strengths: Object.freeze([...product.strengths]),
    brand_names: Object.freeze([...product.brand_names]),
    indications: Object.freeze([...product.indications]),
    contraindications: Object.freeze([...product.contraindications]),
    warnings: Object.freeze([...product.warnings]),
  });
}

function buildAliases(products: readonly ProductRecord[]): ProductAlias[] {
  const seen = new Set<string>();
  const aliases: ProductAlias[] = [];

  // Names and brands claim a phrase before ingredients do
  const passes: Array<(p: ProductRecord) => readonly string[]> = [
    (p) => [p.name],
    (p) => p.brand_names,
    (p) => p.active_ingredients,
  ];

  for (const phrasesOf of passes) {
    for (const product of products) {
      for (const raw of phrasesOf(product)) {
        const phrase = normalizeText(raw);
        if (!phrase || seen.has(phrase)) continue;
        seen.add(phrase);
        aliases.push({ phrase, product_id: product.id });
      }
    }
  }

  return aliases.sort((a, b) => b.phrase.length - a.phrase.length || a.phrase.localeCompare(b.phrase));
}
