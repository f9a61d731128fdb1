/**
 * Catalog search: hard filters first, then tiered scoring
 *
 * Scoring tiers, highest first:
 *   exact name match      SEARCH_DEFAULTS.EXACT_NAME_SCORE
 *   ingredient match      SEARCH_DEFAULTS.INGREDIENT_SCORE
 *   partial token match   SEARCH_DEFAULTS.PARTIAL_SCORE x fraction of query tokens found
 * Ties go to the cheaper product, then the lower identifier.
 */

import { SEARCH_DEFAULTS, STOP_WORDS } from '../config/defaults.js';
import { normalizeText, tokenize } from '../domain/ids.js';
import type { ProductRecord, SearchFilters, SearchHit } from '../domain/types.js';
import type { ProductCatalog } from '../catalog/catalog.js';
import { roundTo } from '../utils/math.js';

export function queryTokens(query_text: string): string[] {
  const tokens = tokenize(query_text).filter(
    (t) => t.length >= SEARCH_DEFAULTS.MIN_TOKEN_LENGTH && !STOP_WORDS.has(t)
  );
  return [...new Set(tokens)];
}

export function passesFilters(product: ProductRecord, filters: SearchFilters): boolean {
  if (filters.category !== undefined && product.category !== filters.category) return false;
  if (filters.max_price !== undefined && product.price > filters.max_price) return false;
  if (filters.min_price !== undefined && product.price < filters.min_price) return false;
  if (
    filters.prescription_required !== undefined &&
    product.prescription_required !== filters.prescription_required
  ) {
    return false;
  }
  return true;
}

/**
 * Score one product against a normalized query. Zero means no match.
 */
export function scoreProduct(product: ProductRecord, normalized_query: string, tokens: string[]): number {
  const name = normalizeText(product.name);
  if (name === normalized_query || (tokens.length > 0 && tokens.join(' ') === name)) {
    return SEARCH_DEFAULTS.EXACT_NAME_SCORE;
  }

  const ingredients = product.active_ingredients.map(normalizeText);
  if (ingredients.some((i) => i === normalized_query || (tokens.length > 0 && tokens.every((t) => i.includes(t))))) {
    return SEARCH_DEFAULTS.INGREDIENT_SCORE;
  }

  if (tokens.length === 0) return 0;

  const haystack = [
    product.name,
    product.category,
    ...product.active_ingredients,
    ...product.brand_names,
    ...product.indications,
  ]
    .map(normalizeText)
    .join(' ');

  const matched = tokens.filter((t) => haystack.includes(t)).length;
  if (matched === 0) return 0;

  return roundTo(SEARCH_DEFAULTS.PARTIAL_SCORE * (matched / tokens.length), 4);
}

export function compareHits(a: SearchHit, b: SearchHit): number {
  return (
    b.score - a.score ||
    a.product.price - b.product.price ||
    (a.product.id < b.product.id ? -1 : a.product.id > b.product.id ? 1 : 0)
  );
}

export class SearchEngine {
  constructor(private readonly catalog: ProductCatalog) {}

  search(query_text: string, filters: SearchFilters = {}, limit: number = SEARCH_DEFAULTS.MAX_RESULTS): SearchHit[] {
    const normalized_query = normalizeText(query_text);
    if (!normalized_query) return [];

    const tokens = queryTokens(query_text);
    const hits: SearchHit[] = [];

    for (const product of this.catalog.all()) {
      if (!passesFilters(product, filters)) continue;
      const score = scoreProduct(product, normalized_query, tokens);
      if (score > 0) {
        hits.push({ product, score });
      }
    }

    return hits.sort(compareHits).slice(0, limit);
  }

  /**
   * Other products in the same category, cheapest first.
   */
  alternatives(product_ref: string, filters: Omit<SearchFilters, 'category'> = {}): SearchHit[] {
    const original = this.catalog.resolve(product_ref);

    return this.catalog
      .all()
      .filter(
        (p) =>
          p.id !== original.id &&
          p.category === original.category &&
          passesFilters(p, filters)
      )
      .map((product) => ({ product, score: SEARCH_DEFAULTS.PARTIAL_SCORE }))
      .sort(compareHits);
  }
}
