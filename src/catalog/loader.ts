/**
 * Dataset loading
 *
 * Parses the dataset, checks referential integrity, and builds the frozen
 * catalog and rule tables handed to each specialist. Any violation raises a
 * LoadError, which stops the process before a request is served.
 */

import { ZodError } from 'zod';
import { readJson } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import { LoadError, describeError } from '../domain/errors.js';
import type { CoverageRecord, Dataset, DosageRule, InteractionEntry } from '../domain/types.js';
import { ProductCatalog } from './catalog.js';
import { DatasetSchema } from './schemas.js';
import {
  aggregateValidationResults,
  throwIfInvalid,
  validateCoverage,
  validateDosageRules,
  validateInteractions,
  validateProducts,
} from './validation.js';

const logger = createLogger('loader');

export interface LoadedDataset {
  catalog: ProductCatalog;
  dosage_rules: readonly DosageRule[];
  interactions: readonly InteractionEntry[];
  coverage: readonly CoverageRecord[];
  warnings: string[];
}

export function parseDataset(raw: unknown): Dataset {
  try {
    return DatasetSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new LoadError(
        'Dataset does not match the expected shape',
        error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    throw error;
  }
}

/**
 * Build the catalog and rule tables from an already-parsed value.
 */
export function buildDataset(raw: unknown): LoadedDataset {
  const dataset = parseDataset(raw);

  const products_result = validateProducts(dataset);
  throwIfInvalid(products_result, 'products');

  const product_ids = new Set(dataset.products.map((p) => p.id));
  const result = aggregateValidationResults([
    validateDosageRules(dataset, product_ids),
    validateInteractions(dataset, product_ids),
    validateCoverage(dataset, product_ids),
  ]);
  throwIfInvalid(result, 'rule tables');

  const catalog = new ProductCatalog(dataset.products, dataset.categories);

  logger.info(
    {
      products: dataset.products.length,
      dosage_rules: dataset.dosage_rules.length,
      interactions: dataset.interactions.length,
      coverage: dataset.coverage.length,
      warnings: result.warnings.length,
    },
    'Dataset loaded'
  );

  return {
    catalog,
    dosage_rules: Object.freeze(dataset.dosage_rules.map((rule) => Object.freeze({ ...rule }))),
    interactions: Object.freeze(dataset.interactions.map((entry) => Object.freeze({ ...entry }))),
    coverage: Object.freeze(dataset.coverage.map((record) => Object.freeze({ ...record }))),
    warnings: result.warnings,
  };
}

export async function loadDataset(file_path: string): Promise<LoadedDataset> {
  logger.info({ file_path }, 'Loading dataset');

  let raw: unknown;
  try {
    raw = await readJson(file_path);
  } catch (error) {
    throw new LoadError(`Cannot read dataset at ${file_path}: ${describeError(error)}`);
  }

  return buildDataset(raw);
}
