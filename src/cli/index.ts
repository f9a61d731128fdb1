#!/usr/bin/env node

/**
 * CLI entry point for the medical product advisor
 */

import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { ZodError, z } from 'zod';
import { resolveConfig, type AppConfig } from '../config/defaults.js';
import { loadDataset } from '../catalog/loader.js';
import { PlanTierSchema } from '../catalog/schemas.js';
import { LoadError, describeError, isAdvisorError } from '../domain/errors.js';
import type { PatientContext, SearchHit } from '../domain/types.js';
import { Orchestrator } from '../pipeline/orchestrator.js';
import { exportResponse, formatPrice, formatResult, printResponse } from '../pipeline/export.js';
import { createRenderClient, renderResponse } from '../llm/render.js';
import { getCache, closeCache } from '../llm/cache.js';
import { QueryLog } from '../store/queryLog.js';
import { createLogger } from '../utils/log.js';

loadEnv();

const logger = createLogger('cli');
const program = new Command();

program
  .name('medadvisor')
  .description('Rule-based medical product advisor: search, dosage, safety and coverage')
  .version('1.0.0')
  .option('--data <path>', 'Dataset file (default: CATALOG_PATH or data/catalog.json)');

// ============================================================================
// Helpers
// ============================================================================

const optionalNumber = z.coerce.number().finite().optional();

function appConfig(): AppConfig {
  const config = resolveConfig();
  const { data } = program.opts<{ data?: string }>();
  return data ? { ...config, catalog_path: data } : config;
}

async function loadOrchestrator(config: AppConfig): Promise<Orchestrator> {
  return Orchestrator.fromDataset(await loadDataset(config.catalog_path));
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function printHits(hits: SearchHit[]): void {
  if (hits.length === 0) {
    console.log('\nNo matching products.\n');
    return;
  }
  console.log();
  hits.forEach((hit, i) => {
    const { product } = hit;
    const rx = product.prescription_required ? ' [Rx]' : '';
    console.log(
      `  ${i + 1}. ${product.name}${rx} (${product.id}) ${product.category}, ${formatPrice(product.price)}, score ${hit.score}`
    );
  });
  console.log();
}

function fail(command: string, error: unknown): never {
  if (error instanceof LoadError) {
    logger.error({ problems: error.problems }, 'Dataset failed to load');
    console.error(`\n✗ ${error.message}\n`);
  } else if (error instanceof ZodError) {
    const problems = error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
    console.error(`\n✗ Invalid options:\n  - ${problems.join('\n  - ')}\n`);
  } else if (isAdvisorError(error)) {
    console.error(`\n✗ ${error.message}\n`);
  } else {
    logger.error({ error: describeError(error), command }, 'Command failed');
    console.error(`\n✗ Unexpected error: ${describeError(error)}\n`);
  }
  process.exit(1);
}

// ============================================================================
// Ask command
// ============================================================================

const AskOptionsSchema = z.object({
  age: optionalNumber,
  weight: optionalNumber,
  plan: PlanTierSchema.optional(),
  meds: z.string().optional(),
  conditions: z.string().optional(),
  allergies: z.string().optional(),
  render: z.boolean().default(false),
  json: z.boolean().default(false),
  export: z.string().optional(),
});

program
  .command('ask')
  .description('Answer a free-text question through the orchestrator')
  .argument('<query...>', 'Question text')
  .option('--age <years>', 'Patient age in years')
  .option('--weight <kg>', 'Patient weight in kg')
  .option('--plan <tier>', 'Insurance plan tier: bronze, silver, gold or platinum')
  .option('--meds <list>', 'Current medications, comma separated')
  .option('--conditions <list>', 'Patient conditions, comma separated')
  .option('--allergies <list>', 'Patient allergies, comma separated')
  .option('--render', 'Rewrite the answer with the language model')
  .option('--json', 'Print the structured response as JSON')
  .option('--export <file>', 'Also write the structured response to a JSON file')
  .action(async (words: string[], raw_options: unknown) => {
    let query_log: QueryLog | null = null;
    try {
      const options = AskOptionsSchema.parse(raw_options);
      const config = appConfig();
      const orchestrator = await loadOrchestrator(config);

      const context: PatientContext = {
        age: options.age,
        weight: options.weight,
        plan_tier: options.plan,
        current_medications: splitList(options.meds),
        conditions: splitList(options.conditions),
        allergies: splitList(options.allergies),
      };

      let response = orchestrator.handle(words.join(' '), context);
      if (options.render) {
        if (!config.openai_api_key) {
          console.error('\nOPENAI_API_KEY is not set; showing the plain summary instead.');
        }
        const outcome = await renderResponse(response, createRenderClient(config));
        response = outcome.response;
      }

      query_log = new QueryLog(config.query_log_path);
      query_log.record(response);

      if (options.export) {
        await exportResponse(response, options.export);
      }

      if (options.json) {
        console.log(JSON.stringify(response, null, 2));
      } else {
        printResponse(response);
      }
    } catch (error) {
      fail('ask', error);
    } finally {
      query_log?.close();
      closeCache();
    }
  });

// ============================================================================
// Specialist commands
// ============================================================================

const SearchOptionsSchema = z.object({
  category: z.string().min(1).optional(),
  maxPrice: optionalNumber,
  minPrice: optionalNumber,
  rx: z.boolean().optional(),
  otc: z.boolean().optional(),
  limit: z.coerce.number().int().positive().default(20),
});

program
  .command('search')
  .description('Search the catalog')
  .argument('<query...>', 'Search text')
  .option('--category <category>', 'Only this category')
  .option('--max-price <amount>', 'Maximum list price')
  .option('--min-price <amount>', 'Minimum list price')
  .option('--rx', 'Only prescription products')
  .option('--otc', 'Only over-the-counter products')
  .option('--limit <n>', 'Maximum results', '20')
  .action(async (words: string[], raw_options: unknown) => {
    try {
      const options = SearchOptionsSchema.parse(raw_options);
      const orchestrator = await loadOrchestrator(appConfig());
      const hits = orchestrator.components().search.search(
        words.join(' '),
        {
          category: options.category,
          max_price: options.maxPrice,
          min_price: options.minPrice,
          prescription_required: options.rx ? true : options.otc ? false : undefined,
        },
        options.limit
      );
      printHits(hits);
    } catch (error) {
      fail('search', error);
    }
  });

program
  .command('product')
  .description('Show one product by id, name, brand or ingredient')
  .argument('<ref>', 'Product reference')
  .action(async (ref: string) => {
    try {
      const { catalog, dosage, coverage } = (await loadOrchestrator(appConfig())).components();
      const product = catalog.resolve(ref);

      console.log(`\n${product.name} (${product.id})`);
      console.log(`  Category: ${product.category}`);
      console.log(`  Active ingredients: ${product.active_ingredients.join(', ')}`);
      if (product.brand_names.length > 0) {
        console.log(`  Brands: ${product.brand_names.join(', ')}`);
      }
      console.log(`  Strengths: ${product.strengths.join(', ')}`);
      console.log(`  Price: ${formatPrice(product.price)}`);
      console.log(`  Manufacturer: ${product.manufacturer}`);
      console.log(`  Prescription required: ${product.prescription_required ? 'yes' : 'no'}`);
      if (product.indications.length > 0) {
        console.log(`  Indications: ${product.indications.join('; ')}`);
      }

      const tiers = coverage.tiersFor(product.id);
      console.log(`  Coverage on record: ${tiers.length > 0 ? tiers.join(', ') : 'none'}`);

      const rules = dosage.rulesFor(product.id);
      if (rules.length > 0) {
        console.log('  Dosage bands:');
        for (const rule of rules) {
          const amount =
            rule.dose.basis === 'per_kg' ? `${rule.dose.amount} ${rule.unit}/kg` : `${rule.dose.amount} ${rule.unit}`;
          console.log(
            `    age ${rule.age_min}-${rule.age_max}, ${rule.weight_min}-${rule.weight_max} kg: ` +
              `${amount}, maximum ${rule.max_daily_dose} ${rule.unit} per day`
          );
        }
      }

      if (product.description) {
        console.log(`\n  ${product.description}`);
      }
      console.log();
    } catch (error) {
      fail('product', error);
    }
  });

const AlternativesOptionsSchema = z.object({
  maxPrice: optionalNumber,
});

program
  .command('alternatives')
  .description('List other products in the same category')
  .argument('<ref>', 'Product reference')
  .option('--max-price <amount>', 'Maximum list price')
  .action(async (ref: string, raw_options: unknown) => {
    try {
      const options = AlternativesOptionsSchema.parse(raw_options);
      const orchestrator = await loadOrchestrator(appConfig());
      printHits(orchestrator.components().search.alternatives(ref, { max_price: options.maxPrice }));
    } catch (error) {
      fail('alternatives', error);
    }
  });

const DoseOptionsSchema = z.object({
  age: z.coerce.number().finite(),
  weight: z.coerce.number().finite(),
});

program
  .command('dose')
  .description('Calculate an informational dose from age and weight')
  .argument('<drug>', 'Drug reference')
  .requiredOption('--age <years>', 'Patient age in years')
  .requiredOption('--weight <kg>', 'Patient weight in kg')
  .action(async (drug: string, raw_options: unknown) => {
    try {
      const options = DoseOptionsSchema.parse(raw_options);
      const orchestrator = await loadOrchestrator(appConfig());
      const outcome = orchestrator.components().dosage.calculate(drug, options.age, options.weight);

      console.log();
      if (outcome.status === 'ok') {
        const frequency = outcome.rule.frequency ? ` (${outcome.rule.frequency})` : '';
        console.log(`  ${outcome.drug_name}: ${outcome.dose} ${outcome.unit}${frequency}`);
      } else {
        console.log(`  ${outcome.drug_name}: no applicable rule`);
      }
      for (const caveat of outcome.caveats) {
        console.log(`  ! ${caveat}`);
      }
      console.log();
    } catch (error) {
      fail('dose', error);
    }
  });

const CheckDoseOptionsSchema = DoseOptionsSchema.extend({
  proposed: z.coerce.number().finite(),
});

program
  .command('check-dose')
  .description('Check a proposed daily amount against the maximum daily dose')
  .argument('<drug>', 'Drug reference')
  .requiredOption('--age <years>', 'Patient age in years')
  .requiredOption('--weight <kg>', 'Patient weight in kg')
  .requiredOption('--proposed <amount>', 'Proposed total per day, in the rule unit')
  .action(async (drug: string, raw_options: unknown) => {
    try {
      const options = CheckDoseOptionsSchema.parse(raw_options);
      const orchestrator = await loadOrchestrator(appConfig());
      const outcome = orchestrator
        .components()
        .dosage.checkDose(drug, options.age, options.weight, options.proposed);

      console.log();
      if (outcome.status === 'ok') {
        const verdict = outcome.within_limit ? 'within limit' : 'EXCEEDS LIMIT';
        console.log(
          `  ${outcome.drug_name}: ${outcome.proposed_dose} ${outcome.unit} per day, ${verdict} ` +
            `(maximum ${outcome.max_daily_dose} ${outcome.unit}, calculated dose ${outcome.recommended_dose} ${outcome.unit})`
        );
      } else {
        console.log(`  ${outcome.drug_name}: no applicable rule`);
      }
      for (const caveat of outcome.caveats) {
        console.log(`  ! ${caveat}`);
      }
      console.log();
    } catch (error) {
      fail('check-dose', error);
    }
  });

const ProfileOptionsSchema = z.object({
  conditions: z.string().optional(),
  allergies: z.string().optional(),
});

program
  .command('profile')
  .description('Show contraindications and warnings, flagging reported conditions and allergies')
  .argument('<drug>', 'Drug reference')
  .option('--conditions <list>', 'Patient conditions, comma separated')
  .option('--allergies <list>', 'Patient allergies, comma separated')
  .action(async (drug: string, raw_options: unknown) => {
    try {
      const options = ProfileOptionsSchema.parse(raw_options);
      const orchestrator = await loadOrchestrator(appConfig());
      const profile = orchestrator.components().interactions.profile(drug, {
        conditions: splitList(options.conditions),
        allergies: splitList(options.allergies),
      });

      console.log();
      for (const line of formatResult({
        specialist: 'safety',
        status: 'ok',
        payload: { findings: [], profiles: [profile] },
        confidence: 1,
        caveats: [],
      }).slice(1)) {
        console.log(line);
      }
      console.log();
    } catch (error) {
      fail('profile', error);
    }
  });

program
  .command('interactions')
  .description('Check every pair of the given drugs for known interactions')
  .argument('<drugs...>', 'Two or more drug references')
  .action(async (drugs: string[]) => {
    try {
      const orchestrator = await loadOrchestrator(appConfig());
      const findings = orchestrator.components().interactions.check(drugs);

      console.log();
      for (const line of formatResult({
        specialist: 'safety',
        status: 'ok',
        payload: { findings, profiles: [] },
        confidence: 1,
        caveats: [],
      }).slice(1)) {
        console.log(line);
      }
      console.log();
    } catch (error) {
      fail('interactions', error);
    }
  });

const CoverageOptionsSchema = z.object({
  plan: PlanTierSchema,
});

program
  .command('coverage')
  .description('Look up insurance coverage for a product')
  .argument('<product>', 'Product reference')
  .requiredOption('--plan <tier>', 'Insurance plan tier: bronze, silver, gold or platinum')
  .action(async (product: string, raw_options: unknown) => {
    try {
      const options = CoverageOptionsSchema.parse(raw_options);
      const orchestrator = await loadOrchestrator(appConfig());
      const result = orchestrator.components().coverage.lookup(product, options.plan);

      console.log();
      for (const line of formatResult({
        specialist: 'coverage',
        status: 'ok',
        payload: result,
        confidence: 1,
        caveats: result.prior_authorization ? ['Prior authorization may be required by the plan.'] : [],
      }).slice(1)) {
        console.log(line);
      }
      console.log();
    } catch (error) {
      fail('coverage', error);
    }
  });

// ============================================================================
// Maintenance commands
// ============================================================================

program
  .command('validate-data')
  .description('Validate the dataset file and report warnings')
  .action(async () => {
    try {
      const data = await loadDataset(appConfig().catalog_path);
      console.log(`\n✓ Dataset is valid: ${data.catalog.all().length} products`);
      console.log(`  Dosage rules: ${data.dosage_rules.length}`);
      console.log(`  Interactions: ${data.interactions.length}`);
      console.log(`  Coverage records: ${data.coverage.length}`);
      if (data.warnings.length > 0) {
        console.log('\nWarnings:');
        for (const warning of data.warnings) {
          console.log(`  - ${warning}`);
        }
      }
      console.log();
    } catch (error) {
      fail('validate-data', error);
    }
  });

const HistoryOptionsSchema = z.object({
  limit: z.coerce.number().int().positive().default(20),
});

program
  .command('history')
  .description('Show recent questions from the query log')
  .option('--limit <n>', 'Number of entries', '20')
  .action((raw_options: unknown) => {
    let query_log: QueryLog | null = null;
    try {
      const options = HistoryOptionsSchema.parse(raw_options);
      query_log = new QueryLog(appConfig().query_log_path);
      const entries = query_log.recent(options.limit);
      const stats = query_log.stats();

      console.log(`\nQuery log: ${stats.total_queries} queries, ${stats.errors} specialist errors`);
      for (const [specialist, count] of Object.entries(stats.by_specialist)) {
        console.log(`  ${specialist}: ${count}`);
      }
      console.log();
      for (const entry of entries) {
        console.log(`  ${entry.created_at}  ${entry.query_text}`);
        console.log(`    ${entry.specialists} -> ${entry.statuses}`);
      }
      console.log();
    } catch (error) {
      fail('history', error);
    } finally {
      query_log?.close();
    }
  });

// Cache stats command
program
  .command('cache-stats')
  .description('Show LLM cache statistics')
  .action(() => {
    try {
      const cache = getCache(appConfig().cache_db_path);
      const stats = cache.stats();

      console.log('\nLLM Cache Statistics:');
      console.log(`  Total entries: ${stats.total_entries}`);
      console.log(`  Total hits: ${stats.total_hits}`);
      console.log('\nBy model:');
      for (const [model, count] of Object.entries(stats.by_model)) {
        console.log(`  ${model}: ${count}`);
      }
      console.log();
    } catch (error) {
      fail('cache-stats', error);
    } finally {
      closeCache();
    }
  });

// Cache clear command
program
  .command('cache-clear')
  .description('Clear the LLM cache')
  .action(() => {
    try {
      const removed = getCache(appConfig().cache_db_path).clear();
      console.log(`\n✓ Cache cleared (${removed} entries)\n`);
    } catch (error) {
      fail('cache-clear', error);
    } finally {
      closeCache();
    }
  });

// Parse command line arguments
program.parseAsync().catch((error: unknown) => fail('medadvisor', error));
