#!/usr/bin/env tsx
/**
 * Smoke queries against the bundled dataset
 *
 * Replays canned questions through the orchestrator and checks which
 * specialist leads each answer and with what status. Catches routing
 * regressions after edits to the classifier or the dataset.
 *
 * Usage:
 *   npm run smoke
 *   npm run smoke -- --data path/to/catalog.json
 */

import dotenv from 'dotenv';
import { resolveConfig } from '../src/config/defaults.js';
import { loadDataset } from '../src/catalog/loader.js';
import { Orchestrator } from '../src/pipeline/orchestrator.js';
import { describeError } from '../src/domain/errors.js';
import type { PatientContext, SpecialistStatus, SpecialistTag } from '../src/domain/types.js';

interface SmokeCase {
  query: string;
  context?: PatientContext;
  expected_specialist: SpecialistTag;
  expected_status: SpecialistStatus;
}

interface SmokeResult {
  query: string;
  actual: string;
  status: 'PASS' | 'FAIL';
}

const SMOKE_CASES: SmokeCase[] = [
  {
    query: 'check interaction between aspirin and warfarin',
    expected_specialist: 'safety',
    expected_status: 'ok',
  },
  {
    query: 'how much acetaminophen should I take',
    context: { age: 30, weight: 70 },
    expected_specialist: 'dosage',
    expected_status: 'ok',
  },
  {
    query: 'how much acetaminophen should I take',
    context: { age: 30, weight: 150 },
    expected_specialist: 'dosage',
    expected_status: 'no_result',
  },
  {
    query: 'is zestril covered on my gold plan',
    expected_specialist: 'coverage',
    expected_status: 'ok',
  },
  {
    query: 'how much does zestril cost on the gold plan',
    context: { age: 40, weight: 80 },
    expected_specialist: 'coverage',
    expected_status: 'ok',
  },
  {
    query: 'find pain relief products',
    expected_specialist: 'search',
    expected_status: 'ok',
  },
  {
    query: 'alternatives to ibuprofen',
    expected_specialist: 'search',
    expected_status: 'ok',
  },
  {
    query: 'can I take ibuprofen',
    context: { current_medications: ['Coumadin'] },
    expected_specialist: 'safety',
    expected_status: 'ok',
  },
];

function dataPath(): string {
  const args = process.argv.slice(2);
  const flag = args.indexOf('--data');
  const value = flag === -1 ? undefined : args[flag + 1];
  return value ?? resolveConfig().catalog_path;
}

async function main(): Promise<void> {
  dotenv.config();
  const orchestrator = Orchestrator.fromDataset(await loadDataset(dataPath()));
  const results: SmokeResult[] = [];

  for (const smoke of SMOKE_CASES) {
    const response = orchestrator.handle(smoke.query, smoke.context);
    const [lead] = response.results;
    const actual = lead ? `${lead.specialist}:${lead.status}` : '(none)';
    const expected = `${smoke.expected_specialist}:${smoke.expected_status}`;
    results.push({ query: smoke.query, actual, status: actual === expected ? 'PASS' : 'FAIL' });
  }

  console.log('\n' + '='.repeat(80));
  console.log('SMOKE QUERIES');
  console.log('='.repeat(80));
  for (const result of results) {
    console.log(`  ${result.status}  ${result.query.padEnd(50)} ${result.actual}`);
  }

  const failed = results.filter((r) => r.status === 'FAIL').length;
  console.log(`\n${results.length - failed}/${results.length} passed\n`);
  process.exit(failed > 0 ? 1 : 0);
}

main().catch((error: unknown) => {
  console.error(`\nSmoke run failed: ${describeError(error)}\n`);
  process.exit(1);
});
