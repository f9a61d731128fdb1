/**
 * Plain-text rendering and JSON export of aggregated responses
 */

import { writeJson } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import type {
  AggregatedResponse,
  CoverageResult,
  DosageOutcome,
  SafetyPayload,
  SearchPayload,
  SpecialistResult,
  SpecialistTag,
} from '../domain/types.js';

const logger = createLogger('export');

const SECTION_TITLES: Record<SpecialistTag, string> = {
  safety: 'SAFETY',
  dosage: 'DOSAGE',
  coverage: 'COVERAGE',
  search: 'PRODUCTS',
};

export function formatPrice(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function safetyLines(payload: SafetyPayload): string[] {
  const lines = payload.findings.map(
    (f) => `  [${f.severity}] ${f.drugs[0]} + ${f.drugs[1]}: ${f.description}`
  );
  for (const profile of payload.profiles) {
    lines.push(
      `  ${profile.drug_name} (${profile.prescription_required ? 'prescription required' : 'over the counter'})`
    );
    if (profile.contraindications.length > 0) {
      lines.push(`    Contraindications: ${profile.contraindications.join('; ')}`);
    }
    if (profile.warnings.length > 0) {
      lines.push(`    Warnings: ${profile.warnings.join('; ')}`);
    }
    for (const alert of profile.alerts) {
      lines.push(`    Alert: ${alert.description}`);
    }
  }
  return lines;
}

function dosageLines(payload: DosageOutcome): string[] {
  if (payload.status === 'no_applicable_rule') return [];
  const frequency = payload.rule.frequency ? ` (${payload.rule.frequency})` : '';
  return [
    `  ${payload.drug_name}: ${payload.dose} ${payload.unit}${frequency}, ` +
      `maximum ${payload.rule.max_daily_dose} ${payload.unit} per day`,
  ];
}

function coverageLines(payload: CoverageResult): string[] {
  const lines = [
    `  ${payload.product.name} on the ${payload.plan_tier} plan: ${payload.coverage_pct}% covered, ` +
      `estimated out of pocket ${formatPrice(payload.estimated_out_of_pocket)}`,
  ];
  if (payload.generic_suggestion) {
    const generic = payload.generic_suggestion;
    lines.push(
      `  Generic ${generic.product.name}: ${generic.coverage_pct}% covered, ` +
        `estimated out of pocket ${formatPrice(generic.estimated_out_of_pocket)}`
    );
  }
  return lines;
}

function searchLines(payload: SearchPayload): string[] {
  return payload.hits.map(
    (hit, i) =>
      `  ${i + 1}. ${hit.product.name} (${hit.product.category}, ${formatPrice(hit.product.price)}) score ${hit.score}`
  );
}

function payloadLines(result: SpecialistResult): string[] {
  switch (result.specialist) {
    case 'safety':
      return result.payload ? safetyLines(result.payload) : [];
    case 'dosage':
      return result.payload ? dosageLines(result.payload) : [];
    case 'coverage':
      return result.payload ? coverageLines(result.payload) : [];
    case 'search':
      return result.payload ? searchLines(result.payload) : [];
  }
}

export function formatResult(result: SpecialistResult): string[] {
  return [
    `${SECTION_TITLES[result.specialist]} [${result.status}]`,
    ...payloadLines(result),
    ...result.caveats.map((caveat) => `  ! ${caveat}`),
  ];
}

export function formatResponseText(response: AggregatedResponse): string {
  const lines: string[] = [`Question: ${response.query}`, ''];

  if (response.narrative) {
    lines.push(response.narrative, '');
  }

  for (const result of response.results) {
    lines.push(...formatResult(result), '');
  }

  lines.push(`Disclaimer: ${response.disclaimer}`);
  return lines.join('\n');
}

/**
 * One sentence per result, used as the narrative when no language model is
 * available.
 */
export function summarizeResponse(response: AggregatedResponse): string {
  return response.results.map(summarizeResult).join(' ');
}

function summarizeResult(result: SpecialistResult): string {
  const fallback = result.caveats[0] ?? `No ${result.specialist} result.`;
  if (result.status !== 'ok') return fallback;

  switch (result.specialist) {
    case 'safety': {
      const payload = result.payload;
      if (!payload) return fallback;
      const [top] = payload.findings;
      if (top) {
        return `Most severe interaction on record: ${top.severity} (${top.drugs[0]} + ${top.drugs[1]}).`;
      }
      return payload.profiles
        .map((p) => p.alerts[0]?.description ?? `${p.drug_name} has ${p.warnings.length} warning(s) on record.`)
        .join(' ');
    }
    case 'dosage': {
      const payload = result.payload;
      if (!payload || payload.status !== 'ok') return fallback;
      return `Informational dose for ${payload.drug_name}: ${payload.dose} ${payload.unit}.`;
    }
    case 'coverage': {
      const payload = result.payload;
      if (!payload) return fallback;
      return `${payload.product.name} is ${payload.coverage_pct}% covered on the ${payload.plan_tier} plan.`;
    }
    case 'search': {
      const payload = result.payload;
      if (!payload) return fallback;
      const [top] = payload.hits;
      return top ? `${payload.hits.length} matching product(s); top match ${top.product.name}.` : fallback;
    }
  }
}

export function printResponse(response: AggregatedResponse): void {
  console.log('\n' + '='.repeat(80));
  console.log(formatResponseText(response));
  console.log('='.repeat(80) + '\n');
}

export async function exportResponse(response: AggregatedResponse, file_path: string): Promise<void> {
  await writeJson(file_path, response);
  logger.info({ request_id: response.request_id, file_path }, 'Response exported');
}
