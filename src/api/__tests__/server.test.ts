/**
 * HTTP tests for the JSON API, served in process on an ephemeral port
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { once } from 'events';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { createApp, createServerDeps, statusForError } from '../server.js';
import { QueryLog } from '../../store/queryLog.js';
import { DISCLAIMER } from '../../config/defaults.js';
import { AmbiguousRuleError, NotFoundError } from '../../domain/errors.js';
import { createMockLoadedDataset } from '../../__tests__/fixtures.js';

// ============================================================================
// Test Server
// ============================================================================

let server: Server;
let base_url: string;
const query_log = new QueryLog(':memory:');

beforeAll(async () => {
  const app = createApp(createServerDeps(createMockLoadedDataset(), { render_client: null, query_log }));
  server = app.listen(0);
  await once(server, 'listening');
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
  base_url = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.close();
  server.closeAllConnections();
  await once(server, 'close');
  query_log.close();
});

async function getJson(path: string): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${base_url}${path}`);
  const body: unknown = await res.json();
  return { status: res.status, body };
}

async function postJson(path: string, payload: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${base_url}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  });
  const body: unknown = await res.json();
  return { status: res.status, body };
}

// ============================================================================
// Tests
// ============================================================================

describe('GET /health', () => {
  it('reports the catalog size', async () => {
    const { status, body } = await getJson('/health');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', products: 6 });
  });
});

describe('POST /api/query', () => {
  it('returns the aggregated response and logs it', async () => {
    const { status, body } = await postJson('/api/query', {
      query: 'check interaction between aspirin and warfarin',
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      query: 'check interaction between aspirin and warfarin',
      drugs: ['aspirin', 'warfarin'],
      disclaimer: DISCLAIMER,
      results: [{ specialist: 'safety', status: 'ok' }],
    });
    expect(query_log.recent(1)[0]).toMatchObject({
      query_text: 'check interaction between aspirin and warfarin',
      specialists: 'safety',
      rendered: 0,
    });
  });

  it('passes the patient context through', async () => {
    const { body } = await postJson('/api/query', {
      query: 'how much acetaminophen should I take',
      context: { age: 30, weight: 70 },
    });
    expect(body).toMatchObject({ results: [{ specialist: 'dosage', status: 'ok', payload: { dose: 700 } }] });
  });

  it('falls back to the plain summary when rendering without a model', async () => {
    const { body } = await postJson('/api/query', { query: 'is zestril covered on my gold plan', render: true });
    expect(body).toMatchObject({ narrative: 'Zestril is 60% covered on the gold plan.' });
  });

  it('rejects a malformed body', async () => {
    const { status, body } = await postJson('/api/query', { query: 42 });
    expect(status).toBe(400);
    expect(body).toMatchObject({ error: 'Invalid request', code: 'INVALID_INPUT' });
  });

  it('passes reported conditions to the safety check', async () => {
    const { body } = await postJson('/api/query', {
      query: 'can I take warfarin',
      context: { conditions: ['pregnancy'] },
    });
    expect(body).toMatchObject({
      results: [
        {
          specialist: 'safety',
          status: 'ok',
          caveats: ['Warfarin is contraindicated with pregnancy (reported condition: pregnancy).'],
        },
      ],
    });
  });

  it('rejects a body that is not valid JSON', async () => {
    const res = await fetch(`${base_url}/api/query`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"query": "aspirin",',
    });
    const body: unknown = await res.json();
    expect(res.status).toBe(400);
    expect(body).toEqual({ error: 'Malformed JSON body', code: 'INVALID_INPUT' });
  });

  it('rejects unknown context fields', async () => {
    const { status } = await postJson('/api/query', { query: 'aspirin', context: { height: 180 } });
    expect(status).toBe(400);
  });
});

describe('product routes', () => {
  it('searches with filters', async () => {
    const { status, body } = await getJson('/api/products?q=pain&max_price=6.5');
    expect(status).toBe(200);
    expect(body).toMatchObject({
      query: 'pain',
      count: 2,
      hits: [{ product: { id: 'aspirin' } }, { product: { id: 'acetaminophen' } }],
    });
  });

  it('returns no hits for a blank query', async () => {
    const { body } = await getJson('/api/products');
    expect(body).toEqual({ query: '', count: 0, hits: [] });
  });

  it('resolves a product by brand', async () => {
    const { status, body } = await getJson('/api/products/Coumadin');
    expect(status).toBe(200);
    expect(body).toMatchObject({ id: 'warfarin', name: 'Warfarin' });
  });

  it('returns 404 for an unknown product', async () => {
    const { status, body } = await getJson('/api/products/mystery');
    expect(status).toBe(404);
    expect(body).toEqual({ error: 'No product matches "mystery"', code: 'NOT_FOUND' });
  });

  it('lists alternatives in the same category', async () => {
    const { body } = await getJson('/api/products/advil/alternatives');
    expect(body).toMatchObject({
      product_id: 'ibuprofen',
      count: 2,
      hits: [{ product: { id: 'aspirin' } }, { product: { id: 'acetaminophen' } }],
    });
  });
});

describe('POST /api/interactions', () => {
  it('returns the findings', async () => {
    const { status, body } = await postJson('/api/interactions', { drugs: ['warfarin', 'aspirin'] });
    expect(status).toBe(200);
    expect(body).toEqual({
      findings: [
        { drugs: ['aspirin', 'warfarin'], severity: 'severe', description: 'Bleeding risk.', on_record: true },
      ],
    });
  });

  it('rejects a single drug', async () => {
    const { status, body } = await postJson('/api/interactions', { drugs: ['aspirin'] });
    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 'INVALID_INPUT' });
  });
});

describe('GET /api/dosage', () => {
  it('calculates a dose', async () => {
    const { status, body } = await getJson('/api/dosage?drug=acetaminophen&age=30&weight=70');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', drug_id: 'acetaminophen', dose: 700, unit: 'mg' });
  });

  it('rejects a non-positive weight', async () => {
    const { status, body } = await getJson('/api/dosage?drug=acetaminophen&age=30&weight=0');
    expect(status).toBe(400);
    expect(body).toEqual({
      error: 'Patient weight must be a number greater than 0, got: 0',
      code: 'INVALID_INPUT',
    });
  });
});

describe('GET /api/dosage/check', () => {
  it('reports a proposal above the daily maximum', async () => {
    const { status, body } = await getJson('/api/dosage/check?drug=advil&age=40&weight=80&proposed=1600');
    expect(status).toBe(200);
    expect(body).toMatchObject({
      status: 'ok',
      drug_id: 'ibuprofen',
      proposed_dose: 1600,
      max_daily_dose: 1200,
      within_limit: false,
    });
  });

  it('requires the proposed amount', async () => {
    const { status } = await getJson('/api/dosage/check?drug=advil&age=40&weight=80');
    expect(status).toBe(400);
  });
});

describe('POST /api/safety-profile', () => {
  it('flags conditions and allergies', async () => {
    const { status, body } = await postJson('/api/safety-profile', {
      drug: 'Coumadin',
      conditions: ['pregnancy'],
    });
    expect(status).toBe(200);
    expect(body).toMatchObject({
      drug_id: 'warfarin',
      alerts: [{ kind: 'contraindication', reported: 'pregnancy', matched: 'pregnancy' }],
    });
  });

  it('returns 404 for an unknown drug', async () => {
    const { status } = await postJson('/api/safety-profile', { drug: 'mystery' });
    expect(status).toBe(404);
  });
});

describe('GET /api/coverage/:productId/:tier', () => {
  it('returns coverage with the generic suggestion', async () => {
    const { status, body } = await getJson('/api/coverage/zestril/gold');
    expect(status).toBe(200);
    expect(body).toMatchObject({
      coverage_pct: 60,
      estimated_out_of_pocket: 15.2,
      generic_suggestion: { coverage_pct: 90 },
    });
  });

  it('rejects an unknown tier', async () => {
    const { status } = await getJson('/api/coverage/zestril/diamond');
    expect(status).toBe(400);
  });

  it('returns 404 when the tier has no record', async () => {
    const { status, body } = await getJson('/api/coverage/lisinopril/bronze');
    expect(status).toBe(404);
    expect(body).toEqual({ error: 'No coverage record for Lisinopril on the bronze plan', code: 'NOT_FOUND' });
  });
});

describe('unknown routes', () => {
  it('returns 404', async () => {
    const { status, body } = await getJson('/api/nothing');
    expect(status).toBe(404);
    expect(body).toEqual({ error: 'Route not found', code: 'NOT_FOUND' });
  });
});

describe('statusForError', () => {
  it('maps error codes to HTTP statuses', () => {
    expect(statusForError(new AmbiguousRuleError('two rules', 2))).toBe(422);
    expect(statusForError(new NotFoundError('missing'))).toBe(404);
    expect(statusForError(new Error('boom'))).toBe(500);
  });

  it('keeps client-error statuses from middleware', () => {
    expect(statusForError(Object.assign(new SyntaxError('Unexpected end of JSON input'), { status: 400 }))).toBe(400);
    expect(statusForError({ statusCode: 413 })).toBe(413);
    expect(statusForError({ status: 503 })).toBe(500);
  });
});
