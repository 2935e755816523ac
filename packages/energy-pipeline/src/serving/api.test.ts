/**
 * HTTP API tests
 *
 * The server runs in process on an ephemeral local port over a fixture
 * source written to a temp directory.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { EnergyPipelineContext } from '../context/pipeline-context.js';
import {
  buildRows,
  createFixtureDir,
  defaultGwh,
  toCsv,
  type FixtureDir,
} from '../__tests__/fixtures/energy-dataset.js';
import { EnergyDashboardAPI } from './api.js';

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
  meta: z.object({
    requestId: z.string(),
    latencyMs: z.number(),
    cached: z.boolean(),
    version: z.string(),
    datasetVersion: z.number().optional(),
  }),
});

type Envelope = z.infer<typeof envelopeSchema>;

describe('EnergyDashboardAPI', () => {
  let dir: FixtureDir;
  let api: EnergyDashboardAPI;
  let baseUrl: string;

  async function request(path: string, method = 'GET'): Promise<{ status: number; headers: Headers; body: Envelope }> {
    const response = await fetch(`${baseUrl}${path}`, { method });
    const body = envelopeSchema.parse(await response.json());
    return { status: response.status, headers: response.headers, body };
  }

  beforeEach(async () => {
    dir = await createFixtureDir();
    const sourcePath = await dir.write('source.csv', toCsv(buildRows()));
    const context = await EnergyPipelineContext.create({ sourcePath });
    api = new EnergyDashboardAPI(context, { port: 0, host: '127.0.0.1' });
    const address = await api.start();
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await api.stop();
    await dir.remove();
  });

  it('reports health with the dataset version', async () => {
    const { status, headers, body } = await request('/health');

    expect(status).toBe(200);
    expect(headers.get('x-request-id')).toBe(body.meta.requestId);
    expect(body.data).toEqual({
      status: 'ok',
      datasetVersion: 1,
      loadedAt: expect.any(String),
      observations: 156,
      geoFailures: 0,
    });
  });

  it('describes the loaded dataset', async () => {
    const { body } = await request('/v1/meta');

    expect(body.data).toMatchObject({
      datasetVersion: 1,
      yearRange: { min: 2019, max: 2021 },
      energyTypes: ['hydraulic', 'bioenergy', 'wind', 'solar'],
      skippedEnergyTypes: ['total_electric', 'renewable_gas', 'total_renewable'],
      ignoredColumns: [],
      cleaning: { zeroFilledCells: 0, forwardFilled: 0 },
      geoFailures: [],
    });
  });

  it('returns filtered observations', async () => {
    const { body } = await request('/v1/observations?region=53&type=wind&from=2021');

    expect(body.data).toEqual({
      count: 1,
      rows: [{ regionCode: '53', regionName: 'Bretagne', year: 2021, energyType: 'wind', valueMwh: 372000 }],
    });
  });

  it('groups totals and flags cache hits', async () => {
    const first = await request('/v1/totals?by=year&region=53&type=solar');
    const second = await request('/v1/totals?by=year&type=solar&region=53');

    expect(first.body.data).toEqual({
      by: 'year',
      totals: [
        { key: '2019', totalMwh: 470000 },
        { key: '2020', totalMwh: 471000 },
        { key: '2021', totalMwh: 472000 },
      ],
    });
    expect(first.body.meta.cached).toBe(false);
    expect(second.body.meta.cached).toBe(true);
    expect(second.headers.get('x-cache')).toBe('HIT');
  });

  it('computes year-over-year growth for one type', async () => {
    const { body } = await request('/v1/growth?type=solar&region=53');

    expect(body.data).toEqual({
      energyType: 'solar',
      regionCode: '53',
      points: [
        { year: 2020, valueMwh: 471000, previousValueMwh: 470000, growth: 1000 / 470000 },
        { year: 2021, valueMwh: 472000, previousValueMwh: 471000, growth: 1000 / 471000 },
      ],
    });
  });

  it('pivots the filtered view', async () => {
    const { body } = await request('/v1/pivot?rows=energyType&cols=year&region=53&from=2021');

    expect(body.data).toEqual({
      rowsDim: 'energyType',
      colsDim: 'year',
      rowKeys: ['bioenergy', 'hydraulic', 'solar', 'wind'],
      colKeys: [2021],
      values: [[272000], [172000], [472000], [372000]],
    });
  });

  it('summarizes the filtered view', async () => {
    const { body } = await request('/v1/summary?region=53&from=2021&to=2021&top=1');

    expect(body.data).toMatchObject({
      totalMwh: 1288000,
      regionCount: 1,
      energyTypeCount: 4,
      yearsCovered: 1,
      growthRate: null,
      productionChange: null,
      topRegions: [{ regionCode: '53', regionName: 'Bretagne', totalMwh: 1288000 }],
    });
  });

  it('serves a choropleth feature collection', async () => {
    const { body } = await request('/v1/geo?type=solar');
    const collection = z
      .object({
        type: z.literal('FeatureCollection'),
        features: z.array(z.object({ properties: z.object({ regionCode: z.string(), productionMwh: z.number() }) })),
      })
      .parse(body.data);

    expect(collection.features).toHaveLength(13);
    // latest year only: region index 0, solar, 2021 = 402 GWh
    expect(collection.features[0]?.properties).toMatchObject({ regionCode: '11', productionMwh: 402000 });
  });

  it('sums the requested years on the map', async () => {
    const { body } = await request('/v1/geo?type=solar&from=2019');
    const collection = z
      .object({ features: z.array(z.object({ properties: z.object({ regionCode: z.string(), productionMwh: z.number() }) })) })
      .parse(body.data);

    // 400 + 401 + 402 GWh
    expect(collection.features[0]?.properties).toMatchObject({ regionCode: '11', productionMwh: 1203000 });
  });

  it('rejects invalid parameters with 400', async () => {
    const noType = await request('/v1/growth?region=53');
    const unknownType = await request('/v1/observations?type=nuclear');
    const samePivot = await request('/v1/pivot?rows=year&cols=year');
    const badYear = await request('/v1/totals?from=twenty');

    expect(noType.status).toBe(400);
    expect(noType.body.error?.code).toBe('INVALID_PARAMETERS');
    expect(unknownType.status).toBe(400);
    expect(unknownType.body.error?.details).toEqual({ field: 'energyTypes' });
    expect(samePivot.status).toBe(400);
    expect(badYear.status).toBe(400);
  });

  it('answers unknown routes, versions and methods', async () => {
    expect((await request('/v1/nothing')).body.error?.code).toBe('NOT_FOUND');
    expect((await request('/v2/meta')).body.error?.code).toBe('UNSUPPORTED_VERSION');

    const wrongMethod = await request('/v1/reload');
    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.body.error?.code).toBe('METHOD_NOT_ALLOWED');
  });

  it('reloads the source on POST /v1/reload', async () => {
    await dir.write('source.csv', toCsv(buildRows({ value: (r, y, t) => 2 * defaultGwh(r, y, t) })));

    const reload = await request('/v1/reload', 'POST');
    const totals = await request('/v1/totals?by=year&region=53&type=solar&from=2021');

    expect(reload.status).toBe(200);
    expect(reload.body.data).toMatchObject({ previousVersion: 1, datasetVersion: 2 });
    expect(totals.body.meta.datasetVersion).toBe(2);
    expect(totals.body.data).toEqual({ by: 'year', totals: [{ key: '2021', totalMwh: 944000 }] });
  });

  it('keeps serving the old snapshot when a reload fails', async () => {
    await dir.write('source.csv', 'not;a;header\n');

    const reload = await request('/v1/reload', 'POST');
    const health = await request('/health');

    expect(reload.status).toBe(500);
    expect(reload.body.error).toMatchObject({
      code: 'RELOAD_FAILED',
      details: { stage: 'schema', datasetVersion: 1 },
    });
    expect(health.body.meta.datasetVersion).toBe(1);
  });
});
