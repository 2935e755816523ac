import { describe, expect, it } from 'vitest';
import { normalizeHeader } from '../core/constants.js';
import { SchemaError } from '../core/errors.js';
import { resolveHeader } from './header.js';

const IDENTITY = [
  'Année',
  'Nom INSEE région',
  'Code INSEE région',
  'Géo-shape région',
  'Géo-point région',
];

describe('normalizeHeader', () => {
  it('strips accents, lowercases and collapses whitespace', () => {
    expect(normalizeHeader('  Nom INSEE   région ')).toBe('nom insee region');
    expect(normalizeHeader('Production éolienne renouvelable (GWh)')).toBe(
      'production eolienne renouvelable (gwh)'
    );
  });
});

describe('resolveHeader', () => {
  it('maps identity and production columns and lists the rest as ignored', () => {
    const header = resolveHeader([
      ...IDENTITY,
      'Production solaire renouvelable (GWh)',
      'Production hydraulique renouvelable (GWh)',
      'Commentaire',
    ]);

    expect(header.identity).toEqual({ year: 0, regionName: 1, regionCode: 2, geoShape: 3, geoPoint: 4 });
    // canonical energy order, not source order
    expect([...header.energy]).toEqual([
      ['hydraulic', 6],
      ['solar', 5],
    ]);
    expect(header.ignored).toEqual(['Commentaire']);
  });

  it('accepts English snake_case headers', () => {
    const header = resolveHeader(['year', 'region_name', 'region_code', 'geo_shape', 'geo_point', 'wind_gwh']);

    expect([...header.energy]).toEqual([['wind', 5]]);
    expect(header.ignored).toEqual([]);
  });

  it('reports every missing identity column', () => {
    let caught: unknown;
    try {
      resolveHeader(['Année', 'Nom INSEE région', 'Code INSEE région', 'Production solaire renouvelable (GWh)']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught).toMatchObject({ stage: 'schema', missing: ['geoShape', 'geoPoint'] });
  });

  it('rejects a header with no production column', () => {
    expect(() => resolveHeader([...IDENTITY, 'Commentaire'])).toThrow(SchemaError);
  });

  it('rejects a duplicated column', () => {
    expect(() =>
      resolveHeader([...IDENTITY, 'Production solaire renouvelable (GWh)', 'solar_gwh'])
    ).toThrow('Column "solar_gwh" duplicates solar');
  });
});
