import { describe, expect, it } from 'vitest';
import { OUTPUT_COLUMNS } from '../../types.js';
import type { RawRecord } from '../../types.js';
import { normalize, normalizeRecord, toCellText } from '../normalizer.js';

const SLUG_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

describe('normalizeRecord', () => {
  it('normalizes a typical listing', () => {
    const row = normalizeRecord({
      name: 'Sales Associate',
      maison: 'Dior',
      city: 'Paris',
      contract: 'Full-Time',
      description: '- Great role',
    });

    expect(row).toEqual({
      Name: 'Sales Associate',
      Slug: 'dior-sales-associate-paris',
      'Collection ID': '',
      'Item ID': '',
      Archived: '',
      Draft: '',
      'Created On': '',
      'Updated On': '',
      'Published On': '',
      Company: 'Dior',
      Type: 'Full-Time',
      Description: "'- Great role",
      Location: 'Paris',
      Industry: '',
      Level: '',
      'Apply URL': '',
      'Salary Range': '',
    });
  });

  it('emits the columns in canonical order', () => {
    expect(Object.keys(normalizeRecord({}))).toEqual([...OUTPUT_COLUMNS]);
  });

  it('maps the remaining source fields', () => {
    const row = normalizeRecord({
      functionFilter: 'Retail',
      fullTimePartTime: 'Part-Time',
      link: 'https://careers.example.test/jobs/123',
      salary: '40,000 - 45,000 EUR',
    });

    expect(row.Industry).toBe('Retail');
    expect(row.Level).toBe('Part-Time');
    expect(row['Apply URL']).toBe('https://careers.example.test/jobs/123');
    expect(row['Salary Range']).toBe('40,000 - 45,000 EUR');
  });

  it('carries structured salaries verbatim as JSON', () => {
    const row = normalizeRecord({ salary: { min: 40000, max: 45000, currency: 'EUR' } });
    expect(row['Salary Range']).toBe('{"min":40000,"max":45000,"currency":"EUR"}');
  });

  it('leaves the salary blank when the field is missing', () => {
    expect(normalizeRecord({ name: 'Sales Associate' })['Salary Range']).toBe('');
  });

  it('repairs mis-decoded text before building the slug', () => {
    const row = normalizeRecord({ name: 'Client Advisor', maison: 'Louis Vuitton', city: 'ZÃ¼rich' });

    expect(row.Location).toBe('Zürich');
    expect(row.Slug).toBe('louis-vuitton-client-advisor-z-rich');
  });

  it('merges profile, responsibilities and description under section labels', () => {
    const row = normalizeRecord({
      description: 'Join our boutique team.',
      profile: '  Fluent in French. ',
      jobResponsabilities: '\nAdvise clients.\n',
    });

    expect(row.Description).toBe(
      'PROFILE:\nFluent in French.\n\nRESPONSIBILITIES:\nAdvise clients.\n\nDESCRIPTION:\nJoin our boutique team.',
    );
  });

  it('skips absent sections when merging', () => {
    const row = normalizeRecord({ profile: 'Five years in retail.', jobResponsabilities: '   ' });
    expect(row.Description).toBe('PROFILE:\nFive years in retail.');
  });

  it('strips highlight markers and guards what they uncover', () => {
    const row = normalizeRecord({ description: '__ais-highlight__-Sales__/ais-highlight__ lead' });
    expect(row.Description).toBe("'-Sales lead");
  });

  it('leaves the slug empty when the city is missing', () => {
    expect(normalizeRecord({ name: 'Sales Associate', maison: 'Dior' }).Slug).toBe('');
  });

  it('stringifies non-text values', () => {
    const row = normalizeRecord({ name: 42, city: ['Paris', 'Lyon'], maison: null, contract: true });

    expect(row.Name).toBe('42');
    expect(row.Location).toBe('Paris, Lyon');
    expect(row.Company).toBe('');
    expect(row.Type).toBe('true');
  });
});

describe('normalize', () => {
  const table: RawRecord[] = [
    { name: 'Sales Associate', maison: 'Dior', city: 'Paris', description: '=HYPERLINK("x")' },
    {},
    { name: '+Manager', maison: 'Céline', city: 'Milan', profile: '-', description: '+1' },
    { description: '   -  spaced' },
    { name: '--', maison: '!!', city: '??' },
    { name: 'Stylist', maison: 'Fendi', city: 'Rome', salary: { currency: 'EUR' } },
  ];

  it('produces one row per record', () => {
    expect(normalize(table)).toHaveLength(table.length);
    expect(normalize([])).toEqual([]);
  });

  it('never starts a description with a formula character', () => {
    for (const row of normalize(table)) {
      expect(row.Description).not.toMatch(/^[=+-]/);
    }
  });

  it('only produces well-formed or empty slugs', () => {
    for (const row of normalize(table)) {
      expect(row.Slug === '' || SLUG_PATTERN.test(row.Slug)).toBe(true);
    }
  });

  it('is deterministic', () => {
    expect(normalize(table)).toEqual(normalize(table));
  });
});

describe('toCellText', () => {
  it.each([
    [undefined, ''],
    [null, ''],
    ['text', 'text'],
    [3.5, '3.5'],
    [false, 'false'],
    [['a', 1, null], 'a, 1, '],
    [{ a: [1, 2] }, '{"a":[1,2]}'],
  ])('renders %j as %j', (value, expected) => {
    expect(toCellText(value)).toBe(expected);
  });

  it('falls back when a value cannot be serialized', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(toCellText(cyclic)).toBe('[object Object]');
  });
});
