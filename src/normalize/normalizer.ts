import type { NormalizedRecord, RawRecord, RawTable } from '../types.js';
import { guardFormula, repairEncoding, slugify, stripHighlightTags } from '../utils/text.js';

const REPAIRED_FIELDS = ['name', 'city', 'description', 'profile', 'jobResponsabilities', 'salary'] as const;

const DESCRIPTION_SECTIONS = [
  { field: 'profile', label: 'PROFILE' },
  { field: 'jobResponsabilities', label: 'RESPONSIBILITIES' },
  { field: 'description', label: 'DESCRIPTION' },
] as const;

/** Turns any upstream value into the text written to a table cell. */
export function toCellText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => toCellText(item)).join(', ');
  }
  try {
    return JSON.stringify(value) ?? '';
  } catch {
    return String(value);
  }
}

function presentText(record: RawRecord, field: string): string | undefined {
  const text = toCellText(record[field]).trim();
  return text === '' ? undefined : text;
}

function repairFields(record: RawRecord): RawRecord {
  const repaired: RawRecord = { ...record };
  for (const field of REPAIRED_FIELDS) {
    const value = repaired[field];
    if (typeof value === 'string') {
      repaired[field] = repairEncoding(value);
    }
  }
  return repaired;
}

function mergeDescription(record: RawRecord): string {
  const hasSubSections = presentText(record, 'profile') !== undefined || presentText(record, 'jobResponsabilities') !== undefined;
  if (!hasSubSections) {
    return presentText(record, 'description') ?? '';
  }

  return DESCRIPTION_SECTIONS.flatMap(({ field, label }) => {
    const text = presentText(record, field);
    return text === undefined ? [] : [`${label}:\n${text}`];
  }).join('\n\n');
}

export function normalizeRecord(raw: RawRecord): NormalizedRecord {
  const record = repairFields(raw);
  const salaryRange = toCellText(record.salary);

  let description = guardFormula(mergeDescription(record));
  const slug = slugify(presentText(record, 'maison'), presentText(record, 'name'), presentText(record, 'city'));
  // Stripping can uncover a leading formula character, so the guard runs again.
  description = guardFormula(stripHighlightTags(description));

  return {
    Name: toCellText(record.name),
    Slug: slug,
    'Collection ID': '',
    'Item ID': '',
    Archived: '',
    Draft: '',
    'Created On': '',
    'Updated On': '',
    'Published On': '',
    Company: toCellText(record.maison),
    Type: toCellText(record.contract),
    Description: description,
    Location: toCellText(record.city),
    Industry: toCellText(record.functionFilter),
    Level: toCellText(record.fullTimePartTime),
    'Apply URL': toCellText(record.link),
    'Salary Range': salaryRange,
  };
}

export function normalize(table: RawTable): NormalizedRecord[] {
  return table.map((record) => normalizeRecord(record));
}
