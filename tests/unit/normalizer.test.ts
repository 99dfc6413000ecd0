/**
 * Unit tests for the schema normalizer
 */

import { describe, it, expect } from 'vitest';
import {
  canonicalFieldName,
  normalizeTable,
  parseSubmissionTimestamp,
} from '../../src/lib/normalizer/index.js';
import { decodeTable } from '../../src/lib/decoder/index.js';

describe('canonicalFieldName()', () => {
  it.each([
    [' Age Group ', 'Age_Group'],
    ['Gender?', 'Gender'],
    ['Water/Sanitation', 'Water_Sanitation'],
    ['Self-reported health', 'Self_reported_health'],
    ['Food & Drink', 'Food_and_Drink'],
    ['How many hours do you sleep? ', 'How_many_hours_do_you_sleep'],
    ['start', 'start'],
    ['', ''],
  ])('rewrites %j to %j', (raw, expected) => {
    expect(canonicalFieldName(raw)).toBe(expected);
  });

  it('trims whitespace exposed by removing question marks', () => {
    expect(canonicalFieldName('foo \t?')).toBe('foo_');
  });

  it('is idempotent', () => {
    const names = [
      ' Age Group ',
      'Do you have health insurance / coverage?',
      'foo \t?',
      '?? leading',
      'R&D - Water/Drinking',
      'already_canonical',
    ];

    for (const name of names) {
      const once = canonicalFieldName(name);
      expect(canonicalFieldName(once)).toBe(once);
    }
  });
});

describe('parseSubmissionTimestamp()', () => {
  it.each([
    ['2024-03-01T08:15:00.000+03:00', '2024-03-01 08:15:00'],
    ['2024-03-01T08:15:30.25Z', '2024-03-01 08:15:30.250'],
    ['2024-03-01 08:15', '2024-03-01 08:15:00'],
    ['2024-03-01', '2024-03-01 00:00:00'],
    ['2024-02-29T23:59:59-0500', '2024-02-29 23:59:59'],
    ['3/1/2024 8:15', '2024-03-01 08:15:00'],
    ['  2024-03-01T08:15:00Z  ', '2024-03-01 08:15:00'],
  ])('keeps the clock time of %j', (input, expected) => {
    expect(parseSubmissionTimestamp(input)?.toString()).toBe(expected);
  });

  it.each(['not a date', '', '   ', '2024-02-30', '2023-02-29', '2024-13-01', '2024-03-01T24:00:00', '1709280900'])(
    'returns null for %j',
    (input) => {
      expect(parseSubmissionTimestamp(input)).toBeNull();
    },
  );

  it('does not depend on the process time zone', () => {
    const original = process.env.TZ;
    try {
      const rendered = ['UTC', 'America/New_York', 'Asia/Kolkata'].map((zone) => {
        process.env.TZ = zone;
        return parseSubmissionTimestamp('2024-03-01T08:15:00.000+03:00')?.toPostgres();
      });
      expect(rendered).toEqual(['2024-03-01 08:15:00', '2024-03-01 08:15:00', '2024-03-01 08:15:00']);
    } finally {
      if (original === undefined) {
        delete process.env.TZ;
      } else {
        process.env.TZ = original;
      }
    }
  });

  it('serializes to its clock time', () => {
    expect(JSON.stringify({ start: parseSubmissionTimestamp('2024-03-01T08:15:00Z') })).toBe(
      '{"start":"2024-03-01 08:15:00"}',
    );
  });
});

describe('normalizeTable()', () => {
  it('re-keys records by canonical name and converts start/end', () => {
    const decoded = decodeTable(
      'start;end;Age Group;Gender?\n2024-03-01T08:00:00Z;garbage;;Female\n',
      ';',
    );

    const table = normalizeTable(decoded);

    expect(table.fields).toEqual(['start', 'end', 'Age_Group', 'Gender']);
    const record = table.records[0];
    expect(record?.get('start')?.toString()).toBe('2024-03-01 08:00:00');
    expect(record?.get('end')).toBeNull();
    expect(record?.get('Age_Group')).toBeNull();
    expect(record?.get('Gender')).toBe('Female');
    expect(table.collisions).toEqual([]);
  });

  it('only converts the exact lower-case start and end fields', () => {
    const decoded = decodeTable('Start;End\n2024-03-01T08:00:00Z;2024-03-01T08:10:00Z\n', ';');

    const table = normalizeTable(decoded);

    expect(table.records[0]?.get('Start')).toBe('2024-03-01T08:00:00Z');
    expect(table.records[0]?.get('End')).toBe('2024-03-01T08:10:00Z');
  });

  it('keeps the first column when canonical names collide', () => {
    const decoded = decodeTable('Age Group;Age-Group;Age/Group?\n18-24;25-34;35-44\n', ';');

    const table = normalizeTable(decoded);

    expect(table.fields).toEqual(['Age_Group']);
    expect(table.records[0]?.get('Age_Group')).toBe('18-24');
    expect(table.collisions).toEqual([
      { canonical: 'Age_Group', kept: 'Age Group', dropped: 'Age-Group' },
      { canonical: 'Age_Group', kept: 'Age Group', dropped: 'Age/Group?' },
    ]);
  });
});
