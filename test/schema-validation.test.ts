import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import RecordReader, {
  CSVError,
  formatIssues,
  tryValidateStandardSchemaSync,
  type StandardSchemaV1,
} from '../src';

const people = [
  'Name;Given Name;factor1;factor2',
  'Hurtig;Hugo;5.4;4.6',
  'Leer;Hinnerk;0;4.6',
].join('\n');

const positiveNumberSchema: StandardSchemaV1<unknown, number> = {
  '~standard': {
    version: 1,
    vendor: 'test-suite',
    validate: (v: unknown): StandardSchemaV1.Result<number> => {
      const n = Number(v);
      if (typeof v === 'boolean' || isNaN(n) || n <= 0) {
        return { issues: [{ message: 'Must be a positive number' }] };
      }
      return { value: n };
    },
  },
};

const asyncSchema: StandardSchemaV1<unknown, string> = {
  '~standard': {
    version: 1,
    vendor: 'test-suite',
    validate: async () => ({ value: 'never' }),
  },
};

describe('Schema validation', () => {
  it('tryValidateStandardSchemaSync returns the value or the issues', () => {
    expect(tryValidateStandardSchemaSync(positiveNumberSchema, '4.6')).toEqual({ value: 4.6 });
    expect(tryValidateStandardSchemaSync(positiveNumberSchema, '0')).toEqual({
      issues: [{ message: 'Must be a positive number' }],
    });
  });

  it('tryValidateStandardSchemaSync reports asynchronous validators as a failure', () => {
    expect(tryValidateStandardSchemaSync(asyncSchema, 'x')).toEqual({
      issues: [{ message: 'Validation is asynchronous but synchronous validation was expected.' }],
    });
  });

  it('formatIssues joins paths and messages', () => {
    expect(formatIssues([{ message: 'bad' }, { message: 'too small', path: ['rows', { key: 0 }] }])).toBe(
      'bad; rows.0: too small'
    );
  });

  it('fetchAs returns typed output from a zod schema', () => {
    const Person = z.object({
      Name: z.string().min(1),
      factor1: z.coerce.number(),
      factor2: z.coerce.number(),
    });
    const reader = RecordReader.fromString(people, { delimiter: ';' });

    const person = reader.fetchAs(Person);
    expect(person).toEqual({ Name: 'Hurtig', factor1: 5.4, factor2: 4.6 });
    expect(person?.factor1).toBeTypeOf('number');
  });

  it('fetchAs throws CSVError with the row number on issues', () => {
    const Factors = z.object({ factor1: z.coerce.number().positive() });
    const reader = RecordReader.fromString(people, { delimiter: ';' });

    expect(reader.fetchAs(Factors)).toEqual({ factor1: 5.4 });
    expect(() => reader.fetchAs(Factors)).toThrow(/^Row 3 failed validation: factor1: /);
  });

  it('fetchAs validates records after the transform', () => {
    const reader = RecordReader.fromString(people, {
      delimiter: ';',
      transform: record => ({ ...record, product: Number(record.factor1) * Number(record.factor2) }),
    });
    reader.fetch();

    expect(() => reader.fetchAs(z.object({ product: z.number().positive() }))).toThrow(CSVError);
  });

  it('fetchAs rejects asynchronous validators', () => {
    const reader = RecordReader.fromString(people, { delimiter: ';' });
    expect(() => reader.fetchAs(asyncSchema)).toThrow(
      'Row 2 failed validation: Validation is asynchronous but synchronous validation was expected.'
    );
  });

  it('fetchAs returns null at end of input', () => {
    const reader = RecordReader.fromString('Name\n');
    expect(reader.fetchAs(z.object({ Name: z.string() }))).toBeNull();
  });
});
