import { describe, it, expect } from 'vitest';
import { mapColumnRow } from '../../src/store/row-mapper.js';

function column(column_name: string, data_type: string, udt_name = data_type) {
  return { column_name, data_type, udt_name };
}

describe('mapColumnRow', () => {
  it('maps character types to text', () => {
    expect(mapColumnRow(column('a', 'text'))).toEqual(['a', 'text']);
    expect(mapColumnRow(column('b', 'character varying', 'varchar'))).toEqual(['b', 'text']);
    expect(mapColumnRow(column('c', 'character', 'bpchar'))).toEqual(['c', 'text']);
  });

  it('maps integer types to integer', () => {
    expect(mapColumnRow(column('a', 'smallint', 'int2'))).toEqual(['a', 'integer']);
    expect(mapColumnRow(column('b', 'integer', 'int4'))).toEqual(['b', 'integer']);
    expect(mapColumnRow(column('c', 'bigint', 'int8'))).toEqual(['c', 'integer']);
  });

  it('maps floating point and numeric types', () => {
    expect(mapColumnRow(column('a', 'double precision', 'float8'))).toEqual(['a', 'float']);
    expect(mapColumnRow(column('b', 'real', 'float4'))).toEqual(['b', 'float']);
    expect(mapColumnRow(column('c', 'numeric'))).toEqual(['c', 'decimal']);
  });

  it('maps timestamps with and without time zone', () => {
    expect(mapColumnRow(column('a', 'timestamp with time zone', 'timestamptz'))).toEqual(['a', 'timestamp']);
    expect(mapColumnRow(column('b', 'timestamp without time zone', 'timestamp'))).toEqual(['b', 'timestamp']);
  });

  it('maps json and jsonb to json', () => {
    expect(mapColumnRow(column('a', 'jsonb'))).toEqual(['a', 'json']);
  });

  it('maps citext to text', () => {
    expect(mapColumnRow(column('email', 'USER-DEFINED', 'citext'))).toEqual(['email', 'text']);
  });

  it('leaves unsupported types untyped', () => {
    expect(mapColumnRow(column('tags', 'ARRAY', '_text'))).toEqual(['tags', undefined]);
    expect(mapColumnRow(column('geom', 'USER-DEFINED', 'geometry'))).toEqual(['geom', undefined]);
  });
});
