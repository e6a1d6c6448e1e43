import { describe, it, expect } from 'vitest';
import { from } from '../../src/query/query-object.js';
import {
  compileSelectQuery,
  compileCountQuery,
  compileCanonicalKey,
  quoteIdentifier,
} from '../../src/query/compiler.js';
import { defineSchema } from '../../src/schema/define.js';

const User = defineSchema('users', { id: 'integer', email: 'text', active: 'boolean', password: 'text' });

describe('compileSelectQuery', () => {
  it('no filter - selects every row', () => {
    const { sql, params } = compileSelectQuery(from(User));
    expect(sql).toBe('SELECT *\nFROM "users"');
    expect(params).toEqual([]);
  });

  it('single ILIKE predicate', () => {
    const { sql, params } = compileSelectQuery(from(User).where.field('email').contains('gmail'));
    expect(sql).toBe('SELECT *\nFROM "users"\nWHERE "email" ILIKE $1');
    expect(params).toEqual(['%gmail%']);
  });

  it('equality predicate', () => {
    const { sql, params } = compileSelectQuery(from(User).where.field('id').equals(42));
    expect(sql).toContain('WHERE "id" = $1');
    expect(params).toEqual([42]);
  });

  it('equality with null compiles to IS NULL without a parameter', () => {
    const { sql, params } = compileSelectQuery(from(User).where.field('email').equals(null));
    expect(sql).toContain('WHERE "email" IS NULL');
    expect(params).toEqual([]);
  });

  it('OR group is parenthesized', () => {
    const q = from(User).where.field('email').contains('gmail').or.field('email').contains('yahoo');
    const { sql, params } = compileSelectQuery(q);
    expect(sql).toContain('WHERE ("email" ILIKE $1 OR "email" ILIKE $2)');
    expect(params).toEqual(['%gmail%', '%yahoo%']);
  });

  it('AND of OR group numbers parameters depth-first', () => {
    const q = from(User)
      .where.field('email').contains('bob')
      .and.anyOf([
        { kind: 'ilike', field: 'email', pattern: '%1%' },
        { kind: 'eq', field: 'id', value: 1 },
      ]);
    const { sql, params } = compileSelectQuery(q);
    expect(sql).toContain('WHERE ("email" ILIKE $1 AND ("email" ILIKE $2 OR "id" = $3))');
    expect(params).toEqual(['%bob%', '%1%', 1]);
  });

  it('quotes each part of a schema-qualified source', () => {
    const { sql } = compileSelectQuery(from('crm.contacts'));
    expect(sql).toBe('SELECT *\nFROM "crm"."contacts"');
  });

  it('selects only the requested columns', () => {
    const { sql } = compileSelectQuery(from(User), { columns: ['id', 'email'] });
    expect(sql).toMatch(/^SELECT "id", "email"\n/);
  });

  it('empty column list selects every column', () => {
    const { sql } = compileSelectQuery(from(User), { columns: [] });
    expect(sql).toMatch(/^SELECT \*\n/);
  });

  it('LIMIT and OFFSET follow the filter parameters', () => {
    const q = from(User).where.field('active').equals(true);
    const { sql, params } = compileSelectQuery(q, { limit: 10, offset: 20 });
    expect(sql).toBe('SELECT *\nFROM "users"\nWHERE "active" = $1\nLIMIT $2\nOFFSET $3');
    expect(params).toEqual([true, 10, 20]);
  });
});

describe('compileCountQuery', () => {
  it('counts every row when unfiltered', () => {
    const { sql, params } = compileCountQuery(from(User));
    expect(sql).toBe('SELECT COUNT(*) AS count\nFROM "users"');
    expect(params).toEqual([]);
  });

  it('counts matching rows', () => {
    const { sql, params } = compileCountQuery(from(User).where.field('email').contains('gmail'));
    expect(sql).toBe('SELECT COUNT(*) AS count\nFROM "users"\nWHERE "email" ILIKE $1');
    expect(params).toEqual(['%gmail%']);
  });
});

describe('quoteIdentifier', () => {
  it('doubles embedded quotes', () => {
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
  });
});

describe('compileCanonicalKey', () => {
  it('is equal for structurally equal queries', () => {
    const a = from(User).where.field('email').contains('x').or.field('id').equals(1);
    const b = from(User).where.field('email').contains('x').or.field('id').equals(1);
    expect(compileCanonicalKey(a)).toBe(compileCanonicalKey(b));
  });

  it('differs when the filter differs', () => {
    const a = from(User).where.field('email').contains('x');
    const b = from(User).where.field('email').contains('y');
    expect(compileCanonicalKey(a)).not.toBe(compileCanonicalKey(b));
  });

  it('renders dates as ISO strings', () => {
    const q = from('events').where.field('at').equals(new Date('2024-01-02T00:00:00Z'));
    expect(compileCanonicalKey(q)).toBe(
      '{"source":"events","filter":{"kind":"eq","field":"at","value":{"date":"2024-01-02T00:00:00.000Z"}}}',
    );
  });

  it('renders an unfiltered query with a null filter', () => {
    expect(compileCanonicalKey(from(User))).toBe('{"source":"users","filter":null}');
  });
});
