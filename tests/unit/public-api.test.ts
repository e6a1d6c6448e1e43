import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports compose and build', async () => {
    const { compose, build } = await import('../../src/index.js');
    expect(typeof compose).toBe('function');
    expect(typeof build).toBe('function');
  });

  it('exports the query DSL entry points', async () => {
    const { from, predicate } = await import('../../src/index.js');
    expect(typeof from).toBe('function');
    expect(typeof predicate.contains).toBe('function');
  });

  it('exports schema helpers', async () => {
    const { defineSchema, SchemaRegistry, castTerm } = await import('../../src/index.js');
    expect(typeof defineSchema).toBe('function');
    expect(typeof SchemaRegistry).toBe('function');
    expect(typeof castTerm).toBe('function');
  });

  it('exports the PostgreSQL adapter', async () => {
    const { introspectSchema, PostgresSearchExecutor } = await import('../../src/index.js');
    expect(typeof introspectSchema).toBe('function');
    expect(typeof PostgresSearchExecutor).toBe('function'); // class is a function
  });

  it('exports error classes usable with instanceof', async () => {
    const { SchemaResolutionError, SearchExecutionError } = await import('../../src/index.js');
    expect(new SchemaResolutionError('users')).toBeInstanceOf(Error);
    expect(new SearchExecutionError('msg')).toBeInstanceOf(SearchExecutionError);
  });

  it('does NOT export pipeline stages (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['castTerms']).toBeUndefined();
    expect((api as Record<string, unknown>)['buildSearchQuery']).toBeUndefined();
  });

  it('does NOT export SearchQuery as a value (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['SearchQuery']).toBeUndefined();
  });

  it('compose over a defined schema returns a filtered query', async () => {
    const { compose, defineSchema } = await import('../../src/index.js');
    const User = defineSchema('users', { id: 'integer', email: 'text', password: 'text' });
    const q = compose(User, ['gmail', 'yahoo']);
    expect(q.hasFilter).toBe(true);
    expect(q.source).toBe('users');
  });
});
