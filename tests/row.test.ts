/**
 * Row Tests: text view over driver values
 */

import { describe, it, expect } from 'vitest';
import { Row } from '../src/row.js';

describe('Row', () => {
  const row = new Row({
    name: 'Alice',
    age: 42,
    note: null,
    created: new Date('2024-01-02T03:04:05.000Z'),
    blob: Buffer.from([0xde, 0xad]),
    big: 9007199254740993n,
    meta: { tags: ['a'] },
  });

  it('returns text for every value', () => {
    expect(row.get('name')).toBe('Alice');
    expect(row.get('age')).toBe('42');
    expect(row.get('created')).toBe('2024-01-02T03:04:05.000Z');
    expect(row.get('blob')).toBe('dead');
    expect(row.get('big')).toBe('9007199254740993');
    expect(row.get('meta')).toBe('{"tags":["a"]}');
  });

  it('distinguishes NULL from a missing column', () => {
    expect(row.get('note')).toBeNull();
    expect(row.get('missing')).toBeUndefined();
  });

  it('keeps the driver value', () => {
    expect(row.value('age')).toBe(42);
    expect(row.value('created')).toBeInstanceOf(Date);
  });

  it('lists columns', () => {
    expect(row.columnCount).toBe(7);
    expect(row.columnNames()).toEqual(['name', 'age', 'note', 'created', 'blob', 'big', 'meta']);
  });

  it('is not affected by changes to the source record', () => {
    const record: Record<string, unknown> = { name: 'Bob' };
    const copy = new Row(record);
    record['name'] = 'Mallory';
    expect(copy.get('name')).toBe('Bob');
    expect(copy.toObject()).toEqual({ name: 'Bob' });
  });
});
