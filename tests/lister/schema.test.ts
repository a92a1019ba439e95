import { describe, it, expect } from 'vitest';
import { Column, Sheet } from '../../src/lister/schema.js';

describe('Sheet schema', () => {
  it('should accept a Smartsheet sheet payload and drop unused fields', () => {
    const result = Sheet.parse({
      id: 1234567890123456,
      name: 'Project Plan',
      version: 12,
      totalRowCount: 40,
      columns: [{ id: 111, index: 0, title: 'Task Name', type: 'TEXT_NUMBER', primary: true }],
    });

    expect(result).toEqual({
      id: 1234567890123456,
      name: 'Project Plan',
      columns: [{ id: 111, title: 'Task Name', type: 'TEXT_NUMBER' }],
    });
  });

  it('should default missing columns to an empty list', () => {
    expect(Sheet.parse({ name: 'Blank' }).columns).toEqual([]);
  });

  it('should reject a payload without a name', () => {
    expect(Sheet.safeParse({ columns: [] }).success).toBe(false);
  });
});

describe('Column schema', () => {
  it('should accept string ids and unknown type tags', () => {
    const result = Column.safeParse({ id: 'abc', title: 'Notes', type: 'SOME_FUTURE_TYPE' });
    expect(result.success).toBe(true);
  });

  it('should reject fractional ids', () => {
    expect(Column.safeParse({ id: 1.5, title: 'X', type: 'DATE' }).success).toBe(false);
  });

  it('should reject a column without a type', () => {
    expect(Column.safeParse({ id: 1, title: 'X' }).success).toBe(false);
  });
});
