import { describe, it, expect } from 'vitest';
import { monthIndex, monthNameAfter } from '../utils/months';

describe('monthIndex', () => {
  it('reads full and short names in any case', () => {
    expect(monthIndex('October')).toBe(9);
    expect(monthIndex(' DEC ')).toBe(11);
    expect(monthIndex('mar')).toBe(2);
    expect(monthIndex('may')).toBe(4);
  });

  it('returns null for anything else', () => {
    expect(monthIndex('Ma')).toBeNull();
    expect(monthIndex('Smarch')).toBeNull();
  });
});

describe('monthNameAfter', () => {
  it('wraps past December', () => {
    expect(monthNameAfter(11, 1)).toBe('January');
    expect(monthNameAfter(9, 3)).toBe('January');
    expect(monthNameAfter(0, -1)).toBe('December');
  });
});
