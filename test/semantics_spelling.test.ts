import { describe, expect, it } from 'vitest';

import { editDistance, suggestName } from '../src/semantics/spelling.js';

describe('editDistance', () => {
  it('counts insertions, deletions and substitutions', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('abc', '')).toBe(3);
    expect(editDistance('same', 'same')).toBe(0);
  });
});

describe('suggestName', () => {
  it('suggests a close candidate', () => {
    expect(suggestName('coutn', ['count'])).toBe('count');
  });

  it('suggests nothing when no candidate is close', () => {
    expect(suggestName('xyz123', ['count'])).toBeUndefined();
    expect(suggestName('x', [])).toBeUndefined();
  });

  it('ignores case', () => {
    expect(suggestName('COUNT', ['count'])).toBe('count');
  });

  it('prefers the earlier candidate on a tie', () => {
    expect(suggestName('cat', ['bat', 'hat'])).toBe('bat');
    expect(suggestName('cat', ['hat', 'bat'])).toBe('hat');
  });

  it('prefers the smaller distance over order', () => {
    expect(suggestName('total', ['tot', 'totals'])).toBe('totals');
  });

  it('always allows one edit, even for short names', () => {
    expect(suggestName('a', ['b'])).toBe('b');
    expect(suggestName('ab', ['cd'])).toBeUndefined();
  });
});
