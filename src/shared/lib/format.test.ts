import { describe, it, expect } from 'vitest';
import { formatDuration, formatTimestamp, truncateText } from './format';

describe('formatDuration', () => {
  it('splits into minutes and seconds', () => {
    expect(formatDuration(16 * 60_000)).toBe('16m 0s');
    expect(formatDuration(125_900)).toBe('2m 5s');
  });

  it('clamps negative durations to zero', () => {
    expect(formatDuration(-5000)).toBe('0m 0s');
  });
});

describe('truncateText', () => {
  it('leaves short text alone', () => {
    expect(truncateText('short', 10)).toBe('short');
  });

  it('cuts long text with an ellipsis', () => {
    expect(truncateText('abcdefghijkl', 10)).toBe('abcdefg...');
  });
});

describe('formatTimestamp', () => {
  it('uses local calendar fields', () => {
    expect(formatTimestamp(new Date(2025, 2, 8, 9, 5))).toBe('2025-03-08 09:05');
  });
});
