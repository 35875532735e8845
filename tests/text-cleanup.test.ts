import { describe, expect, it } from 'vitest';
import { cleanResponseText } from '../src/utils/text-cleanup.js';

describe('cleanResponseText', () => {
  it('adds a space after a period followed by a capital letter', () => {
    expect(cleanResponseText('We have it.It costs $19.50.')).toBe('We have it. It costs $19.50.');
  });

  it('splits lowercase-uppercase boundaries', () => {
    expect(cleanResponseText('in stockNike has more')).toBe('in stock Nike has more');
  });

  it('splits a digit from a following letter', () => {
    expect(cleanResponseText('We have 3units left')).toBe('We have 3 units left');
  });

  it('leaves prices and well-spaced text alone', () => {
    const text = 'The Nike Tee costs $24.99 and there are 8 units in size L.';
    expect(cleanResponseText(text)).toBe(text);
  });

  it('returns an empty string for non-string input', () => {
    expect(cleanResponseText(undefined)).toBe('');
    expect(cleanResponseText(42)).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'Sure!We have 3Nike shirts.They cost $19.50each.',
      'aBcDeF.G1h2I',
      '**Nike - Tee**\nSize: L • Price: $19.50',
      '10XL shirts.Adidas tooLow stock',
    ];
    for (const sample of samples) {
      const once = cleanResponseText(sample);
      expect(cleanResponseText(once)).toBe(once);
    }
  });
});
