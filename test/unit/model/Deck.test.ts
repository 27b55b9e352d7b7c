import { describe, it, expect } from 'vitest';
import { emptyDeck, getSlide, slideCount } from '../../../src/model/Deck';

describe('Deck helpers', () => {
  const deck = {
    slides: [
      { title: '# A', body: ['x'] },
      { title: '# B', body: [] },
    ],
  };

  it('looks slides up by 1-based index', () => {
    expect(getSlide(deck, 1)).toEqual({ title: '# A', body: ['x'] });
    expect(getSlide(deck, 2)?.title).toBe('# B');
  });

  it('returns undefined outside the deck or for non-integers', () => {
    expect(getSlide(deck, 0)).toBeUndefined();
    expect(getSlide(deck, 3)).toBeUndefined();
    expect(getSlide(deck, 1.5)).toBeUndefined();
  });

  it('counts slides', () => {
    expect(slideCount(deck)).toBe(2);
    expect(slideCount(emptyDeck())).toBe(0);
  });
});
