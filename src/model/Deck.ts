/**
 * Deck model — the ordered slides parsed from one source document.
 */

export interface Slide {
  /** Heading line exactly as written, marker included. Empty only for a leading preamble slide. */
  title: string;
  /** Lines between this heading and the next one, verbatim. */
  body: string[];
}

export interface Deck {
  slides: Slide[];
}

export function emptyDeck(): Deck {
  return { slides: [] };
}

export function slideCount(deck: Deck): number {
  return deck.slides.length;
}

/**
 * Look up a slide by its 1-based position. Returns undefined outside the deck.
 */
export function getSlide(deck: Deck, index: number): Slide | undefined {
  if (!Number.isInteger(index) || index < 1) return undefined;
  return deck.slides[index - 1];
}
