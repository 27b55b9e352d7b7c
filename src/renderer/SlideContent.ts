/**
 * Text rendering for one slide: the centered header line, the body lines and
 * the footer status line.
 */

import type { Deck } from '../model/Deck';
import { getSlide } from '../model/Deck';

export interface SlideContent {
  header: string[];
  body: string[];
  footer: string[];
}

/** Width of a string in characters; astral symbols count once. */
export function textWidth(text: string): number {
  return Array.from(text).length;
}

export function titlePadding(screenWidth: number, title: string): number {
  return Math.max(0, Math.floor((screenWidth - textWidth(title)) / 2));
}

export function centerTitle(title: string, screenWidth: number): string {
  return ' '.repeat(titlePadding(screenWidth, title)) + title;
}

export function formatFooter(current: number, total: number, sourceLabel: string): string {
  return ` ${current} / ${total} | ${sourceLabel}`;
}

/**
 * Build the text for every content region of slide `index` (1-based).
 * Returns null when the deck has no such slide.
 */
export function buildSlideContent(
  deck: Deck,
  index: number,
  screenWidth: number,
  sourceLabel: string,
): SlideContent | null {
  const slide = getSlide(deck, index);
  if (!slide) return null;
  return {
    header: [centerTitle(slide.title, screenWidth)],
    body: [...slide.body],
    footer: [formatFooter(index, deck.slides.length, sourceLabel)],
  };
}
