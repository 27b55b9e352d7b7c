/**
 * Slide parser — splits a flat list of lines into slides.
 *
 * A line starting with the heading marker opens a new slide; every other line
 * belongs to the body of the slide opened last. Heading levels are not
 * distinguished: with the default marker `#`, `## Sub` also opens a slide.
 */

import type { Deck, Slide } from '../model/Deck';

export const DEFAULT_HEADING_MARKER = '#';

export interface ParseOptions {
  /** Literal prefix that marks a heading line. Default `'#'`. */
  headingMarker?: string;
}

export function normalizeHeadingMarker(marker: string | undefined): string {
  return marker ? marker : DEFAULT_HEADING_MARKER;
}

export function isHeadingLine(line: string, marker: string = DEFAULT_HEADING_MARKER): boolean {
  return line.startsWith(marker);
}

export function parseSlides(lines: readonly string[], options?: ParseOptions): Deck {
  const marker = normalizeHeadingMarker(options?.headingMarker);
  const slides: Slide[] = [];
  let current: Slide = { title: '', body: [] };

  for (const line of lines) {
    if (isHeadingLine(line, marker)) {
      // Lines before the first heading only survive as a preamble slide when
      // the document has no heading at all.
      if (current.title.length > 0) {
        slides.push(current);
      }
      current = { title: line, body: [] };
    } else {
      current.body.push(line);
    }
  }

  slides.push(current);
  return { slides };
}
