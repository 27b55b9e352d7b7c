/**
 * Contracts between the presentation core and the editor that hosts it.
 *
 * The host owns the actual display surfaces; the core only hands it region
 * geometry and lines of text. Surface handles are opaque to the core.
 */

import type { Region } from '../layout/LayoutEngine';

export type OptionValue = string | number | boolean;

export type HostEventClass = 'surface-left' | 'surface-closed' | 'screen-resized';

export type KeyMode = 'normal' | 'insert' | 'visual';

export interface ScreenDimensions {
  width: number;
  height: number;
}

export interface SurfaceConfig extends Region {
  /** Hint for how the host should treat the text, e.g. `'markdown'`. */
  contentType?: string;
}

/** Removes a registration made with `bindKey` or `onEvent`. */
export type Unsubscribe = () => void;

/** The part of the host a running presentation talks to. */
export interface SurfaceHost<TSurface = unknown> {
  getScreenDimensions(): ScreenDimensions;
  createSurface(config: SurfaceConfig, giveFocus: boolean): TSurface;
  isSurfaceValid(surface: TSurface): boolean;
  writeContent(surface: TSurface, lines: readonly string[]): void;
  setSurfaceGeometry(surface: TSurface, config: SurfaceConfig): void;
  /** Must not throw for a surface that is already closed. */
  closeSurface(surface: TSurface): void;
  bindKey(surface: TSurface, mode: KeyMode, key: string, handler: () => void): Unsubscribe;
  /**
   * Subscribe to a host event. `surface-left` and `surface-closed` are scoped
   * to `surface` when one is given; `screen-resized` is global.
   */
  onEvent(eventClass: HostEventClass, handler: () => void, surface?: TSurface): Unsubscribe;
  getOption(option: string): OptionValue;
  setOption(option: string, value: OptionValue): void;
}

export interface PresentationHost<TSource = unknown, TSurface = unknown>
  extends SurfaceHost<TSurface> {
  readLines(source: TSource): string[];
  /** Label shown in the footer for `source`, usually the document name. */
  describeSource?(source: TSource): string;
}
