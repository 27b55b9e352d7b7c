import { parseSlides } from '../parser/SlideParser';
import { computeRegions, REGION_NAMES } from '../layout/LayoutEngine';
import type { RegionLayout, RegionName } from '../layout/LayoutEngine';
import { buildSlideContent } from '../renderer/SlideContent';
import type { SlideContent } from '../renderer/SlideContent';
import { emptyDeck } from '../model/Deck';
import type { Deck } from '../model/Deck';
import { DEFAULT_OVERRIDES, EnvironmentOverrides } from './EnvironmentOverrides';
import type { EnvironmentOverride, OverrideSpec } from './EnvironmentOverrides';
import type { KeyMode, SurfaceConfig, SurfaceHost, Unsubscribe } from '../host/types';

export type PresentationStatus = 'uninitialized' | 'active' | 'closed';

export type RejectReason = 'inactive-session' | 'already-started' | 'stale-surface';

export type OperationResult =
  | { status: 'applied' }
  | { status: 'rejected'; reason: RejectReason };

/** Where a recovered host failure happened. */
export type HostErrorSource = RegionName | 'options' | 'events';

export interface KeyBindings {
  next: string;
  previous: string;
  quit: string;
}

export const DEFAULT_KEYS: Readonly<KeyBindings> = { next: 'n', previous: 'p', quit: 'q' };

export interface PresentationOptions {
  /** Footer label, usually the name of the presented document. */
  sourceLabel?: string;
  /** Literal prefix that starts a slide. Default `'#'`. */
  headingMarker?: string;
  keys?: Partial<KeyBindings>;
  /** Mode the navigation keys are bound in. Default `'normal'`. */
  keyMode?: KeyMode;
  /** Host options changed while presenting. Default: `cmdheight` set to 0. */
  overrides?: readonly OverrideSpec[];
  /** Passed to every surface the controller creates. Default `'markdown'`. */
  contentType?: string;
  onStart?: (slideCount: number) => void;
  onSlideChange?: (index: number) => void;
  onResize?: (regions: RegionLayout) => void;
  onClose?: () => void;
  onHostError?: (source: HostErrorSource, error: unknown) => void;
}

export interface PresentationEventMap {
  start: CustomEvent<{ slideCount: number }>;
  slidechange: CustomEvent<{ index: number }>;
  resize: CustomEvent<{ regions: RegionLayout }>;
  close: Event;
  hosterror: CustomEvent<{ source: HostErrorSource; error: unknown }>;
}

const APPLIED: OperationResult = { status: 'applied' };

function rejected(reason: RejectReason): OperationResult {
  return { status: 'rejected', reason };
}

function normalizeKeys(keys: Partial<KeyBindings> | undefined): KeyBindings {
  return {
    next: keys?.next || DEFAULT_KEYS.next,
    previous: keys?.previous || DEFAULT_KEYS.previous,
    quit: keys?.quit || DEFAULT_KEYS.quit,
  };
}

/**
 * Drives one presentation session: owns the parsed deck, the current slide
 * (1-based) and the four host surfaces.
 *
 * Lifecycle: `uninitialized` → `start()` → `active` → `quit()` or a closed /
 * left body surface → `closed`. A controller is not reusable; create a new
 * one per session. Operations on a closed session are rejected, never
 * thrown, except `quit()` which is always safe to repeat.
 */
export class PresentationController<TSurface = unknown> extends EventTarget {
  private readonly host: SurfaceHost<TSurface>;
  private readonly options: PresentationOptions;
  private readonly keys: KeyBindings;
  private readonly overrides: EnvironmentOverrides;
  private status: PresentationStatus = 'uninitialized';
  private deckData: Deck = emptyDeck();
  private currentSlide = 0;
  private layout: RegionLayout | null = null;
  private surfaces = new Map<RegionName, TSurface>();
  private subscriptions: Unsubscribe[] = [];

  constructor(host: SurfaceHost<TSurface>, options?: PresentationOptions) {
    super();
    if (!host) {
      throw new TypeError('PresentationController requires a host');
    }
    this.host = host;
    this.options = options ?? {};
    this.keys = normalizeKeys(options?.keys);
    this.overrides = new EnvironmentOverrides(options?.overrides ?? DEFAULT_OVERRIDES);

    if (options?.onStart) {
      const cb = options.onStart;
      this.on('start', (e) => cb(e.detail.slideCount));
    }
    if (options?.onSlideChange) {
      const cb = options.onSlideChange;
      this.on('slidechange', (e) => cb(e.detail.index));
    }
    if (options?.onResize) {
      const cb = options.onResize;
      this.on('resize', (e) => cb(e.detail.regions));
    }
    if (options?.onClose) {
      const cb = options.onClose;
      this.on('close', () => cb());
    }
    if (options?.onHostError) {
      const cb = options.onHostError;
      this.on('hosterror', (e) => cb(e.detail.source, e.detail.error));
    }
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Parse `lines` into a deck, open the surfaces, apply the presentation
   * options and show the first slide.
   */
  start(lines: readonly string[]): OperationResult {
    if (this.status === 'active') return rejected('already-started');
    if (this.status === 'closed') return rejected('inactive-session');

    this.deckData = parseSlides(lines, { headingMarker: this.options.headingMarker });
    this.currentSlide = 1;
    const layout = this.measure();
    this.layout = layout;
    this.status = 'active';

    for (const name of REGION_NAMES) {
      try {
        const surface = this.host.createSurface(this.surfaceConfig(layout, name), name === 'body');
        this.surfaces.set(name, surface);
      } catch (e) {
        this.emitHostError(name, e);
      }
    }

    const body = this.surfaces.get('body');
    if (body === undefined) {
      this.teardown();
      return rejected('stale-surface');
    }

    this.bindNavigation(body);
    try {
      this.overrides.apply(this.host);
    } catch (e) {
      this.emitHostError('options', e);
    }
    this.subscribe(body);

    this.writeSlide();
    this.emit('start', { slideCount: this.deckData.slides.length });
    this.emit('slidechange', { index: this.currentSlide });
    return APPLIED;
  }

  /** End the session. Safe to call any number of times. */
  quit(): OperationResult {
    if (this.status !== 'closed') {
      this.teardown();
    }
    return APPLIED;
  }

  // -----------------------------------------------------------------------
  // Navigation
  // -----------------------------------------------------------------------

  next(): OperationResult {
    return this.goToSlide(this.currentSlide + 1);
  }

  previous(): OperationResult {
    return this.goToSlide(this.currentSlide - 1);
  }

  /** Show slide `index` (1-based), clamped to the deck. */
  goToSlide(index: number): OperationResult {
    if (this.status !== 'active') return rejected('inactive-session');
    const count = this.deckData.slides.length;
    const target = Number.isFinite(index) ? Math.trunc(index) : this.currentSlide;
    const prev = this.currentSlide;
    this.currentSlide = Math.max(1, Math.min(target, count));
    this.writeSlide();
    if (this.currentSlide !== prev) {
      this.emit('slidechange', { index: this.currentSlide });
    }
    return APPLIED;
  }

  /** Redraw the current slide without touching the layout. */
  renderSlide(): OperationResult {
    if (this.status !== 'active') return rejected('inactive-session');
    this.writeSlide();
    return APPLIED;
  }

  /**
   * Recompute the layout from the live screen size, move every surface to its
   * new region and redraw. Does nothing once the body surface is gone.
   */
  resize(): OperationResult {
    if (this.status !== 'active') return rejected('inactive-session');
    const body = this.surfaces.get('body');
    if (body === undefined || !this.isValid(body)) return rejected('stale-surface');

    const layout = this.measure();
    this.layout = layout;
    for (const [name, surface] of this.surfaces) {
      if (!this.isValid(surface)) continue;
      try {
        this.host.setSurfaceGeometry(surface, this.surfaceConfig(layout, name));
      } catch (e) {
        this.emitHostError(name, e);
      }
    }
    this.writeSlide();
    this.emit('resize', { regions: layout });
    return APPLIED;
  }

  // -----------------------------------------------------------------------
  // Getters
  // -----------------------------------------------------------------------

  get state(): PresentationStatus {
    return this.status;
  }

  get isActive(): boolean {
    return this.status === 'active';
  }

  /** A copy of the parsed deck; changing it does not affect the session. */
  get deck(): Deck {
    return {
      slides: this.deckData.slides.map((slide) => ({ title: slide.title, body: [...slide.body] })),
    };
  }

  get slideCount(): number {
    return this.deckData.slides.length;
  }

  /** 1-based; 0 when no session is running. */
  get currentSlideIndex(): number {
    return this.currentSlide;
  }

  get regions(): RegionLayout | null {
    return this.layout;
  }

  get sourceLabel(): string {
    return this.options.sourceLabel ?? '';
  }

  get appliedOverrides(): readonly EnvironmentOverride[] {
    return this.overrides.recorded;
  }

  getSurface(name: RegionName): TSurface | undefined {
    return this.surfaces.get(name);
  }

  /** Text currently shown for the active slide, or null outside a session. */
  getSlideContent(): SlideContent | null {
    if (this.status !== 'active' || !this.layout) return null;
    return buildSlideContent(
      this.deckData,
      this.currentSlide,
      this.layout.header.width,
      this.sourceLabel,
    );
  }

  // -----------------------------------------------------------------------
  // Typed event helpers
  // -----------------------------------------------------------------------

  on<K extends keyof PresentationEventMap>(
    type: K,
    listener: (event: PresentationEventMap[K]) => void,
  ): this {
    this.addEventListener(type, listener as EventListener);
    return this;
  }

  off<K extends keyof PresentationEventMap>(
    type: K,
    listener: (event: PresentationEventMap[K]) => void,
  ): this {
    this.removeEventListener(type, listener as EventListener);
    return this;
  }

  // -----------------------------------------------------------------------
  // Host event handlers
  // -----------------------------------------------------------------------

  private readonly handleSurfaceClosed = (): void => {
    this.quit();
  };

  private readonly handleScreenResized = (): void => {
    this.resize();
  };

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private emit<K extends Exclude<keyof PresentationEventMap, 'close'>>(
    type: K,
    detail: PresentationEventMap[K]['detail'],
  ): void {
    this.dispatchEvent(new CustomEvent(type, { detail }));
  }

  private emitHostError(source: HostErrorSource, error: unknown): void {
    this.emit('hosterror', { source, error });
  }

  private measure(): RegionLayout {
    const { width, height } = this.host.getScreenDimensions();
    return computeRegions(width, height);
  }

  private surfaceConfig(layout: RegionLayout, name: RegionName): SurfaceConfig {
    return { ...layout[name], contentType: this.options.contentType ?? 'markdown' };
  }

  private isValid(surface: TSurface): boolean {
    try {
      return this.host.isSurfaceValid(surface);
    } catch {
      return false;
    }
  }

  private bindNavigation(body: TSurface): void {
    const mode = this.options.keyMode ?? 'normal';
    const bindings: Array<[string, () => void]> = [
      [this.keys.next, () => this.next()],
      [this.keys.previous, () => this.previous()],
      [this.keys.quit, () => this.quit()],
    ];
    for (const [key, handler] of bindings) {
      try {
        this.subscriptions.push(this.host.bindKey(body, mode, key, handler));
      } catch (e) {
        this.emitHostError('events', e);
      }
    }
  }

  private subscribe(body: TSurface): void {
    try {
      this.subscriptions.push(
        this.host.onEvent('surface-left', this.handleSurfaceClosed, body),
        this.host.onEvent('surface-closed', this.handleSurfaceClosed, body),
        this.host.onEvent('screen-resized', this.handleScreenResized),
      );
    } catch (e) {
      this.emitHostError('events', e);
    }
  }

  private writeSlide(): void {
    const content = this.getSlideContent();
    if (!content) return;
    this.write('header', content.header);
    this.write('body', content.body);
    this.write('footer', content.footer);
  }

  private write(name: RegionName, lines: string[]): void {
    const surface = this.surfaces.get(name);
    if (surface === undefined || !this.isValid(surface)) return;
    try {
      this.host.writeContent(surface, lines);
    } catch (e) {
      this.emitHostError(name, e);
    }
  }

  private teardown(): void {
    // Mark closed first: closing a surface may re-enter through the
    // surface-closed handler.
    this.status = 'closed';

    for (const unsubscribe of this.subscriptions) {
      try {
        unsubscribe();
      } catch (e) {
        this.emitHostError('events', e);
      }
    }
    this.subscriptions = [];

    try {
      this.overrides.restore(this.host);
    } catch (e) {
      this.emitHostError('options', e);
    }

    for (const [name, surface] of this.surfaces) {
      if (!this.isValid(surface)) continue;
      try {
        this.host.closeSurface(surface);
      } catch (e) {
        this.emitHostError(name, e);
      }
    }
    this.surfaces.clear();

    this.deckData = emptyDeck();
    this.currentSlide = 0;
    this.layout = null;
    this.dispatchEvent(new Event('close'));
  }
}
