/**
 * Reference host that lays the presentation out inside a container element.
 *
 * The container is treated as a screen of character cells. Each surface is a
 * `<pre>` positioned by cell row/col and stacked by z-index; a command-line
 * strip at the bottom stands in for the editor's `cmdheight` option.
 */

import { splitLines } from '../parser/lines';
import type {
  HostEventClass,
  KeyMode,
  OptionValue,
  PresentationHost,
  ScreenDimensions,
  SurfaceConfig,
  Unsubscribe,
} from './types';

export interface DocumentSource {
  text: string;
  name?: string;
}

export type DomSource = DocumentSource | HTMLTextAreaElement;

export interface DomSurface {
  readonly id: number;
  readonly element: HTMLPreElement;
}

export interface DomHostOptions {
  /** Fixed screen width in cells. Measured from the container when omitted. */
  columns?: number;
  /** Fixed screen height in cells. Measured from the container when omitted. */
  lines?: number;
  /** Cell width in px. Default 8. */
  cellWidth?: number;
  /** Cell height in px. Default 16. */
  cellHeight?: number;
  /** Rows of the command-line strip. Default 1. */
  cmdheight?: number;
}

const FALLBACK_COLUMNS = 80;
const FALLBACK_LINES = 24;

function normalizePositive(val: number | undefined, fallback: number): number {
  return val !== undefined && Number.isFinite(val) && val > 0 ? val : fallback;
}

function isTextArea(source: DomSource): source is HTMLTextAreaElement {
  return typeof HTMLTextAreaElement !== 'undefined' && source instanceof HTMLTextAreaElement;
}

export class DomHost implements PresentationHost<DomSource, DomSurface> {
  /** Mode key bindings are matched against. */
  mode: KeyMode = 'normal';

  private container: HTMLElement;
  private hostOptions: DomHostOptions;
  private cellWidth: number;
  private cellHeight: number;
  private commandLine: HTMLDivElement;
  private optionValues = new Map<string, OptionValue>();
  private surfaces = new Set<DomSurface>();
  private nextSurfaceId = 1;
  private closeHandlers = new Map<DomSurface, Set<() => void>>();
  private resizeHandlers = new Set<() => void>();
  private resizeObserver?: ResizeObserver;
  private windowResizeHandler?: () => void;
  private lastScreen: ScreenDimensions;

  constructor(container: HTMLElement, options?: DomHostOptions) {
    this.container = container;
    this.hostOptions = { ...options };
    this.cellWidth = normalizePositive(options?.cellWidth, 8);
    this.cellHeight = normalizePositive(options?.cellHeight, 16);
    this.container.style.position = 'relative';

    this.commandLine = document.createElement('div');
    this.commandLine.dataset.role = 'command-line';
    this.commandLine.style.cssText = 'position: absolute; left: 0; right: 0; bottom: 0;';
    this.container.appendChild(this.commandLine);
    const cmdheight = options?.cmdheight;
    this.setOption(
      'cmdheight',
      cmdheight !== undefined && Number.isInteger(cmdheight) && cmdheight >= 0 ? cmdheight : 1,
    );

    this.lastScreen = this.getScreenDimensions();
    this.setupAdaptiveResize();
  }

  // -----------------------------------------------------------------------
  // Source
  // -----------------------------------------------------------------------

  readLines(source: DomSource): string[] {
    return splitLines(isTextArea(source) ? source.value : source.text);
  }

  describeSource(source: DomSource): string {
    if (isTextArea(source)) return source.name || source.id;
    return source.name ?? '';
  }

  // -----------------------------------------------------------------------
  // Screen
  // -----------------------------------------------------------------------

  getScreenDimensions(): ScreenDimensions {
    const measuredWidth = Math.floor(this.container.clientWidth / this.cellWidth) || FALLBACK_COLUMNS;
    const measuredHeight = Math.floor(this.container.clientHeight / this.cellHeight) || FALLBACK_LINES;
    return {
      width: Math.floor(normalizePositive(this.hostOptions.columns, measuredWidth)),
      height: Math.floor(normalizePositive(this.hostOptions.lines, measuredHeight)),
    };
  }

  /** Pin the screen to a fixed size and notify resize listeners if it changed. */
  setScreenSize(columns: number, lines: number): void {
    this.hostOptions.columns = columns;
    this.hostOptions.lines = lines;
    this.handleContainerResize();
  }

  // -----------------------------------------------------------------------
  // Surfaces
  // -----------------------------------------------------------------------

  createSurface(config: SurfaceConfig, giveFocus: boolean): DomSurface {
    const element = document.createElement('pre');
    element.tabIndex = -1;
    element.style.margin = '0';
    element.style.overflow = 'hidden';
    element.style.boxSizing = 'content-box';
    const surface: DomSurface = { id: this.nextSurfaceId++, element };
    element.dataset.surfaceId = String(surface.id);
    this.applyGeometry(element, config);
    this.container.appendChild(element);
    this.surfaces.add(surface);
    if (giveFocus) {
      element.focus();
    }
    return surface;
  }

  isSurfaceValid(surface: DomSurface): boolean {
    return this.surfaces.has(surface) && surface.element.isConnected;
  }

  writeContent(surface: DomSurface, lines: readonly string[]): void {
    surface.element.textContent = lines.join('\n');
  }

  setSurfaceGeometry(surface: DomSurface, config: SurfaceConfig): void {
    this.applyGeometry(surface.element, config);
  }

  closeSurface(surface: DomSurface): void {
    if (!this.surfaces.has(surface)) {
      console.warn(`Surface ${surface.id} is already closed`);
      return;
    }
    this.surfaces.delete(surface);
    surface.element.remove();
    const handlers = this.closeHandlers.get(surface);
    this.closeHandlers.delete(surface);
    if (handlers) {
      for (const handler of handlers) handler();
    }
  }

  get surfaceCount(): number {
    return this.surfaces.size;
  }

  // -----------------------------------------------------------------------
  // Input and events
  // -----------------------------------------------------------------------

  bindKey(surface: DomSurface, mode: KeyMode, key: string, handler: () => void): Unsubscribe {
    const listener = (event: KeyboardEvent) => {
      if (event.key !== key || this.mode !== mode) return;
      if (event.ctrlKey || event.altKey || event.metaKey) return;
      event.preventDefault();
      handler();
    };
    surface.element.addEventListener('keydown', listener);
    return () => surface.element.removeEventListener('keydown', listener);
  }

  onEvent(eventClass: HostEventClass, handler: () => void, surface?: DomSurface): Unsubscribe {
    if (eventClass === 'screen-resized') {
      this.resizeHandlers.add(handler);
      return () => {
        this.resizeHandlers.delete(handler);
      };
    }

    if (!surface) {
      throw new Error(`"${eventClass}" needs a surface to listen on`);
    }

    if (eventClass === 'surface-left') {
      const listener = (event: FocusEvent) => {
        // The whole window lost focus (alt-tab, devtools); the surface did not.
        if (event.relatedTarget === null && !document.hasFocus()) return;
        handler();
      };
      surface.element.addEventListener('focusout', listener);
      return () => surface.element.removeEventListener('focusout', listener);
    }

    let handlers = this.closeHandlers.get(surface);
    if (!handlers) {
      handlers = new Set();
      this.closeHandlers.set(surface, handlers);
    }
    handlers.add(handler);
    return () => {
      this.closeHandlers.get(surface)?.delete(handler);
    };
  }

  // -----------------------------------------------------------------------
  // Options
  // -----------------------------------------------------------------------

  getOption(option: string): OptionValue {
    const value = this.optionValues.get(option);
    if (value === undefined) {
      throw new Error(`Unknown option "${option}"`);
    }
    return value;
  }

  setOption(option: string, value: OptionValue): void {
    if (option !== 'cmdheight') {
      throw new Error(`Unknown option "${option}"`);
    }
    const rows = typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;
    if (rows === null) {
      throw new Error(`Invalid cmdheight: ${String(value)}`);
    }
    this.optionValues.set(option, rows);
    this.commandLine.style.height = `${rows * this.cellHeight}px`;
    this.commandLine.style.display = rows === 0 ? 'none' : '';
  }

  // -----------------------------------------------------------------------
  // Cleanup
  // -----------------------------------------------------------------------

  dispose(): void {
    this.teardownAdaptiveResize();
    this.resizeHandlers.clear();
    for (const surface of [...this.surfaces]) {
      // Closing one surface can end a session, which closes the rest.
      if (this.surfaces.has(surface)) this.closeSurface(surface);
    }
    this.closeHandlers.clear();
    this.commandLine.remove();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private applyGeometry(element: HTMLElement, config: SurfaceConfig): void {
    const { cellWidth, cellHeight } = this;
    element.style.position = 'absolute';
    element.style.left = `${config.col * cellWidth}px`;
    element.style.top = `${config.row * cellHeight}px`;
    element.style.width = `${config.width * cellWidth}px`;
    element.style.height = `${config.height * cellHeight}px`;
    element.style.zIndex = String(config.zIndex);

    if (config.border === 'rounded') {
      element.style.border = '1px solid currentColor';
      element.style.borderRadius = '6px';
    } else if (config.border === 'blank') {
      element.style.border = '0 solid transparent';
      element.style.borderWidth = `${cellHeight}px ${cellWidth}px`;
      element.style.borderRadius = '';
    } else {
      element.style.border = 'none';
      element.style.borderRadius = '';
    }

    if (config.contentType) {
      element.dataset.contentType = config.contentType;
    } else {
      delete element.dataset.contentType;
    }
  }

  private handleContainerResize(): void {
    const next = this.getScreenDimensions();
    if (next.width === this.lastScreen.width && next.height === this.lastScreen.height) return;
    this.lastScreen = next;
    for (const handler of [...this.resizeHandlers]) {
      handler();
    }
  }

  private setupAdaptiveResize(): void {
    this.teardownAdaptiveResize();

    if (typeof ResizeObserver !== 'undefined') {
      const observer = new ResizeObserver(() => this.handleContainerResize());
      observer.observe(this.container);
      this.resizeObserver = observer;
      return;
    }

    if (typeof window !== 'undefined') {
      this.windowResizeHandler = () => this.handleContainerResize();
      window.addEventListener('resize', this.windowResizeHandler);
    }
  }

  private teardownAdaptiveResize(): void {
    this.resizeObserver?.disconnect();
    this.resizeObserver = undefined;
    if (this.windowResizeHandler) {
      window.removeEventListener('resize', this.windowResizeHandler);
      this.windowResizeHandler = undefined;
    }
  }
}
