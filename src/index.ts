// Session
export { Presenter } from './core/Presenter';
export type { PresenterOptions } from './core/Presenter';
export { PresentationController, DEFAULT_KEYS } from './core/PresentationController';
export type {
  PresentationOptions,
  PresentationEventMap,
  PresentationStatus,
  OperationResult,
  RejectReason,
  HostErrorSource,
  KeyBindings,
} from './core/PresentationController';
export { EnvironmentOverrides, DEFAULT_OVERRIDES } from './core/EnvironmentOverrides';
export type { EnvironmentOverride, OverrideSpec, OptionStore } from './core/EnvironmentOverrides';

// Parsing
export { parseSlides, isHeadingLine, DEFAULT_HEADING_MARKER } from './parser/SlideParser';
export type { ParseOptions } from './parser/SlideParser';
export { splitLines } from './parser/lines';

// Layout
export {
  computeRegions,
  computeBodyHeight,
  REGION_NAMES,
  HEADER_HEIGHT,
  FOOTER_HEIGHT,
  BORDER_RESERVE,
  BODY_INSET,
  BODY_ROW,
} from './layout/LayoutEngine';
export type { Region, RegionLayout, RegionName, BorderStyle } from './layout/LayoutEngine';

// Content
export { buildSlideContent, centerTitle, formatFooter, titlePadding } from './renderer/SlideContent';
export type { SlideContent } from './renderer/SlideContent';

// Hosts
export { DomHost } from './host/DomHost';
export type { DomHostOptions, DomSource, DomSurface, DocumentSource } from './host/DomHost';
export type {
  PresentationHost,
  SurfaceHost,
  SurfaceConfig,
  HostEventClass,
  KeyMode,
  OptionValue,
  ScreenDimensions,
  Unsubscribe,
} from './host/types';

// Model types
export type { Slide, Deck } from './model/Deck';
export { getSlide } from './model/Deck';
