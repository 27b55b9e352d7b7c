/**
 * Verify that all public API types and functions are importable from the package root.
 * This test catches accidental removal of exports.
 */
import { describe, expect, it } from 'vitest';

import {
  Presenter,
  PresentationController,
  EnvironmentOverrides,
  DomHost,
  parseSlides,
  splitLines,
  computeRegions,
  buildSlideContent,
  centerTitle,
  formatFooter,
  getSlide,
  DEFAULT_KEYS,
  DEFAULT_OVERRIDES,
  REGION_NAMES,
} from '../../src/index';

// Type-only imports — these just need to compile, not be used at runtime.
import type {
  PresenterOptions,
  PresentationOptions,
  PresentationEventMap,
  PresentationStatus,
  OperationResult,
  RejectReason,
  HostErrorSource,
  KeyBindings,
  EnvironmentOverride,
  OverrideSpec,
  OptionStore,
  ParseOptions,
  Region,
  RegionLayout,
  RegionName,
  BorderStyle,
  SlideContent,
  DomHostOptions,
  DomSource,
  DomSurface,
  DocumentSource,
  PresentationHost,
  SurfaceHost,
  SurfaceConfig,
  HostEventClass,
  KeyMode,
  OptionValue,
  ScreenDimensions,
  Unsubscribe,
  Slide,
  Deck,
} from '../../src/index';

describe('package exports', () => {
  it('exports the session classes', () => {
    for (const ctor of [Presenter, PresentationController, EnvironmentOverrides, DomHost]) {
      expect(typeof ctor).toBe('function');
    }
  });

  it('exports the pure helpers', () => {
    for (const fn of [parseSlides, splitLines, computeRegions, buildSlideContent, centerTitle, formatFooter, getSlide]) {
      expect(typeof fn).toBe('function');
    }
  });

  it('exports defaults', () => {
    expect(DEFAULT_KEYS).toEqual({ next: 'n', previous: 'p', quit: 'q' });
    expect(DEFAULT_OVERRIDES).toEqual([{ option: 'cmdheight', value: 0 }]);
    expect(REGION_NAMES).toEqual(['background', 'header', 'body', 'footer']);
  });
});
