import { describe, expect, it, vi } from 'vitest';
import { PresentationController } from '../../../src/core/PresentationController';
import { MockHost } from '../helpers/mockHost';

const LINES = ['# One', '# Two', '# Three'];

describe('PresentationController events', () => {
  it('fires start and slidechange when the session starts', () => {
    const controller = new PresentationController(new MockHost());
    const onStart = vi.fn();
    const onChange = vi.fn();
    controller.on('start', (e) => onStart(e.detail.slideCount));
    controller.on('slidechange', (e) => onChange(e.detail.index));

    controller.start(LINES);

    expect(onStart).toHaveBeenCalledWith(3);
    expect(onChange).toHaveBeenCalledWith(1);
  });

  it('fires slidechange via addEventListener', () => {
    const controller = new PresentationController(new MockHost());
    controller.start(LINES);

    const listener = vi.fn();
    controller.addEventListener('slidechange', listener);
    controller.goToSlide(3);

    expect(listener).toHaveBeenCalledOnce();
    const event = listener.mock.calls[0][0] as CustomEvent<{ index: number }>;
    expect(event.detail.index).toBe(3);
  });

  it('does not fire slidechange when the index does not change', () => {
    const controller = new PresentationController(new MockHost());
    controller.start(LINES);

    const listener = vi.fn();
    controller.on('slidechange', listener);
    controller.previous();
    controller.goToSlide(1);

    expect(listener).not.toHaveBeenCalled();
  });

  it('supports the shorthand callbacks', () => {
    const host = new MockHost();
    const onStart = vi.fn();
    const onSlideChange = vi.fn();
    const onResize = vi.fn();
    const onClose = vi.fn();
    const controller = new PresentationController(host, {
      onStart,
      onSlideChange,
      onResize,
      onClose,
    });

    controller.start(LINES);
    controller.next();
    host.resizeTo(40, 20);
    controller.quit();

    expect(onStart).toHaveBeenCalledWith(3);
    expect(onSlideChange.mock.calls).toEqual([[1], [2]]);
    expect(onResize).toHaveBeenCalledOnce();
    expect(onResize.mock.calls[0][0].body.width).toBe(32);
    expect(onClose).toHaveBeenCalledOnce();
  });

  it('fires close once for repeated quits', () => {
    const controller = new PresentationController(new MockHost());
    controller.start(LINES);
    const onClose = vi.fn();
    controller.on('close', onClose);

    controller.quit();
    controller.quit();

    expect(onClose).toHaveBeenCalledOnce();
  });

  it('supports off()', () => {
    const controller = new PresentationController(new MockHost());
    controller.start(LINES);
    const listener = vi.fn();
    controller.on('slidechange', listener).off('slidechange', listener);

    controller.next();
    expect(listener).not.toHaveBeenCalled();
  });

  it('reports write failures through onHostError and keeps going', () => {
    const host = new MockHost();
    const onHostError = vi.fn();
    const controller = new PresentationController(host, { onHostError });
    const failure = new Error('read-only buffer');
    const write = host.writeContent.bind(host);
    vi.spyOn(host, 'writeContent').mockImplementation((surface, lines) => {
      if (surface.id === 2) throw failure;
      write(surface, lines);
    });

    expect(controller.start(LINES)).toEqual({ status: 'applied' });
    expect(onHostError).toHaveBeenCalledWith('header', failure);
    expect(host.footer.lines).toEqual([' 1 / 3 | ']);
  });

  it('reports an option that cannot be changed', () => {
    const host = new MockHost();
    host.options.clear();
    const onHostError = vi.fn();
    const controller = new PresentationController(host, { onHostError });

    expect(controller.start(LINES)).toEqual({ status: 'applied' });
    expect(onHostError).toHaveBeenCalledWith('options', expect.any(Error));
    expect(controller.appliedOverrides).toEqual([]);
  });
});
