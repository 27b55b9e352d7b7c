import { PresentationController } from './PresentationController';
import type { OperationResult, PresentationOptions } from './PresentationController';
import type { PresentationHost } from '../host/types';

/** `sourceLabel` is only used when the host cannot describe the source. */
export type PresenterOptions = PresentationOptions;

/**
 * Entry point a host shell keeps around: reads a document through the host
 * and runs at most one presentation of it at a time.
 */
export class Presenter<TSource = unknown, TSurface = unknown> {
  private readonly host: PresentationHost<TSource, TSurface>;
  private readonly options: PresenterOptions;
  private controller: PresentationController<TSurface> | null = null;

  constructor(host: PresentationHost<TSource, TSurface>, options?: PresenterOptions) {
    this.host = host;
    this.options = options ?? {};
  }

  /**
   * Present `source`. A session that is still running is closed first.
   * Returns the controller of the new session. If the host could not open
   * the body surface the controller comes back already `closed` (see
   * `state`), and `active` stays null.
   */
  start(source: TSource): PresentationController<TSurface> {
    this.stop();

    const lines = this.host.readLines(source);
    const sourceLabel = this.host.describeSource?.(source) || this.options.sourceLabel || '';
    const controller = new PresentationController(this.host, { ...this.options, sourceLabel });
    controller.on('close', () => {
      if (this.controller === controller) {
        this.controller = null;
      }
    });

    this.controller = controller;
    controller.start(lines);
    return controller;
  }

  /** Quit the running session, if any. */
  stop(): OperationResult {
    const controller = this.controller;
    this.controller = null;
    return controller ? controller.quit() : { status: 'applied' };
  }

  get active(): PresentationController<TSurface> | null {
    return this.controller?.isActive ? this.controller : null;
  }
}
