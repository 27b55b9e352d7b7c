/**
 * Host options changed for the duration of a presentation, kept as
 * `(option, present, original)` entries so every change can be undone.
 */

import type { OptionValue } from '../host/types';

export interface OverrideSpec {
  option: string;
  value: OptionValue;
}

export interface EnvironmentOverride {
  option: string;
  present: OptionValue;
  original: OptionValue;
}

export interface OptionStore {
  getOption(option: string): OptionValue;
  setOption(option: string, value: OptionValue): void;
}

export const DEFAULT_OVERRIDES: readonly OverrideSpec[] = [{ option: 'cmdheight', value: 0 }];

export class EnvironmentOverrides {
  private entries: EnvironmentOverride[] = [];
  private applied = false;

  constructor(private readonly specs: readonly OverrideSpec[] = DEFAULT_OVERRIDES) {}

  /**
   * Record each option's current value, then set its presentation value.
   * If a set fails, the options already set stay recorded for `restore` and
   * the failure is rethrown.
   */
  apply(store: OptionStore): void {
    if (this.applied) return;
    const pending = this.specs.map((spec) => ({
      option: spec.option,
      present: spec.value,
      original: store.getOption(spec.option),
    }));
    this.entries = [];
    this.applied = true;
    for (const entry of pending) {
      store.setOption(entry.option, entry.present);
      this.entries.push(entry);
    }
  }

  /**
   * Put every recorded option back. Runs once per `apply`; later calls do
   * nothing. An option that fails to restore does not stop the others; the
   * first failure is rethrown after all have been tried.
   */
  restore(store: OptionStore): void {
    if (!this.applied) return;
    this.applied = false;
    let failure: unknown;
    for (const entry of [...this.entries].reverse()) {
      try {
        store.setOption(entry.option, entry.original);
      } catch (e) {
        failure ??= e;
      }
    }
    this.entries = [];
    if (failure !== undefined) throw failure;
  }

  get recorded(): readonly EnvironmentOverride[] {
    return this.entries;
  }
}
