import { EventEmitter } from 'node:events';

const PROPERTY_CHANGED = 'propertyChanged';

/** Callback invoked with the name of the property that changed. */
export type PropertyChangedListener<N extends string> = (propertyName: N) => void;

/**
 * Base class for entities whose fields notify subscribers on change.
 *
 * `P` describes the observable backing fields; `D` names derived properties
 * that have no backing field but still publish change events.
 *
 * Notification is synchronous: listeners run inline before the setter
 * returns. A listener must not assign the property it is reacting to.
 */
export abstract class ObservableObject<P extends object, D extends string = never> {
  private readonly emitter = new EventEmitter();
  private readonly fields: P;

  protected constructor(initial: P) {
    this.fields = { ...initial };
  }

  /**
   * Subscribe to property changes. Returns a function that removes the
   * listener again.
   */
  onPropertyChanged(listener: PropertyChangedListener<Extract<keyof P, string> | D>): () => void {
    this.emitter.on(PROPERTY_CHANGED, listener);
    return () => {
      this.emitter.off(PROPERTY_CHANGED, listener);
    };
  }

  protected getProperty<K extends Extract<keyof P, string>>(name: K): P[K] {
    return this.fields[name];
  }

  /**
   * Assign a backing field and raise a change event for it.
   *
   * @returns `false` when the value is identical to the current one (nothing is
   *   assigned and no event fires), `true` otherwise.
   */
  protected setProperty<K extends Extract<keyof P, string>>(name: K, value: P[K]): boolean {
    if (Object.is(this.fields[name], value)) {
      return false;
    }
    this.fields[name] = value;
    this.raisePropertyChanged(name);
    return true;
  }

  /** Publish a change for a property, backed or derived. */
  protected raisePropertyChanged(name: Extract<keyof P, string> | D): void {
    this.emitter.emit(PROPERTY_CHANGED, name);
  }
}
