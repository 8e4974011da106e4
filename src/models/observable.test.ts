import { describe, it, expect, beforeEach } from 'vitest';
import { ObservableObject } from './observable.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class Dial extends ObservableObject<{ level: number; label: string }, 'isMuted'> {
  constructor() {
    super({ level: 5, label: 'volume' });
  }

  get level(): number {
    return this.getProperty('level');
  }

  setLevel(value: number): boolean {
    const changed = this.setProperty('level', value);
    if (changed) this.raisePropertyChanged('isMuted');
    return changed;
  }

  setLabel(value: string): boolean {
    return this.setProperty('label', value);
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ObservableObject', () => {
  let dial: Dial;
  let events: string[];

  beforeEach(() => {
    dial = new Dial();
    events = [];
    dial.onPropertyChanged((name) => events.push(name));
  });

  it('assigns and notifies when the value differs', () => {
    expect(dial.setLabel('gain')).toBe(true);
    expect(events).toEqual(['label']);
  });

  it('is a no-op for an equal value', () => {
    expect(dial.setLabel('volume')).toBe(false);
    expect(events).toEqual([]);
  });

  it('publishes derived properties after the backing one', () => {
    dial.setLevel(0);
    expect(dial.level).toBe(0);
    expect(events).toEqual(['level', 'isMuted']);
  });

  it('treats NaN as equal to itself', () => {
    dial.setLevel(Number.NaN);
    dial.setLevel(Number.NaN);
    expect(events).toEqual(['level', 'isMuted']);
  });

  it('runs listeners before the setter returns, with the new value visible', () => {
    const seen: number[] = [];
    dial.onPropertyChanged((name) => {
      if (name === 'level') seen.push(dial.level);
    });
    dial.setLevel(7);
    expect(seen).toEqual([7]);
  });

  it('stops notifying after unsubscribe', () => {
    const other: string[] = [];
    const unsubscribe = dial.onPropertyChanged((name) => other.push(name));
    dial.setLabel('a');
    unsubscribe();
    dial.setLabel('b');
    expect(other).toEqual(['label']);
    expect(events).toEqual(['label', 'label']);
  });
});
