// tests/event-bus.test.ts — Typed event bus

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventBus } from '../src/engine/event-bus.js';
import type { CombatEvent } from '../src/types/index.js';

const defeated: CombatEvent = { type: 'defeated', entityId: 'enemy_1', overkill: 4, sourceId: 'player_1' };
const restored: CombatEvent = { type: 'energy_restored', entityId: 'player_1', amount: 30 };

describe('EventBus', () => {
  let bus: EventBus<CombatEvent>;

  beforeEach(() => {
    bus = new EventBus<CombatEvent>();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers events only to handlers of the matching type', () => {
    const overkills: number[] = [];
    const amounts: number[] = [];
    bus.on('defeated', (event) => overkills.push(event.overkill));
    bus.on('energy_restored', (event) => amounts.push(event.amount));

    bus.emit(defeated);
    bus.emit(restored);

    expect(overkills).toEqual([4]);
    expect(amounts).toEqual([30]);
  });

  it('unsubscribe stops delivery and is safe to call twice', () => {
    const handler = vi.fn();
    const unsubscribe = bus.on('defeated', handler);

    bus.emit(defeated);
    unsubscribe();
    unsubscribe();
    bus.emit(defeated);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(bus.listenerCount('defeated')).toBe(0);
  });

  it('once handlers fire a single time', () => {
    const handler = vi.fn();
    bus.once('energy_restored', handler);

    bus.emit(restored);
    bus.emit(restored);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(restored);
  });

  it('onAny sees every event after the typed handlers', () => {
    const order: string[] = [];
    bus.onAny((event) => order.push(`any:${event.type}`));
    bus.on('defeated', () => order.push('typed:defeated'));

    bus.emit(defeated);
    bus.emit(restored);

    expect(order).toEqual(['typed:defeated', 'any:defeated', 'any:energy_restored']);
  });

  it('a throwing handler is logged and does not stop the others', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const after = vi.fn();
    bus.on('defeated', () => {
      throw new Error('listener failed');
    });
    bus.on('defeated', after);

    expect(() => bus.emit(defeated)).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe("[combat] Unhandled 'defeated' event handler error");
  });

  it('listenerCount totals typed and any listeners', () => {
    bus.on('defeated', () => {});
    bus.on('defeated', () => {});
    bus.on('exhausted', () => {});
    bus.onAny(() => {});

    expect(bus.listenerCount('defeated')).toBe(2);
    expect(bus.listenerCount()).toBe(4);

    bus.clear();
    expect(bus.listenerCount()).toBe(0);
  });
});
