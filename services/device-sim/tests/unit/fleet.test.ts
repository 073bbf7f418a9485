import { describe, it, expect } from 'vitest';
import { buildFleet, parseFleet, DEFAULT_FLEET } from '../../src/devices/fleet.js';
import { Sampler } from '../../src/devices/sampler.js';

describe('parseFleet', () => {
  it('reads kinds and counts case-insensitively', () => {
    expect(parseFleet('ESP32:2, arduino:1,Generic')).toEqual([
      { kind: 'ESP32', count: 2 },
      { kind: 'Arduino', count: 1 },
      { kind: 'Generic', count: 1 },
    ]);
  });

  it('merges repeated kinds and drops zero counts', () => {
    expect(parseFleet('ESP32:2,STM32:0,esp32:1')).toEqual([{ kind: 'ESP32', count: 3 }]);
    expect(parseFleet('')).toEqual([]);
  });

  it('rejects unknown kinds and bad counts', () => {
    expect(() => parseFleet('Toaster:1')).toThrow('unknown device kind "Toaster"');
    expect(() => parseFleet('ESP32:x')).toThrow('invalid device count "x" for ESP32');
    expect(() => parseFleet('Pico:-1')).toThrow('invalid device count "-1" for Pico');
  });

  it('describes ten devices by default', () => {
    expect(parseFleet(DEFAULT_FLEET).reduce((n, e) => n + e.count, 0)).toBe(10);
  });
});

describe('buildFleet', () => {
  it('creates prefixed devices on scaled intervals', () => {
    let n = 0;
    const fleet = buildFleet(
      [
        { kind: 'ESP32', count: 2 },
        { kind: 'Generic', count: 1 },
      ],
      { intervalScale: 0.1, sampler: new Sampler(() => 0.5), newId: () => String(++n), now: 0 },
    );

    expect(fleet.map((m) => m.device.id)).toEqual(['esp32-1', 'esp32-2', 'device-3']);
    expect(fleet.map((m) => m.intervalMs)).toEqual([1000, 1000, 500]);
    expect(fleet.map((m) => m.profile.kind)).toEqual(['ESP32', 'ESP32', 'Generic']);
  });

  it('never schedules faster than 50ms', () => {
    const [member] = buildFleet([{ kind: 'STM32', count: 1 }], { intervalScale: 0.0001 });
    expect(member?.intervalMs).toBe(50);
  });
});
