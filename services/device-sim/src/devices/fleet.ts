import { randomUUID } from 'node:crypto';
import { DEVICE_KINDS, PROFILES, type DeviceKind, type DeviceProfile, type SimDevice } from './profiles.js';
import { Sampler } from './sampler.js';

export const DEFAULT_FLEET = 'ESP32:2,Arduino:2,Pico:2,STM32:1,Generic:3';

export type FleetEntry = { kind: DeviceKind; count: number };

export type FleetMember = {
  device: SimDevice;
  profile: DeviceProfile;
  intervalMs: number;
};

function kindOf(name: string): DeviceKind | undefined {
  const lower = name.toLowerCase();
  return DEVICE_KINDS.find((k) => k.toLowerCase() === lower);
}

/**
 * `ESP32:2,Arduino:1,Generic` → one entry per kind; a missing count means one
 * device and a zero count drops the kind. Unknown kinds are fatal.
 */
export function parseFleet(value: string): FleetEntry[] {
  const byKind = new Map<DeviceKind, number>();
  for (const part of value.split(',')) {
    const item = part.trim();
    if (!item) continue;
    const [name = '', rawCount] = item.split(':').map((s) => s.trim());
    const kind = kindOf(name);
    if (!kind) {
      throw new Error(`unknown device kind "${name}" in SIM_FLEET (expected one of ${DEVICE_KINDS.join(', ')})`);
    }
    const count = rawCount === undefined || rawCount === '' ? 1 : Number(rawCount);
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`invalid device count "${rawCount}" for ${kind} in SIM_FLEET`);
    }
    byKind.set(kind, (byKind.get(kind) ?? 0) + count);
  }
  return [...byKind].filter(([, count]) => count > 0).map(([kind, count]) => ({ kind, count }));
}

export type BuildOptions = {
  intervalScale?: number;
  sampler?: Sampler;
  newId?: () => string;
  now?: number;
};

const shortId = () => randomUUID().replace(/-/g, '').slice(0, 8);

export function buildFleet(entries: FleetEntry[], opts: BuildOptions = {}): FleetMember[] {
  const scale = opts.intervalScale ?? 1;
  const sampler = opts.sampler ?? new Sampler();
  const newId = opts.newId ?? shortId;
  const now = opts.now ?? Date.now();

  const members: FleetMember[] = [];
  for (const { kind, count } of entries) {
    const profile = PROFILES[kind];
    for (let i = 0; i < count; i++) {
      members.push({
        device: profile.create(`${profile.idPrefix}-${newId()}`, sampler, now),
        profile,
        intervalMs: Math.max(50, Math.round(profile.intervalMs * scale)),
      });
    }
  }
  return members;
}
