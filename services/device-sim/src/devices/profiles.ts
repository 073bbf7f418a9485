import type { JsonObject } from '../types.js';
import { Sampler, round } from './sampler.js';

export const DEVICE_KINDS = ['ESP32', 'Arduino', 'Pico', 'STM32', 'Generic'] as const;
export type DeviceKind = (typeof DEVICE_KINDS)[number];

export interface SimDevice {
  readonly id: string;
  readonly kind: DeviceKind;
  next(now: number): JsonObject;
}

export interface DeviceProfile {
  kind: DeviceKind;
  description: string;
  idPrefix: string;
  /** default publish cadence */
  intervalMs: number;
  create(id: string, sampler: Sampler, now: number): SimDevice;
}

// WiFi board on battery: drains slowly, occasionally "reboots" after deep sleep
class Esp32Device implements SimDevice {
  readonly kind = 'ESP32';
  private battery = 3.7;
  private bootCount = 0;
  private bootedAt: number;

  constructor(readonly id: string, private readonly s: Sampler, now: number) {
    this.bootedAt = now;
  }

  next(now: number): JsonObject {
    this.battery = Math.max(3.0, this.battery - this.s.raw(0.001, 0.005));
    if (this.s.chance(0.05)) {
      this.bootCount++;
      this.bootedAt = now;
      this.battery = Math.min(4.2, this.battery + 0.1);
    }
    return {
      device_type: 'ESP32',
      device_id: this.id,
      ts: now,
      sensors: {
        temperature: this.s.uniform(18, 28),
        humidity: this.s.uniform(35, 65),
        pressure: this.s.uniform(980, 1020),
      },
      system: {
        rssi: this.s.int(-90, -30),
        battery_voltage: round(this.battery, 2),
        heap_free: this.s.int(50_000, 150_000),
        boot_count: this.bootCount,
        uptime_sec: Math.floor((now - this.bootedAt) / 1000),
      },
    };
  }
}

class ArduinoDevice implements SimDevice {
  readonly kind = 'Arduino';
  private readonly accelOffset: [number, number, number];

  constructor(readonly id: string, private readonly s: Sampler, private readonly bootedAt: number) {
    this.accelOffset = [s.raw(-0.1, 0.1), s.raw(-0.1, 0.1), s.raw(-0.1, 0.1)];
  }

  next(now: number): JsonObject {
    const [ox, oy, oz] = this.accelOffset;
    return {
      device_type: 'Arduino_Nano_33_IoT',
      device_id: this.id,
      ts: now,
      sensors: {
        temperature: this.s.uniform(19, 26),
        humidity: this.s.uniform(40, 60),
      },
      imu: {
        accel_x: round(this.s.raw(-0.5, 0.5) + ox, 3),
        accel_y: round(this.s.raw(-0.5, 0.5) + oy, 3),
        accel_z: round(this.s.raw(9.5, 10) + oz, 3),
        gyro_x: this.s.uniform(-2, 2, 3),
        gyro_y: this.s.uniform(-2, 2, 3),
        gyro_z: this.s.uniform(-2, 2, 3),
      },
      analog: {
        a0: this.s.int(0, 1023),
        a1: this.s.int(0, 1023),
      },
      system: {
        uptime_ms: now - this.bootedAt,
        free_ram: this.s.int(10_000, 30_000),
      },
    };
  }
}

const PICO_PINS = ['gp0', 'gp1', 'gp2', 'gp3'] as const;

class PicoDevice implements SimDevice {
  readonly kind = 'Pico';
  private motion = false;
  private readonly gpio: Record<(typeof PICO_PINS)[number], boolean> = { gp0: false, gp1: false, gp2: false, gp3: false };

  constructor(readonly id: string, private readonly s: Sampler, private readonly bootedAt: number) {}

  next(now: number): JsonObject {
    if (this.s.chance(0.1)) this.motion = !this.motion;
    if (this.s.chance(0.15)) {
      const pin = this.s.pick(PICO_PINS);
      this.gpio[pin] = !this.gpio[pin];
    }
    return {
      device_type: 'RaspberryPi_Pico_W',
      device_id: this.id,
      ts: now,
      sensors: {
        temperature: this.s.uniform(20, 30),
        motion: this.motion,
        door_open: this.s.chance(0.05) ? this.s.chance(0.5) : false,
        light_level: this.s.int(0, 65_535),
      },
      gpio: { ...this.gpio },
      system: {
        cpu_temp: this.s.uniform(35, 50),
        vsys: this.s.uniform(4.8, 5.2),
        uptime_sec: Math.floor((now - this.bootedAt) / 1000),
      },
    };
  }
}

const MACHINE_STATES = ['idle', 'running', 'maintenance', 'error'] as const;

class Stm32Device implements SimDevice {
  readonly kind = 'STM32';
  private state: (typeof MACHINE_STATES)[number] = 'idle';
  private cycles = 0;
  private errors = 0;

  constructor(readonly id: string, private readonly s: Sampler) {}

  next(now: number): JsonObject {
    if (this.s.chance(0.1)) {
      this.state = this.s.pick(MACHINE_STATES);
      if (this.state === 'running') this.cycles++;
      else if (this.state === 'error') this.errors++;
    }
    return {
      device_type: 'STM32_Industrial',
      device_id: this.id,
      ts: now,
      sensors: {
        temperature: this.s.uniform(15, 85, 3),
        pressure: this.s.uniform(0, 10, 3),
        flow_rate: this.s.uniform(0, 100),
        vibration: this.s.uniform(0, 5, 3),
      },
      analog_inputs: {
        ai0: this.s.int(0, 4095),
        ai1: this.s.int(0, 4095),
        ai2: this.s.int(0, 4095),
        ai3: this.s.int(0, 4095),
      },
      digital_inputs: {
        di0: this.s.chance(0.5),
        di1: this.s.chance(0.5),
        emergency_stop: false,
      },
      machine_state: {
        status: this.state,
        cycle_count: this.cycles,
        error_count: this.errors,
        runtime_hours: this.s.uniform(100, 5000, 1),
      },
      system: {
        core_temp: this.s.uniform(40, 70),
        vdd: this.s.uniform(3.25, 3.35, 3),
        cpu_usage: this.s.int(10, 95),
      },
    };
  }
}

// Bare sensor node: no device_type, so the server files it under "unknown"
class GenericDevice implements SimDevice {
  readonly kind = 'Generic';

  constructor(readonly id: string, private readonly s: Sampler) {}

  next(now: number): JsonObject {
    return {
      ts: now,
      sensors: {
        temperature: this.s.uniform(20, 30),
        humidity: this.s.uniform(40, 55),
        voltage: this.s.uniform(3.1, 3.7),
      },
    };
  }
}

export const PROFILES: Record<DeviceKind, DeviceProfile> = {
  ESP32: {
    kind: 'ESP32',
    description: 'ESP32 with WiFi, battery and environmental sensors',
    idPrefix: 'esp32',
    intervalMs: 10_000,
    create: (id, s, now) => new Esp32Device(id, s, now),
  },
  Arduino: {
    kind: 'Arduino',
    description: 'Arduino Nano 33 IoT with 9-axis IMU',
    idPrefix: 'arduino',
    intervalMs: 15_000,
    create: (id, s, now) => new ArduinoDevice(id, s, now),
  },
  Pico: {
    kind: 'Pico',
    description: 'Raspberry Pi Pico W with GPIO and motion sensors',
    idPrefix: 'pico',
    intervalMs: 8_000,
    create: (id, s, now) => new PicoDevice(id, s, now),
  },
  STM32: {
    kind: 'STM32',
    description: 'Industrial STM32 with high-precision sensors',
    idPrefix: 'stm32',
    intervalMs: 5_000,
    create: (id, s) => new Stm32Device(id, s),
  },
  Generic: {
    kind: 'Generic',
    description: 'Generic IoT sensor node',
    idPrefix: 'device',
    intervalMs: 5_000,
    create: (id, s) => new GenericDevice(id, s),
  },
};
