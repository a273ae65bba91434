// simulator/station.ts
import type { StationStatus, TelemetryEvent } from "../cdk/lambda/validate";

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

const uniform = (random: RandomSource, min: number, max: number) => min + (max - min) * random();
const randomInt = (random: RandomSource, min: number, max: number) => min + Math.floor(random() * (max - min + 1));
const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));
const round1 = (value: number) => Math.round(value * 10) / 10;

export const stationId = (index: number) => `station-${String(index).padStart(2, "0")}`;

/**
 * One simulated battery-swap station. Each tick may finish a charge, perform
 * a swap, drift the climate readings and toggle maintenance mode.
 */
export class SwapStation {
  batteryAvailable: number;
  batteryCharging: number;
  temperature: number;
  humidity: number;
  status: StationStatus = "operational";
  totalSwapsToday: number;
  lastSwapTime: string;

  constructor(
    readonly id: string,
    private readonly random: RandomSource = Math.random,
    private readonly now: () => Date = () => new Date()
  ) {
    this.batteryAvailable = randomInt(random, 8, 15);
    this.batteryCharging = randomInt(random, 2, 6);
    this.temperature = uniform(random, 20, 30);
    this.humidity = uniform(random, 30, 60);
    this.totalSwapsToday = randomInt(random, 0, 50);
    this.lastSwapTime = now().toISOString();
  }

  tick(): void {
    if (this.batteryCharging > 0 && this.random() < 0.2) {
      this.batteryCharging -= 1;
      this.batteryAvailable += 1;
    }

    if (this.batteryAvailable > 0 && this.random() < 0.15) {
      this.batteryAvailable -= 1;
      this.batteryCharging += 1;
      this.totalSwapsToday += 1;
      this.lastSwapTime = this.now().toISOString();
    }

    this.temperature = clamp(this.temperature + uniform(this.random, -0.5, 0.5), 15, 35);
    this.humidity = clamp(this.humidity + uniform(this.random, -2, 2), 20, 80);

    if (this.status === "operational" && this.random() < 0.01) {
      this.status = "maintenance";
    } else if (this.status === "maintenance" && this.random() < 0.1) {
      this.status = "operational";
    }
  }

  telemetry(): TelemetryEvent {
    return {
      device_id: this.id,
      battery_available: this.batteryAvailable,
      battery_charging: this.batteryCharging,
      temperature: round1(this.temperature),
      humidity: round1(this.humidity),
      status: this.status,
      timestamp: this.now().toISOString(),
      total_swaps_today: this.totalSwapsToday,
      last_swap_time: this.lastSwapTime,
    };
  }
}
