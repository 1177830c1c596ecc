import { z } from 'zod';
import { decode } from './decode';

/**
 * Inbound/outbound byte counts.
 */
export interface IOStats {
  readonly in: number;
  readonly out: number;
}

/** Percentage fields that may have been defaulted to 0 */
export type StatsField = 'cpuUsage' | 'memoryUsage';

const IOStatsSchema = z.object({ in: z.number(), out: z.number() }).strict();

export const StatsJsonSchema = z.object({
  containerId: z.string(),
  containerName: z.string(),
  cpuUsage: z.number().nonnegative(),
  memoryUsage: z.number().nonnegative(),
  diskIO: IOStatsSchema,
  memoryIO: IOStatsSchema,
  networkIO: IOStatsSchema,
  invalidFields: z.array(z.enum(['cpuUsage', 'memoryUsage'])).default([]),
});

export type StatsJson = z.output<typeof StatsJsonSchema>;

export interface StatsInit {
  containerId: string;
  containerName: string;
  cpuUsage: number;
  memoryUsage: number;
  diskIO: IOStats;
  memoryIO: IOStats;
  networkIO: IOStats;
  invalidFields?: readonly StatsField[];
}

export const ZERO_IO: IOStats = Object.freeze({ in: 0, out: 0 });

function ioOf(value: IOStats): IOStats {
  return Object.freeze({ in: value.in, out: value.out });
}

function fraction(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function ioEqual(a: IOStats, b: IOStats): boolean {
  return a.in === b.in && a.out === b.out;
}

/**
 * Point-in-time resource usage of one container.
 *
 * `cpuUsage` and `memoryUsage` are fractions (0.45 = 45%), never negative.
 * `invalidFields` names the ones the backend reported in a form that could
 * not be read, which are then 0.
 */
export class Stats {
  readonly containerId: string;
  readonly containerName: string;
  readonly cpuUsage: number;
  readonly memoryUsage: number;
  readonly diskIO: IOStats;
  readonly memoryIO: IOStats;
  readonly networkIO: IOStats;
  readonly invalidFields: readonly StatsField[];

  constructor(init: StatsInit) {
    this.containerId = init.containerId;
    this.containerName = init.containerName;
    this.cpuUsage = fraction(init.cpuUsage);
    this.memoryUsage = fraction(init.memoryUsage);
    this.diskIO = ioOf(init.diskIO);
    this.memoryIO = ioOf(init.memoryIO);
    this.networkIO = ioOf(init.networkIO);
    this.invalidFields = Object.freeze([...(init.invalidFields ?? [])]);
    Object.freeze(this);
  }

  static fromJson(json: unknown): Stats {
    return new Stats(decode(StatsJsonSchema, json, 'stats'));
  }

  /** True when every percentage field was read from the backend */
  get isComplete(): boolean {
    return this.invalidFields.length === 0;
  }

  toJson(): StatsJson {
    return {
      containerId: this.containerId,
      containerName: this.containerName,
      cpuUsage: this.cpuUsage,
      memoryUsage: this.memoryUsage,
      diskIO: { ...this.diskIO },
      memoryIO: { ...this.memoryIO },
      networkIO: { ...this.networkIO },
      invalidFields: [...this.invalidFields],
    };
  }

  with(changes: Partial<StatsInit>): Stats {
    return new Stats({ ...this.toJson(), ...changes });
  }

  equals(other: Stats): boolean {
    return (
      this === other ||
      (other.containerId === this.containerId &&
        other.containerName === this.containerName &&
        other.cpuUsage === this.cpuUsage &&
        other.memoryUsage === this.memoryUsage &&
        ioEqual(other.diskIO, this.diskIO) &&
        ioEqual(other.memoryIO, this.memoryIO) &&
        ioEqual(other.networkIO, this.networkIO) &&
        other.invalidFields.length === this.invalidFields.length &&
        other.invalidFields.every((field) => this.invalidFields.includes(field)))
    );
  }

  toString(): string {
    return `Stats(containerId: ${this.containerId}, containerName: ${this.containerName}, cpuUsage: ${this.cpuUsage}, memoryUsage: ${this.memoryUsage})`;
  }
}
