/**
 * Decoders for Docker Engine API response bodies.
 *
 * Field mapping is fixed per entity; nothing is inferred from the payload.
 */

import { z } from 'zod';
import { Container } from '../models/Container';
import { decode } from '../models/decode';
import { Network } from '../models/Network';
import { IOStats, Stats } from '../models/Stats';

const ApiContainerSchema = z.object({
  Id: z.string(),
  Names: z.array(z.string()).nullish(),
  Status: z.string().default(''),
  Labels: z.record(z.string(), z.string()).nullish(),
});

const ApiNetworkSchema = z.object({
  Id: z.string(),
  Name: z.string().default(''),
  Driver: z.string().default(''),
  Scope: z.string().default(''),
});

const CpuStatsSchema = z.object({
  cpu_usage: z
    .object({
      total_usage: z.number().default(0),
      percpu_usage: z.array(z.number()).nullish(),
    })
    .default({}),
  system_cpu_usage: z.number().default(0),
  online_cpus: z.number().nullish(),
});

const ApiStatsSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  cpu_stats: CpuStatsSchema.default({}),
  precpu_stats: CpuStatsSchema.default({}),
  memory_stats: z
    .object({
      usage: z.number().default(0),
      limit: z.number().default(0),
      stats: z.record(z.string(), z.number()).nullish(),
    })
    .default({}),
  blkio_stats: z
    .object({
      io_service_bytes_recursive: z
        .array(z.object({ op: z.string(), value: z.number() }))
        .nullish(),
    })
    .default({}),
  networks: z
    .record(z.string(), z.object({ rx_bytes: z.number().default(0), tx_bytes: z.number().default(0) }))
    .nullish(),
});

const IdResponseSchema = z.object({ Id: z.string() });

const ExecInspectSchema = z.object({
  ExitCode: z.number().nullable().default(null),
  Running: z.boolean().default(false),
});

export type ExecInspect = z.output<typeof ExecInspectSchema>;

function stripLeadingSlash(name: string): string {
  return name.startsWith('/') ? name.slice(1) : name;
}

export function decodeApiContainer(value: unknown): Container {
  const data = decode(ApiContainerSchema, value, 'container');
  return new Container({
    id: data.Id,
    name: stripLeadingSlash(data.Names?.[0] ?? ''),
    status: data.Status,
    labels: data.Labels ?? {},
  });
}

export function decodeApiContainers(value: unknown): Container[] {
  return decode(z.array(z.unknown()), value, 'container list').map(decodeApiContainer);
}

export function decodeApiNetwork(value: unknown): Network {
  const data = decode(ApiNetworkSchema, value, 'network');
  return new Network({ id: data.Id, name: data.Name, driver: data.Driver, scope: data.Scope });
}

export function decodeApiNetworks(value: unknown): Network[] {
  return decode(z.array(z.unknown()), value, 'network list').map(decodeApiNetwork);
}

/**
 * Decode a one-shot `/containers/{id}/stats?stream=false` sample.
 *
 * CPU usage follows the docker CLI: the share of system CPU time used since
 * the previous sample, scaled by the number of online CPUs. Memory usage
 * excludes the inactive page cache, as the CLI does.
 */
export function decodeApiStats(value: unknown): Stats {
  const data = decode(ApiStatsSchema, value, 'stats');

  const cpu = data.cpu_stats;
  const cpuDelta = cpu.cpu_usage.total_usage - data.precpu_stats.cpu_usage.total_usage;
  const systemDelta = cpu.system_cpu_usage - data.precpu_stats.system_cpu_usage;
  const onlineCpus = cpu.online_cpus ?? cpu.cpu_usage.percpu_usage?.length ?? 1;
  const cpuUsage = cpuDelta > 0 && systemDelta > 0 ? (cpuDelta / systemDelta) * onlineCpus : 0;

  const memory = data.memory_stats;
  const cache = memory.stats?.inactive_file ?? memory.stats?.total_inactive_file ?? 0;
  const memoryUsed = cache < memory.usage ? memory.usage - cache : memory.usage;
  const memoryUsage = memory.limit > 0 ? memoryUsed / memory.limit : 0;

  let read = 0;
  let write = 0;
  for (const entry of data.blkio_stats.io_service_bytes_recursive ?? []) {
    const op = entry.op.toLowerCase();
    if (op === 'read') {
      read += entry.value;
    } else if (op === 'write') {
      write += entry.value;
    }
  }

  const networkIO: IOStats = Object.values(data.networks ?? {}).reduce(
    (total, iface) => ({ in: total.in + iface.rx_bytes, out: total.out + iface.tx_bytes }),
    { in: 0, out: 0 },
  );

  return new Stats({
    containerId: data.id,
    containerName: stripLeadingSlash(data.name),
    cpuUsage,
    memoryUsage,
    diskIO: { in: read, out: write },
    memoryIO: { in: memoryUsed, out: memory.limit },
    networkIO,
  });
}

/** `Id` from a create response (containers, exec instances) */
export function decodeCreatedId(value: unknown, entity: string): string {
  return decode(IdResponseSchema, value, entity).Id;
}

export function decodeExecInspect(value: unknown): ExecInspect {
  return decode(ExecInspectSchema, value, 'exec inspect');
}
