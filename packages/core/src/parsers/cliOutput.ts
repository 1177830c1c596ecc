/**
 * Decoders for docker CLI output.
 *
 * Listing and stats commands run with `--format json`, which prints one JSON
 * object per line. `docker network ls` output in the older
 * "<ID> <Name> <Driver> <Scope>" template form is also understood.
 */

import { z } from 'zod';
import { Container } from '../models/Container';
import { decode, parseJson } from '../models/decode';
import { Network } from '../models/Network';
import { Stats, StatsField, ZERO_IO } from '../models/Stats';
import { ParseError } from '../types/errors';
import { parseFloatLiteral, parseIOStats } from './units';

const CliContainerSchema = z.object({
  ID: z.string(),
  Names: z.string().default(''),
  Status: z.string().default(''),
  Labels: z.string().default(''),
});

const CliNetworkSchema = z.object({
  ID: z.string(),
  Name: z.string().default(''),
  Driver: z.string().default(''),
  Scope: z.string().default(''),
});

const CliStatsSchema = z.object({
  ID: z.string().default(''),
  Name: z.string().default(''),
  CPUPerc: z.unknown(),
  MemPerc: z.unknown(),
  BlockIO: z.string().optional(),
  MemUsage: z.string().optional(),
  NetIO: z.string().optional(),
});

const LEGACY_NETWORK_FIELDS = 4;

/**
 * Non-blank, trimmed lines of command output.
 */
export function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Parse a docker label string: "key=value,key=value".
 * Segments that do not split into exactly two parts on "=" are dropped.
 */
export function parseLabels(input: string): Record<string, string> {
  const labels: Record<string, string> = {};
  if (input === '') {
    return labels;
  }

  for (const pair of input.split(',')) {
    const keyValue = pair.split('=');
    if (keyValue.length === 2) {
      labels[keyValue[0]] = keyValue[1];
    }
  }
  return labels;
}

/**
 * "12.34%" -> 0.1234. Returns undefined when the value is not a
 * non-negative number.
 */
export function parsePercentage(value: unknown): number | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const text = value.trim();
  const parsed = parseFloatLiteral(text.endsWith('%') ? text.slice(0, -1) : text);
  if (parsed === undefined || parsed < 0) {
    return undefined;
  }
  return parsed / 100;
}

export function decodeCliContainer(value: unknown): Container {
  const data = decode(CliContainerSchema, value, 'container');
  return new Container({
    id: data.ID,
    name: data.Names,
    status: data.Status,
    labels: parseLabels(data.Labels),
  });
}

export function decodeCliNetwork(value: unknown): Network {
  const data = decode(CliNetworkSchema, value, 'network');
  return new Network({ id: data.ID, name: data.Name, driver: data.Driver, scope: data.Scope });
}

/**
 * Decode one `docker stats --format json` record.
 *
 * CPU/memory percentages that cannot be read become 0 and are listed in
 * `invalidFields`; a present but malformed I/O column raises ParseError.
 */
export function decodeCliStats(value: unknown): Stats {
  const data = decode(CliStatsSchema, value, 'stats');
  const invalidFields: StatsField[] = [];

  const cpuUsage = parsePercentage(data.CPUPerc);
  if (cpuUsage === undefined) {
    invalidFields.push('cpuUsage');
  }
  const memoryUsage = parsePercentage(data.MemPerc);
  if (memoryUsage === undefined) {
    invalidFields.push('memoryUsage');
  }

  return new Stats({
    containerId: data.ID,
    containerName: data.Name,
    cpuUsage: cpuUsage ?? 0,
    memoryUsage: memoryUsage ?? 0,
    diskIO: data.BlockIO === undefined ? ZERO_IO : parseIOStats(data.BlockIO),
    memoryIO: data.MemUsage === undefined ? ZERO_IO : parseIOStats(data.MemUsage),
    networkIO: data.NetIO === undefined ? ZERO_IO : parseIOStats(data.NetIO),
    invalidFields,
  });
}

export function parseContainerLines(output: string): Container[] {
  return splitLines(output).map((line) => decodeCliContainer(parseJson(line, 'container')));
}

export function parseStatsLines(output: string): Stats[] {
  return splitLines(output).map((line) => decodeCliStats(parseJson(line, 'stats')));
}

/**
 * Decode `docker network ls` output in either JSON-per-line or legacy
 * whitespace-separated form.
 */
export function parseNetworkLines(output: string): Network[] {
  return splitLines(output).map((line) => {
    if (line.startsWith('{')) {
      return decodeCliNetwork(parseJson(line, 'network'));
    }

    const fields = line.split(/\s+/);
    if (fields.length !== LEGACY_NETWORK_FIELDS) {
      throw new ParseError(
        `Expected ${LEGACY_NETWORK_FIELDS} fields in network listing, got ${fields.length}`,
        line,
      );
    }
    const [id, name, driver, scope] = fields;
    return new Network({ id, name, driver, scope });
  });
}
