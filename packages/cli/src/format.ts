/**
 * Table rendering for listing commands.
 */

import chalk from 'chalk';
import type { Container, IOStats, Network, Stats } from '@harbormaster/core';

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
const SHORT_ID_LENGTH = 12;
const COLUMN_GAP = '  ';

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function formatIO(io: IOStats): string {
  return `${formatBytes(io.in)} / ${formatBytes(io.out)}`;
}

/** Fraction to percentage text; 0.4512 -> "45.12%" */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

function shortId(id: string): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

/**
 * Left-aligned columns separated by two spaces, header in bold.
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length)),
  );
  const line = (cells: readonly string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column]))
      .join(COLUMN_GAP)
      .trimEnd();

  return [chalk.bold(line(headers)), ...rows.map(line)].join('\n');
}

export function formatContainers(containers: readonly Container[]): string {
  return renderTable(
    ['CONTAINER ID', 'NAME', 'STATUS', 'LABELS'],
    containers.map((c) => [
      shortId(c.id),
      c.name,
      c.status,
      Object.entries(c.labels)
        .map(([key, value]) => `${key}=${value}`)
        .join(','),
    ]),
  );
}

export function formatNetworks(networks: readonly Network[]): string {
  return renderTable(
    ['NETWORK ID', 'NAME', 'DRIVER', 'SCOPE'],
    networks.map((n) => [shortId(n.id), n.name, n.driver, n.scope]),
  );
}

/**
 * Percentages the backend did not report are shown as "--".
 */
export function formatStats(stats: readonly Stats[]): string {
  return renderTable(
    ['CONTAINER', 'NAME', 'CPU %', 'MEM %', 'MEM USAGE / LIMIT', 'NET I/O', 'BLOCK I/O'],
    stats.map((s) => [
      shortId(s.containerId),
      s.containerName,
      s.invalidFields.includes('cpuUsage') ? '--' : formatPercent(s.cpuUsage),
      s.invalidFields.includes('memoryUsage') ? '--' : formatPercent(s.memoryUsage),
      formatIO(s.memoryIO),
      formatIO(s.networkIO),
      formatIO(s.diskIO),
    ]),
  );
}
