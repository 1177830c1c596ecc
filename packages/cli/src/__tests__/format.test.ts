import { describe, it, expect, beforeEach } from 'vitest';
import chalk from 'chalk';
import { Container, Stats, ZERO_IO } from '@harbormaster/core';
import { formatBytes, formatContainers, formatPercent, formatStats, renderTable } from '../format';

describe('format', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  describe('formatBytes', () => {
    it('uses binary units', () => {
      expect(formatBytes(0)).toBe('0 B');
      expect(formatBytes(1023)).toBe('1023 B');
      expect(formatBytes(1536)).toBe('1.5 KiB');
      expect(formatBytes(1048576)).toBe('1.0 MiB');
      expect(formatBytes(5 * 1024 ** 5)).toBe('5120.0 TiB');
    });
  });

  describe('formatPercent', () => {
    it('renders a fraction as a percentage', () => {
      expect(formatPercent(0.4512)).toBe('45.12%');
      expect(formatPercent(0)).toBe('0.00%');
    });
  });

  describe('renderTable', () => {
    it('pads columns to the widest cell and trims line ends', () => {
      expect(renderTable(['A', 'LONG HEADER'], [['value', ''], ['x', 'y']])).toBe('A      LONG HEADER\nvalue\nx      y');
    });
  });

  it('formats containers with short ids', () => {
    const containers = [
      new Container({ id: 'abc', name: 'db', status: 'Exited (0)' }),
      new Container({ id: '0123456789abcdef', name: 'web', status: 'Up', labels: { a: '1', b: '2' } }),
    ];

    expect(formatContainers(containers)).toBe(
      'CONTAINER ID  NAME  STATUS      LABELS\nabc           db    Exited (0)\n0123456789ab  web   Up          a=1,b=2',
    );
  });

  it('dashes percentages listed as invalid', () => {
    const stats = new Stats({
      containerId: 'abc123',
      containerName: 'web',
      cpuUsage: 0.45,
      memoryUsage: 0,
      diskIO: ZERO_IO,
      memoryIO: { in: 1048576, out: 2097152 },
      networkIO: ZERO_IO,
      invalidFields: ['memoryUsage'],
    });

    expect(formatStats([stats]).split('\n')[1]).toBe(
      'abc123     web   45.00%  --     1.0 MiB / 2.0 MiB  0 B / 0 B  0 B / 0 B',
    );
  });
});
