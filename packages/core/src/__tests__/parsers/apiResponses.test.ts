import { describe, it, expect } from 'vitest';
import {
  decodeApiContainers,
  decodeApiNetworks,
  decodeApiStats,
  decodeCreatedId,
  decodeExecInspect,
} from '../../parsers/apiResponses';
import { ParseError } from '../../types/errors';

describe('apiResponses', () => {
  describe('decodeApiContainers', () => {
    it('maps Id, first name, status and labels', () => {
      const [container] = decodeApiContainers([
        { Id: 'abc123', Names: ['/web'], Status: 'Up 5 seconds', Labels: { tier: 'web' }, Image: 'nginx' },
      ]);

      expect(container.toJson()).toEqual({
        id: 'abc123',
        name: 'web',
        status: 'Up 5 seconds',
        labels: { tier: 'web' },
      });
    });

    it('tolerates null names and labels', () => {
      const [container] = decodeApiContainers([{ Id: 'abc123', Names: null, Labels: null }]);
      expect(container.name).toBe('');
      expect(container.labels).toEqual({});
    });

    it('raises ParseError when the body is not a list', () => {
      expect(() => decodeApiContainers({ message: 'nope' })).toThrow(ParseError);
    });
  });

  describe('decodeApiNetworks', () => {
    it('maps the fixed fields', () => {
      const networks = decodeApiNetworks([{ Id: 'n1', Name: 'bridge', Driver: 'bridge', Scope: 'local' }]);
      expect(networks[0].toJson()).toEqual({ id: 'n1', name: 'bridge', driver: 'bridge', scope: 'local' });
    });
  });

  describe('decodeApiStats', () => {
    it('computes usage from raw counters', () => {
      const stats = decodeApiStats({
        id: 'abc123',
        name: '/web',
        cpu_stats: { cpu_usage: { total_usage: 400 }, system_cpu_usage: 2000, online_cpus: 2 },
        precpu_stats: { cpu_usage: { total_usage: 200 }, system_cpu_usage: 1000 },
        memory_stats: { usage: 600, limit: 1000, stats: { inactive_file: 100 } },
        blkio_stats: {
          io_service_bytes_recursive: [
            { op: 'Read', value: 10 },
            { op: 'write', value: 5 },
            { op: 'Read', value: 2 },
            { op: 'Total', value: 17 },
          ],
        },
        networks: {
          eth0: { rx_bytes: 100, tx_bytes: 50 },
          eth1: { rx_bytes: 1, tx_bytes: 2 },
        },
      });

      expect(stats.containerId).toBe('abc123');
      expect(stats.containerName).toBe('web');
      expect(stats.cpuUsage).toBeCloseTo(0.4, 10);
      expect(stats.memoryUsage).toBe(0.5);
      expect(stats.diskIO).toEqual({ in: 12, out: 5 });
      expect(stats.memoryIO).toEqual({ in: 500, out: 1000 });
      expect(stats.networkIO).toEqual({ in: 101, out: 52 });
    });

    it('falls back to the per-CPU list when online_cpus is absent', () => {
      const stats = decodeApiStats({
        cpu_stats: { cpu_usage: { total_usage: 300, percpu_usage: [1, 1, 1, 1] }, system_cpu_usage: 1100 },
        precpu_stats: { cpu_usage: { total_usage: 100 }, system_cpu_usage: 100 },
      });
      expect(stats.cpuUsage).toBeCloseTo(0.8, 10);
    });

    it('reports zero for an empty first sample', () => {
      const stats = decodeApiStats({});
      expect(stats.cpuUsage).toBe(0);
      expect(stats.memoryUsage).toBe(0);
      expect(stats.networkIO).toEqual({ in: 0, out: 0 });
    });
  });

  describe('decodeCreatedId', () => {
    it('returns the Id', () => {
      expect(decodeCreatedId({ Id: 'abc123', Warnings: [] }, 'container')).toBe('abc123');
    });

    it('raises ParseError without one', () => {
      expect(() => decodeCreatedId({}, 'exec')).toThrow('Invalid exec payload at Id');
    });
  });

  describe('decodeExecInspect', () => {
    it('defaults a missing exit code to null', () => {
      expect(decodeExecInspect({ Running: true })).toEqual({ ExitCode: null, Running: true });
      expect(decodeExecInspect({ ExitCode: 3 })).toEqual({ ExitCode: 3, Running: false });
    });
  });
});
