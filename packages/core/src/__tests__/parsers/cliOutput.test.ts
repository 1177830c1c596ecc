import { describe, it, expect } from 'vitest';
import {
  decodeCliStats,
  parseContainerLines,
  parseLabels,
  parseNetworkLines,
  parsePercentage,
  parseStatsLines,
  splitLines,
} from '../../parsers/cliOutput';
import { Network } from '../../models/Network';
import { ParseError } from '../../types/errors';

describe('cliOutput', () => {
  describe('splitLines', () => {
    it('drops blank lines and trims', () => {
      expect(splitLines('a\n\n  b \r\n\n')).toEqual(['a', 'b']);
    });
  });

  describe('parseLabels', () => {
    it('drops segments that are not key=value', () => {
      expect(parseLabels('env=prod,broken,tier=web')).toEqual({ env: 'prod', tier: 'web' });
    });

    it('drops segments with more than one "="', () => {
      expect(parseLabels('a=b=c,d=e')).toEqual({ d: 'e' });
    });

    it('returns an empty record for empty input', () => {
      expect(parseLabels('')).toEqual({});
    });
  });

  describe('parsePercentage', () => {
    it('converts to a fraction', () => {
      expect(parsePercentage('12.34%')).toBeCloseTo(0.1234, 10);
      expect(parsePercentage('0.00%')).toBe(0);
    });

    it('rejects unparseable, negative and non-string values', () => {
      expect(parsePercentage('bad')).toBeUndefined();
      expect(parsePercentage('-1%')).toBeUndefined();
      expect(parsePercentage('--')).toBeUndefined();
      expect(parsePercentage(45)).toBeUndefined();
    });
  });

  describe('parseContainerLines', () => {
    it('decodes JSON-per-line listings', () => {
      const output = [
        '{"ID":"abc123","Names":"web","Status":"Up 2 minutes","Labels":"utopia-created=1700000000000,tier=web"}',
        '',
        '{"ID":"def456","Names":"db","Status":"Exited (0) 1 hour ago","Labels":""}',
      ].join('\n');

      const containers = parseContainerLines(output);

      expect(containers).toHaveLength(2);
      expect(containers[0].toJson()).toEqual({
        id: 'abc123',
        name: 'web',
        status: 'Up 2 minutes',
        labels: { 'utopia-created': '1700000000000', tier: 'web' },
      });
      expect(containers[1].labels).toEqual({});
    });

    it('raises ParseError on malformed JSON', () => {
      expect(() => parseContainerLines('{"ID":')).toThrow(ParseError);
    });

    it('raises ParseError when the ID is missing', () => {
      expect(() => parseContainerLines('{"Names":"web"}')).toThrow('Invalid container payload at ID');
    });
  });

  describe('decodeCliStats', () => {
    it('defaults an unreadable percentage to 0 and flags it', () => {
      const stats = decodeCliStats({ CPUPerc: '45.00%', MemPerc: 'bad' });

      expect(stats.cpuUsage).toBeCloseTo(0.45, 10);
      expect(stats.memoryUsage).toBe(0);
      expect(stats.invalidFields).toEqual(['memoryUsage']);
      expect(stats.isComplete).toBe(false);
      expect(stats.diskIO).toEqual({ in: 0, out: 0 });
    });

    it('decodes a full record', () => {
      const stats = decodeCliStats({
        ID: 'abc123',
        Name: 'web',
        CPUPerc: '1.50%',
        MemPerc: '25.00%',
        BlockIO: '4kB / 0B',
        MemUsage: '256MiB / 1GiB',
        NetIO: '1.2kB / 648B',
      });

      expect(stats.containerId).toBe('abc123');
      expect(stats.containerName).toBe('web');
      expect(stats.cpuUsage).toBeCloseTo(0.015, 10);
      expect(stats.memoryUsage).toBe(0.25);
      expect(stats.diskIO).toEqual({ in: 4000, out: 0 });
      expect(stats.memoryIO).toEqual({ in: 268435456, out: 1073741824 });
      expect(stats.networkIO.in).toBeCloseTo(1200, 6);
      expect(stats.networkIO.out).toBe(648);
      expect(stats.isComplete).toBe(true);
    });

    it('raises on a malformed I/O column', () => {
      expect(() => decodeCliStats({ CPUPerc: '1%', MemPerc: '1%', NetIO: 'garbage' })).toThrow(ParseError);
    });
  });

  describe('parseStatsLines', () => {
    it('decodes every line', () => {
      const output = '{"ID":"a","CPUPerc":"10%","MemPerc":"20%"}\n{"ID":"b","CPUPerc":"--","MemPerc":"--"}\n';
      const stats = parseStatsLines(output);

      expect(stats.map((s) => s.containerId)).toEqual(['a', 'b']);
      expect(stats[1].invalidFields).toEqual(['cpuUsage', 'memoryUsage']);
    });
  });

  describe('parseNetworkLines', () => {
    it('decodes JSON lines', () => {
      const networks = parseNetworkLines('{"ID":"n1","Name":"bridge","Driver":"bridge","Scope":"local"}');
      expect(networks[0].equals(new Network({ id: 'n1', name: 'bridge', driver: 'bridge', scope: 'local' }))).toBe(
        true,
      );
    });

    it('decodes the legacy whitespace-separated form', () => {
      const networks = parseNetworkLines('f00d   backend   bridge   local\n\n0bad host host local');
      expect(networks.map((n) => n.toJson())).toEqual([
        { id: 'f00d', name: 'backend', driver: 'bridge', scope: 'local' },
        { id: '0bad', name: 'host', driver: 'host', scope: 'local' },
      ]);
    });

    it('raises ParseError on a wrong field count', () => {
      expect(() => parseNetworkLines('f00d backend bridge')).toThrow(
        'Expected 4 fields in network listing, got 3',
      );
    });
  });
});
