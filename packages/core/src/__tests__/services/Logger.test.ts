import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createLogger, createNullLogger } from '../../services/Logger';

describe('Logger', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'harbormaster-logger-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes JSON lines to the log file', () => {
    const file = path.join(tempDir, 'logs', 'harbormaster.log');
    const logger = createLogger({ level: 'debug', file, stderr: false });

    logger.child({ component: 'Test' }).debug({ operation: 'ps' }, 'Invoking docker');

    const [line] = fs.readFileSync(file, 'utf-8').trim().split('\n');
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({ level: 20, component: 'Test', operation: 'ps', msg: 'Invoking docker' });
  });

  it('filters below the configured level', () => {
    const file = path.join(tempDir, 'warn.log');
    const logger = createLogger({ level: 'warn', file, stderr: false });

    logger.info('ignored');
    logger.warn('kept');

    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('"msg":"kept"');
  });

  it('is silent when asked to be or given nowhere to write', () => {
    expect(createLogger({ level: 'silent' }).level).toBe('silent');
    expect(createLogger({ stderr: false }).level).toBe('silent');
    expect(createNullLogger().isLevelEnabled('error')).toBe(false);
  });
});
