import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, createLogger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  describe('entries', () => {
    it('writes one JSON line with component, event and data', () => {
      const logger = new Logger({ component: 'QuorumManager' });

      logger.info('member_removed', { memberId: '4d2', remaining: 2 });

      expect(capturedOutput).toHaveLength(1);
      expect(capturedOutput[0]?.endsWith('\n')).toBe(true);
      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('QuorumManager');
      expect(parsed.event).toBe('member_removed');
      expect(parsed.data).toEqual({ memberId: '4d2', remaining: 2 });
    });

    it('omits the data field when no data is given', () => {
      const logger = new Logger({ component: 'Monitor' });

      logger.warn('phase_stalled');

      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('writes warn and error levels', () => {
      const logger = new Logger({ component: 'Executor' });

      logger.warn('command_retry');
      logger.error('command_failed');

      expect(parseOutput(0).level).toBe('warn');
      expect(parseOutput(1).level).toBe('error');
    });
  });

  describe('debug mode', () => {
    it('drops debug entries when debugMode is off', () => {
      const logger = new Logger({ component: 'Executor', debugMode: false });

      logger.debug('command_started', { args: ['get', 'bmh'] });

      expect(capturedOutput).toHaveLength(0);
      expect(logger.isDebugEnabled).toBe(false);
    });

    it('writes debug entries when debugMode is on', () => {
      const logger = createLogger('Executor', true);

      logger.debug('command_started', { args: ['get', 'bmh'] });

      expect(parseOutput(0).level).toBe('debug');
    });

    it('passes the debug setting on to child loggers', () => {
      const parent = createLogger('Orchestrator', true);
      const child = parent.child('ResourceManager');

      child.debug('cache_hit');

      const parsed = parseOutput(0);
      expect(parsed.component).toBe('ResourceManager');
      expect(parsed.level).toBe('debug');
    });
  });

  describe('unserializable data', () => {
    it('replaces circular data with a serialization error entry', () => {
      const logger = new Logger({ component: 'TestLogger' });
      const circular: Record<string, unknown> = { name: 'loop' };
      circular.self = circular;

      expect(() => {
        logger.error('circular_data', circular);
      }).not.toThrow();

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('circular_data');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed).not.toHaveProperty('data');
    });

    it('replaces BigInt data with a serialization error entry', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.info('bigint_data', { id: BigInt(10) });

      expect(parseOutput(0).originalData).toBe('[unserializable]');
    });
  });
});
