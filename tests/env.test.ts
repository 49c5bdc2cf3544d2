import { describe, it, expect } from 'vitest';
import { createProcessEnvSource, createStaticEnvSource } from '../src/config/env';

describe('env', () => {
  describe('createStaticEnvSource', () => {
    it('returns set values and undefined for missing ones', () => {
      const env = createStaticEnvSource({ A: '1', C: undefined });
      expect(env.lookup('A')).toBe('1');
      expect(env.lookup('C')).toBeUndefined();
      expect(env.lookup('MISSING')).toBeUndefined();
    });

    it('keeps empty strings distinct from absence', () => {
      const env = createStaticEnvSource({ EMPTY: '' });
      expect(env.lookup('EMPTY')).toBe('');
    });

    it('is not affected by later changes to the input record', () => {
      const vars: Record<string, string> = { A: 'before' };
      const env = createStaticEnvSource(vars);
      vars.A = 'after';
      expect(env.lookup('A')).toBe('before');
    });
  });

  describe('createProcessEnvSource', () => {
    it('reflects variables set after creation', () => {
      const vars: NodeJS.ProcessEnv = {};
      const env = createProcessEnvSource(vars);
      expect(env.lookup('LATE')).toBeUndefined();
      vars.LATE = 'now';
      expect(env.lookup('LATE')).toBe('now');
    });

    it('ignores inherited object properties', () => {
      const env = createProcessEnvSource({});
      expect(env.lookup('toString')).toBeUndefined();
    });

    it('defaults to process.env', () => {
      process.env.AGENT_TEMPLATE_ENV_PROBE = 'probe';
      try {
        expect(createProcessEnvSource().lookup('AGENT_TEMPLATE_ENV_PROBE')).toBe('probe');
      } finally {
        delete process.env.AGENT_TEMPLATE_ENV_PROBE;
      }
    });
  });
});
