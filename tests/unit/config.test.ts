import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_POLICY,
  checkPolicyConsistency,
  loadPolicyConfig,
  parsePolicyConfig,
  resolvePolicyPath,
} from '@/core/config';
import { loadEnvConfig } from '@/core/env';

let tempDir: string;
const originalEnv: Record<string, string | undefined> = {};
const ENV_KEYS = ['POLICY_CONFIG', 'AUDIT_DB_PATH', 'LOG_LEVEL', 'NODE_ENV'];

function writePolicy(dir: string, content: string, file: string = 'policy.json'): string {
  const configDir = join(dir, 'config');
  mkdirSync(configDir, { recursive: true });
  const path = join(configDir, file);
  writeFileSync(path, content);
  return path;
}

describe('policy config', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'policy-test-'));
    ENV_KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    ENV_KEYS.forEach((key) => {
      const value = originalEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    });
  });

  describe('DEFAULT_POLICY', () => {
    it('is internally consistent', () => {
      expect(checkPolicyConsistency(DEFAULT_POLICY)).toEqual([]);
    });

    it('forbids every sell-side to buy-side transition and the reverse', () => {
      expect(DEFAULT_POLICY.forbiddenTransitions).toHaveLength(8);
      expect(DEFAULT_POLICY.forbiddenTransitions).toContainEqual(['STRONG_SELL', 'STRONG_BUY']);
      expect(DEFAULT_POLICY.forbiddenTransitions).toContainEqual(['BUY', 'SELL']);
      expect(DEFAULT_POLICY.forbiddenTransitions.flat()).not.toContain('HOLD');
    });

    it('is frozen', () => {
      expect(Object.isFrozen(DEFAULT_POLICY)).toBe(true);
      expect(Object.isFrozen(DEFAULT_POLICY.weightRanges.sentiment)).toBe(true);
    });
  });

  describe('parsePolicyConfig', () => {
    it('returns the defaults for an empty document', () => {
      expect(parsePolicyConfig({})).toEqual(DEFAULT_POLICY);
    });

    it('merges partial sections over the defaults', () => {
      const policy = parsePolicyConfig({
        sentiment_adjustment_cap: 10,
        impact_ceilings: { weight: 8 },
        weight_ranges: { sentiment: [0.15, 0.25] },
      });
      expect(policy.sentimentAdjustmentCap).toBe(10);
      expect(policy.impactCeilings).toEqual({ weight: 8, sentiment: 3, both: 12 });
      expect(policy.weightRanges.sentiment).toEqual({ min: 0.15, max: 0.25 });
      expect(policy.weightRanges.fundamental).toEqual({ min: 0.35, max: 0.55 });
    });

    it('rejects documents that fail the schema', () => {
      expect(() => parsePolicyConfig({ sentiment_adjustment_cap: 'fifteen' })).toThrow(
        /^policy_invalid_schema: /
      );
      expect(() => parsePolicyConfig({ unknown_key: 1 })).toThrow(/^policy_invalid_schema: /);
    });

    it('rejects base weights that do not sum to one', () => {
      expect(() =>
        parsePolicyConfig({ base_weights: { fundamental: 0.5, technical: 0.3, sentiment: 0.3 } })
      ).toThrow('policy_inconsistent: base_weights must sum to 1.0');
    });

    it('rejects recommendation bounds out of order', () => {
      expect(() =>
        parsePolicyConfig({
          recommendation_bounds: [
            [30, 'HOLD'],
            [70, 'BUY'],
            [0, 'SELL'],
          ],
        })
      ).toThrow('policy_inconsistent: recommendation_bounds must be strictly descending');
    });

    it('rejects recommendation bounds that leave percentiles uncovered', () => {
      expect(() =>
        parsePolicyConfig({
          recommendation_bounds: [
            [50, 'BUY'],
            [10, 'SELL'],
          ],
        })
      ).toThrow('policy_inconsistent: recommendation_bounds must end with a bound of 0');
    });
  });

  describe('loadPolicyConfig', () => {
    it('falls back to the defaults without a policy file', () => {
      expect(loadPolicyConfig(tempDir)).toBe(DEFAULT_POLICY);
    });

    it('reads config/policy.json', () => {
      writePolicy(tempDir, JSON.stringify({ sentiment_adjustment_cap: 12 }));
      expect(loadPolicyConfig(tempDir).sentimentAdjustmentCap).toBe(12);
    });

    it('honours POLICY_CONFIG relative to the project root', () => {
      writePolicy(tempDir, JSON.stringify({ extreme_override: { threshold: 20 } }), 'strict.json');
      process.env.POLICY_CONFIG = 'config/strict.json';
      expect(resolvePolicyPath(tempDir)).toBe(join(tempDir, 'config', 'strict.json'));
      expect(loadPolicyConfig(tempDir).extremeOverride.threshold).toBe(20);
    });

    it('reports unreadable JSON with its path', () => {
      const path = writePolicy(tempDir, '{ not json');
      expect(() => loadPolicyConfig(tempDir)).toThrow(`policy_invalid_json: ${path}`);
    });

    it('ships a policy file equal to the defaults', () => {
      expect(loadPolicyConfig(process.cwd())).toEqual(DEFAULT_POLICY);
    });
  });

  describe('loadEnvConfig', () => {
    it('defaults the audit database under data/', () => {
      const env = loadEnvConfig(tempDir);
      expect(env.auditDbPath).toBe(join(tempDir, 'data', 'overrides.db'));
      expect(env.policyConfigPath).toBeNull();
      expect(env.logLevel).toBe('info');
      expect(env.nodeEnv).toBe('development');
    });

    it('stays silent under test unless a level is set', () => {
      process.env.NODE_ENV = 'test';
      expect(loadEnvConfig(tempDir).logLevel).toBe('silent');
      process.env.LOG_LEVEL = 'warn';
      expect(loadEnvConfig(tempDir).logLevel).toBe('warn');
    });

    it('reads overrides from the environment', () => {
      process.env.AUDIT_DB_PATH = '/var/tmp/audit.db';
      process.env.LOG_LEVEL = 'debug';
      const env = loadEnvConfig(tempDir);
      expect(env.auditDbPath).toBe('/var/tmp/audit.db');
      expect(env.logLevel).toBe('debug');
    });

    it('ignores unknown log levels', () => {
      process.env.LOG_LEVEL = 'chatty';
      expect(loadEnvConfig(tempDir).logLevel).toBe('info');
    });
  });
});
