import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/index.js';

describe('loadConfig', () => {
  it('fills every default from an empty environment', () => {
    expect(loadConfig({})).toEqual({
      host: {
        kind: 'http',
        baseUrl: 'http://localhost:5000',
        timeoutMs: 20_000,
        retries: 3,
        retryDelayMs: 1_000,
      },
      fix: { validationRetries: 3, validationDelayMs: 1_000, maxFilletRounds: 20 },
      logLevel: 'info',
      rulesPath: undefined,
      drillsPath: undefined,
      materialsPath: undefined,
      machinesPath: undefined,
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      CAD_HOST: 'memory',
      CAD_HOST_RETRIES: '5',
      FIX_VALIDATION_DELAY_MS: '0',
      DFM_RULES_PATH: '/etc/partcheck/rules.json',
      DFM_MACHINES_PATH: '/etc/partcheck/machines.json',
    });
    expect(config.host.kind).toBe('memory');
    expect(config.host.retries).toBe(5);
    expect(config.fix.validationDelayMs).toBe(0);
    expect(config.rulesPath).toBe('/etc/partcheck/rules.json');
    expect(config.machinesPath).toBe('/etc/partcheck/machines.json');
  });

  it('rejects invalid values, naming the variable', () => {
    expect(() => loadConfig({ CAD_HOST_RETRIES: '0' })).toThrow(/^Invalid configuration: CAD_HOST_RETRIES: /);
    expect(() => loadConfig({ CAD_HOST: 'socket' })).toThrow(/CAD_HOST: /);
    expect(() => loadConfig({ CAD_HOST_URL: 'not a url' })).toThrow(/CAD_HOST_URL/);
  });
});
