import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { buildLimiter, buildServices } from '../../src/pipeline/factory';
import { ConfigurationError } from '../../src/utils/errors';

describe('buildServices', () => {
  const config = loadConfig({});

  it('uses the limiter it is given', () => {
    const limiter = buildLimiter(config);
    expect(buildServices(config, 'fotovoltaico', limiter).limiter).toBe(limiter);
  });

  it('creates its own limiter when none is given', () => {
    const limiter = buildLimiter(config);
    expect(buildServices(config, 'fotovoltaico').limiter).not.toBe(limiter);
  });

  it('rejects an unknown industry', () => {
    expect(() => buildServices(config, 'astronautica')).toThrow(ConfigurationError);
  });
});
