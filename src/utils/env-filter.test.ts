import { describe, expect, it } from 'vitest';
import { buildAmbientEnv, isSensitiveEnvKey } from './env-filter.ts';

describe('env-filter', () => {
  it('should recognize sensitive keys', () => {
    expect(isSensitiveEnvKey('GITHUB_TOKEN')).toBe(true);
    expect(isSensitiveEnvKey('OPENAI_API_KEY')).toBe(true);
    expect(isSensitiveEnvKey('db_password')).toBe(true);
    expect(isSensitiveEnvKey('PATH')).toBe(false);
    expect(isSensitiveEnvKey('TOKENIZER_MODE')).toBe(false);
  });

  it('should drop sensitive keys, secret-carrying keys and unset values', () => {
    const ambient = buildAmbientEnv(
      {
        PATH: '/usr/bin',
        HOME: '/home/ci',
        NPM_TOKEN: 'test-secret',
        RUNNEL_SECRET_DEPLOY_KEY: 'test-secret',
        EMPTY: undefined,
      },
      { secretPrefix: 'RUNNEL_SECRET_' }
    );
    expect(ambient).toEqual({ PATH: '/usr/bin', HOME: '/home/ci' });
  });

  it('should keep allowed keys', () => {
    expect(buildAmbientEnv({ NPM_TOKEN: 'placeholder' }, { allow: ['NPM_TOKEN'] })).toEqual({
      NPM_TOKEN: 'placeholder',
    });
  });
});
