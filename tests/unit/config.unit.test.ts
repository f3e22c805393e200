import { BUNDLED_TEMPLATES_DIR, loadConfig } from '../../src/config.js';
import { ValidationError } from '../../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      EMIT_LOCK: false,
      LOG_LEVEL: 'info',
      NODE_ENV: 'development',
      TEMPLATES_DIR: BUNDLED_TEMPLATES_DIR,
    });
  });

  it.each([
    { expected: true, value: 'true' },
    { expected: true, value: '1' },
    { expected: false, value: 'false' },
    { expected: false, value: '0' },
  ])('parses EMIT_LOCK=$value', ({ value, expected }) => {
    expect(loadConfig({ EMIT_LOCK: value }).EMIT_LOCK).toBe(expected);
  });

  it('accepts a custom templates directory', () => {
    expect(loadConfig({ TEMPLATES_DIR: '/srv/templates' }).TEMPLATES_DIR).toBe('/srv/templates');
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/root', LOG_LEVEL: 'debug' }).LOG_LEVEL).toBe('debug');
  });

  it('names every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ EMIT_LOCK: 'yes', LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ exitCode: 2 });
    if (caught instanceof ValidationError) {
      expect(caught.details?.map(d => d.path)).toEqual([['EMIT_LOCK'], ['LOG_LEVEL']]);
      expect(caught.message.split('\n')[0]).toBe('Invalid environment variables:');
    }
  });
});
