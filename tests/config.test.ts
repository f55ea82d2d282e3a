import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/core/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      BOARDROOM_DB_PATH: '.boardroom/boardroom.sqlite',
      BOARDROOM_LOG_LEVEL: 'info'
    });
  });

  it('reads values from the environment', () => {
    const cfg = loadConfig({ BOARDROOM_DB_PATH: ':memory:', BOARDROOM_LOG_LEVEL: 'debug' });

    expect(cfg.BOARDROOM_DB_PATH).toBe(':memory:');
    expect(cfg.BOARDROOM_LOG_LEVEL).toBe('debug');
  });

  it('names the failing key', () => {
    expect(() => loadConfig({ BOARDROOM_LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration:\nBOARDROOM_LOG_LEVEL: /);
  });
});
