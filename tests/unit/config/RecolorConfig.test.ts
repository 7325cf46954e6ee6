import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadEnvConfig, resolveConfig } from '../../../src/config/RecolorConfig.js';

describe('RecolorConfig', () => {
  describe('loadEnvConfig', () => {
    it('returns nothing for an empty environment', () => {
      expect(loadEnvConfig({})).toEqual({});
    });

    it('reads the log level from RECOLOR_LOG', () => {
      expect(loadEnvConfig({ RECOLOR_LOG: 'info' })).toEqual({ logLevel: 'info' });
      expect(loadEnvConfig({ RECOLOR_LOG: ' DEBUG ' })).toEqual({ logLevel: 'debug' });
    });

    it('ignores an unknown RECOLOR_LOG value', () => {
      expect(loadEnvConfig({ RECOLOR_LOG: 'loud' })).toEqual({});
    });

    it('turns on debug logging for DEBUG', () => {
      expect(loadEnvConfig({ DEBUG: '1' })).toEqual({ logLevel: 'debug' });
    });

    it('prefers RECOLOR_LOG over DEBUG', () => {
      expect(loadEnvConfig({ DEBUG: '1', RECOLOR_LOG: 'error' })).toEqual({ logLevel: 'error' });
    });

    it('disables diagnostic colors for NO_COLOR', () => {
      expect(loadEnvConfig({ NO_COLOR: '1' })).toEqual({ diagnosticColors: false });
      expect(loadEnvConfig({ NO_COLOR: '' })).toEqual({});
    });
  });

  describe('resolveConfig', () => {
    it('starts from the defaults', () => {
      expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
      expect(DEFAULT_CONFIG).toEqual({ global: false, logLevel: 'warn', diagnosticColors: true });
    });

    it('lets flags win over the environment', () => {
      expect(resolveConfig({ verbose: true, global: true }, { RECOLOR_LOG: 'error', NO_COLOR: '1' })).toEqual({
        global: true,
        logLevel: 'debug',
        diagnosticColors: false,
      });
    });

    it('keeps the environment level when --verbose is off', () => {
      expect(resolveConfig({ verbose: false }, { RECOLOR_LOG: 'info' }).logLevel).toBe('info');
    });
  });
});
