import { describe, it, expect } from 'vitest';
import { loadGeneratorConfig, validateGeneratorConfig } from '../../../src/utils/config-loader.js';
import { DEFAULT_GENERATOR_CONFIG } from '../../../src/types/config.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('Config Loader', () => {
  describe('loadGeneratorConfig', () => {
    it('should return the defaults without overrides', () => {
      expect(loadGeneratorConfig()).toEqual(DEFAULT_GENERATOR_CONFIG);
    });

    it('should not share list instances with the defaults', () => {
      const config = loadGeneratorConfig();
      config.frameworkReserved.push('Extra');
      config.artifacts.declarations.includes.push('<vector>');
      expect(DEFAULT_GENERATOR_CONFIG.frameworkReserved).not.toContain('Extra');
      expect(DEFAULT_GENERATOR_CONFIG.artifacts.declarations.includes).not.toContain('<vector>');
    });

    it('should prefer CLI options over the config file', () => {
      const config = loadGeneratorConfig({ namespace: 'Cli' }, { namespace: 'File' });
      expect(config.namespace).toBe('Cli');
    });

    it('should take config file values over defaults', () => {
      const config = loadGeneratorConfig({}, { namespace: 'Proto::V1', unitType: 'void' });
      expect(config.namespace).toBe('Proto::V1');
      expect(config.unitType).toBe('void');
      expect(config.generatorName).toBe('lsp-specgen');
    });

    it('should replace lists rather than extend them', () => {
      const config = loadGeneratorConfig({}, { bindingExceptions: [], builtinAliases: ['decimal'] });
      expect(config.bindingExceptions).toEqual([]);
      expect(config.builtinAliases).toEqual(['decimal']);
    });

    it('should merge artifact overrides per field', () => {
      const config = loadGeneratorConfig({}, {
        artifacts: { declarations: { fileName: 'proto_types.h' } },
      });
      expect(config.artifacts.declarations).toEqual({
        fileName: 'proto_types.h',
        includes: DEFAULT_GENERATOR_CONFIG.artifacts.declarations.includes,
      });
      expect(config.artifacts.bindings).toEqual(DEFAULT_GENERATOR_CONFIG.artifacts.bindings);
    });
  });

  describe('validateGeneratorConfig', () => {
    it('should reject invalid namespaces', () => {
      expect(() => loadGeneratorConfig({ namespace: '1Lsp' })).toThrow(ConfigError);
      expect(() => loadGeneratorConfig({ namespace: 'Lsp::' })).toThrow(
        'Invalid C++ namespace: Lsp::',
      );
    });

    it('should reject an empty unit type', () => {
      expect(() => loadGeneratorConfig({}, { unitType: ' ' })).toThrow(
        'unitType must not be empty',
      );
    });

    it('should reject an empty generator name', () => {
      expect(() => loadGeneratorConfig({}, { generatorName: '' })).toThrow(
        'generatorName must not be empty',
      );
    });

    it('should reject duplicate artifact file names', () => {
      expect(() =>
        loadGeneratorConfig({}, { artifacts: { requests: { fileName: 'types.h' } } }),
      ).toThrow('Duplicate artifact file name: types.h');
    });

    it('should reject an empty artifact file name', () => {
      expect(() =>
        loadGeneratorConfig({}, { artifacts: { bindings: { fileName: '' } } }),
      ).toThrow('Artifact file name for bindings must not be empty');
    });

    it('should reject chained enum renames', () => {
      const config = {
        ...loadGeneratorConfig(),
        renameEnums: { A: 'B', B: 'C' },
      };
      expect(() => validateGeneratorConfig(config)).toThrow(
        'Enum rename target B (from A) is itself renamed',
      );
    });
  });
});
