import { describe, it, expect } from 'vitest';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parseConfigFile } from '../../../src/cli/config/parser.js';
import { ConfigError } from '../../../src/utils/errors.js';

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), '../../fixtures');

describe('parseConfigFile', () => {
  it('should parse the YAML config fixture', () => {
    expect(parseConfigFile(join(fixturesDir, 'specgen.config.yaml'))).toEqual({
      generator: {
        namespace: 'Proto',
        artifacts: { declarations: { fileName: 'proto_types.h' } },
        bindingExceptions: [],
      },
      generate: { outputDir: './out', manifest: false },
    });
  });

  it('should reject unsupported extensions', () => {
    expect(() => parseConfigFile(join(fixturesDir, 'sample-model.txt'))).toThrow(ConfigError);
  });

  it('should reject documents that do not match the config schema', () => {
    expect(() => parseConfigFile(join(fixturesDir, 'sample-model.json'))).toThrow(
      `Invalid config file: ${join(fixturesDir, 'sample-model.json')}`,
    );
  });
});
