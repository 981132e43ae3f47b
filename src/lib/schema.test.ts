/**
 * Tests for JSON Schema validation
 *
 * Tests that:
 * 1. The schema file is valid JSON Schema
 * 2. Schema defaults agree with getDefaultConfig()
 * 3. Various valid and invalid configs are handled correctly
 */

import { describe, it, expect } from 'vitest';
import { Ajv } from 'ajv';
import fs from 'fs';
import { getDefaultConfig } from './config.js';
import { SCHEMA_PATH, loadSchema, validateConfig, formatValidationErrors } from './config-validation.js';
import { ConfigurationError } from './errors.js';
import { MIN_CHECK_TIMEOUT } from './constants.js';

const schema = loadSchema();

describe('JSON Schema', () => {
  describe('schema file validity', () => {
    it('schema file exists', () => {
      expect(fs.existsSync(SCHEMA_PATH)).toBe(true);
    });

    it('schema has required properties', () => {
      expect(schema.$schema).toBeDefined();
      expect(schema.$id).toBeDefined();
      expect(schema.title).toBeDefined();
      expect(schema.type).toBe('object');
      expect(schema.properties).toBeDefined();
    });

    it('schema is valid JSON Schema draft-07', () => {
      const ajv = new Ajv({ allErrors: true });
      const validate = ajv.compile(schema);
      expect(typeof validate).toBe('function');
    });

    it('throws ConfigurationError for a missing schema file', () => {
      expect(() => loadSchema('/nonexistent/fmtgaterc.schema.json')).toThrow(ConfigurationError);
    });
  });

  describe('defaults', () => {
    it('schema defaults match getDefaultConfig', () => {
      const defaults = getDefaultConfig();
      expect(schema.properties.styleChecker.default).toBe(defaults.styleChecker);
      expect(schema.properties.formatterProbe.default).toEqual(defaults.formatterProbe);
      expect(schema.properties.formatCheck.default).toEqual(defaults.formatCheck);
      expect(schema.properties.fixHint.default).toBe(defaults.fixHint);
      expect(schema.properties.timeout.default).toBe(defaults.timeout);
    });

    it('schema timeout floor matches MIN_CHECK_TIMEOUT', () => {
      expect(schema.properties.timeout.minimum).toBe(MIN_CHECK_TIMEOUT);
    });

    it('the full default config is valid', () => {
      expect(validateConfig(getDefaultConfig()).valid).toBe(true);
    });
  });

  describe('validateConfig', () => {
    it('accepts an empty config', () => {
      expect(validateConfig({})).toEqual({ valid: true, config: {}, errors: [] });
    });

    it('accepts $schema', () => {
      expect(validateConfig({ $schema: './schemas/fmtgaterc.schema.json' }).valid).toBe(true);
    });

    it('rejects non-objects', () => {
      const result = validateConfig(['make']);
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([{ path: '/', message: 'must be object' }]);
    });

    it('rejects an empty command array', () => {
      const result = validateConfig({ formatCheck: [] });
      expect(result.errors).toEqual([
        { path: '/formatCheck', message: 'must NOT have fewer than 1 items' },
      ]);
    });

    it('rejects a command given as a string', () => {
      const result = validateConfig({ formatterProbe: 'cargo fmt --version' });
      expect(result.errors).toEqual([{ path: '/formatterProbe', message: 'must be array' }]);
    });

    it('reports every error at once', () => {
      const result = validateConfig({ styleChecker: '', fixHint: 42 });
      expect(result.errors).toHaveLength(2);
    });
  });

  describe('formatValidationErrors', () => {
    it('puts each error on its own indented line', () => {
      expect(
        formatValidationErrors([
          { path: '/timeout', message: 'must be >= 1000' },
          { path: '/', message: 'unknown key "x"' },
        ])
      ).toBe('  /timeout: must be >= 1000\n  /: unknown key "x"');
    });
  });
});
