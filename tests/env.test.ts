/**
 * Tests for environment variable helpers
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { isTruthy, isCI, shouldDisableColors, RESERVED_ENV_VARS, ENV_VAR_DOCS } from '../src/cli/env.js';

describe('isTruthy', () => {
  it.each(['1', 'true', 'TRUE', 'yes', 'on', ' on '])('should accept %p', (value) => {
    expect(isTruthy(value)).toBe(true);
  });

  it.each(['0', 'false', 'no', '', undefined])('should reject %p', (value) => {
    expect(isTruthy(value)).toBe(false);
  });
});

describe('process environment', () => {
  const saved = { CI: process.env.CI, NO_COLOR: process.env.NO_COLOR, OPSKIT_NO_COLOR: process.env.OPSKIT_NO_COLOR };

  afterEach(() => {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should detect CI', () => {
    process.env.CI = 'true';
    expect(isCI()).toBe(true);
  });

  it('should disable colors for OPSKIT_NO_COLOR', () => {
    delete process.env.NO_COLOR;
    process.env.OPSKIT_NO_COLOR = '1';
    expect(shouldDisableColors()).toBe(true);
  });

  it('should keep colors when neither variable is set', () => {
    delete process.env.NO_COLOR;
    delete process.env.OPSKIT_NO_COLOR;
    expect(shouldDisableColors()).toBe(false);
  });
});

describe('documentation', () => {
  it('should document only reserved names', () => {
    for (const doc of ENV_VAR_DOCS) {
      expect(RESERVED_ENV_VARS.has(doc.name)).toBe(true);
    }
  });
});
