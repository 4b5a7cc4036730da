/**
 * @file options.test.ts
 * @description Tests for environment-driven log mode selection.
 */

import { describe, it, expect } from 'vitest';
import { LogMode, LOG_ENV_VAR, logModeFromEnv } from '../../src/core/options.js';

describe('logModeFromEnv', () => {
  it('is disabled when the variable is unset', () => {
    expect(logModeFromEnv({})).toBe(LogMode.disabled);
  });

  it.each(['1', 'true', 'ON', ' yes '])('enables logging for %j', (value) => {
    expect(logModeFromEnv({ [LOG_ENV_VAR]: value })).toBe(LogMode.enabled);
  });

  it.each(['0', 'false', '', 'verbose'])('leaves logging off for %j', (value) => {
    expect(logModeFromEnv({ [LOG_ENV_VAR]: value })).toBe(LogMode.disabled);
  });
});
