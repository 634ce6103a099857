/**
 * Tests for centralized configuration -- verifies defaults and structure.
 */

import { describe, it, expect } from 'vitest';
import { config } from './index.js';

describe('config', () => {
    it('reads the package version', () => {
        expect(config.version).toBe('0.1.0');
    });

    it('does not enforce strict method names unless asked to', () => {
        expect(config.registry.strictNames).toBe(false);
    });

    it('has a valid log level', () => {
        expect(['debug', 'info', 'warn', 'error']).toContain(config.logging.level);
    });

    it('is silenced for the test run', () => {
        expect(config.logging.silent).toBe(true);
    });
});
