/**
 * Centralized configuration -- loads environment variables and provides
 * typed, defaulted access to the runtime settings.
 *
 * Selector constants (the first hash-derived number and the permitted
 * reserved numbers) are not configurable and live in dispatch/reservation.ts.
 */

import dotenv from 'dotenv';
import path from 'node:path';
import { readFileSync } from 'node:fs';

dotenv.config();

const pkgPath = path.join(process.cwd(), 'package.json');
let version = '0.0.0';
try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    version = pkg.version || '0.0.0';
} catch { /* fallback to 0.0.0 */ }

const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevelName = typeof VALID_LOG_LEVELS[number];

function isLogLevel(value: string): value is LogLevelName {
    return VALID_LOG_LEVELS.some(level => level === value);
}

function validateLogLevel(raw: string | undefined): LogLevelName {
    const value = raw || 'info';
    if (isLogLevel(value)) {
        return value;
    }
    console.warn(`[Config] Invalid LOG_LEVEL "${value}", falling back to "info". Valid: ${VALID_LOG_LEVELS.join(', ')}`);
    return 'info';
}

export const config = {
    version,

    registry: {
        /** Fail the build on method names that are not PascalCase identifiers. */
        strictNames: process.env.DISPATCH_STRICT_NAMES === 'true',
    },

    logging: {
        level: validateLogLevel(process.env.LOG_LEVEL),
        silent: process.env.LOG_SILENT === 'true',
    },
} as const;

// Type export for use elsewhere
export type Config = typeof config;
