/**
 * Configuration management for the decode-script extractor
 * Handles environment variables and extraction defaults
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { DECIPHER_VARIANTS, N_TRANSFORM_VARIANTS } from '../modules/extractor/types.js';
import { logger } from './logger.js';

// Load .env file if it exists
const envPath = resolve(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenvConfig({ path: envPath });
}

/** 16 MiB of source text. */
export const DEFAULT_MAX_BUNDLE_SIZE = 16 * 1024 * 1024;

/**
 * Extractor Configuration
 */
export interface ExtractorConfig {
  /** Inputs longer than this many characters are rejected before matching. */
  maxBundleSize: number;
  /** Empty means the registry order. */
  decipherVariants: string[];
  nTransformVariants: string[];
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function isValidBundleSize(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Anything but a positive integer falls back to the default ceiling
 */
function parseBundleSize(value: string | undefined): number {
  if (!value) {
    return DEFAULT_MAX_BUNDLE_SIZE;
  }
  const size = Number(value);
  if (!isValidBundleSize(size)) {
    logger.warn(`Invalid EXTRACTOR_MAX_BUNDLE_SIZE: ${value}. Using ${DEFAULT_MAX_BUNDLE_SIZE}.`);
    return DEFAULT_MAX_BUNDLE_SIZE;
  }
  return size;
}

/**
 * Get extractor configuration from environment variables
 */
export function getExtractorConfig(): ExtractorConfig {
  return {
    maxBundleSize: parseBundleSize(process.env.EXTRACTOR_MAX_BUNDLE_SIZE),
    decipherVariants: parseList(process.env.EXTRACTOR_DECIPHER_VARIANTS),
    nTransformVariants: parseList(process.env.EXTRACTOR_NTRANSFORM_VARIANTS),
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ExtractorConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isValidBundleSize(config.maxBundleSize)) {
    errors.push(`Invalid EXTRACTOR_MAX_BUNDLE_SIZE: ${config.maxBundleSize}. Must be a positive integer.`);
  }

  const knownDecipher: readonly string[] = DECIPHER_VARIANTS;
  for (const name of config.decipherVariants) {
    if (!knownDecipher.includes(name)) {
      errors.push(`Unknown decipher variant: ${name}. Known: ${DECIPHER_VARIANTS.join(', ')}`);
    }
  }

  const knownNTransform: readonly string[] = N_TRANSFORM_VARIANTS;
  for (const name of config.nTransformVariants) {
    if (!knownNTransform.includes(name)) {
      errors.push(`Unknown n-transform variant: ${name}. Known: ${N_TRANSFORM_VARIANTS.join(', ')}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Get environment variable with fallback
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] || defaultValue;
}

/**
 * Check if debug mode is enabled
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG === 'true' || process.env.DEBUG?.includes('extractor') || false;
}
