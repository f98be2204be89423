/**
 * Configuration Loader
 *
 * Reads the analysis configuration from a JSON file, applies environment
 * overrides and validates the result. Environment variables:
 * - ANALYSIS_CONFIG_PATH: alternative config file
 * - MONTHS_TO_ANALYZE: trailing window length in months
 * - OUTPUT_DIR: where the site is written
 * - RELEVANCE_POLICY: KEYWORD_SET or DUAL_TERM
 * - FEED_TIMEOUT_MS: per-feed request timeout
 */

import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { AnalysisConfig } from '../types/analysis-config';
import { ConfigurationError } from '../types/validation';
import { validateAnalysisConfig } from './config-validator';

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/default.json');

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

export interface LoadConfigOptions {
  /** Overrides ANALYSIS_CONFIG_PATH */
  configPath?: string;
  /** Environment to read overrides from; when omitted, .env is loaded into process.env */
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(filePath: string): unknown {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError([
      {
        field: 'configPath',
        message: `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        code: 'FILE_NOT_READABLE'
      }
    ]);
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError([
      {
        field: 'configPath',
        message: `JSON parse error in ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        code: 'PARSE_ERROR'
      }
    ]);
  }
}

/**
 * Apply environment overrides on top of the parsed file. Values are not
 * checked here; validation reports bad overrides like bad file values.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const merged: Record<string, unknown> = { ...raw };

  if (merged.requestTimeoutMs === undefined) {
    merged.requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS;
  }
  if (env.MONTHS_TO_ANALYZE) {
    merged.monthsBack = Number(env.MONTHS_TO_ANALYZE);
  }
  if (env.OUTPUT_DIR) {
    merged.outputDir = env.OUTPUT_DIR;
  }
  if (env.FEED_TIMEOUT_MS) {
    merged.requestTimeoutMs = Number(env.FEED_TIMEOUT_MS);
  }
  if (env.RELEVANCE_POLICY) {
    const current = isRecord(merged.relevance) ? merged.relevance : {};
    merged.relevance =
      env.RELEVANCE_POLICY === 'DUAL_TERM'
        ? { policy: 'DUAL_TERM' }
        : { policy: env.RELEVANCE_POLICY, keywords: current.keywords ?? [] };
  }

  return merged;
}

/**
 * Load and validate the analysis configuration
 *
 * @throws ConfigurationError when the file is unreadable or the result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): AnalysisConfig {
  let env = options.env;
  if (!env) {
    dotenv.config();
    env = process.env;
  }

  const configPath = options.configPath ?? (env.ANALYSIS_CONFIG_PATH || DEFAULT_CONFIG_PATH);
  const candidate = applyEnvOverrides(readConfigFile(configPath), env);
  const result = validateAnalysisConfig(candidate);

  if (!result.config) {
    throw new ConfigurationError(result.errors);
  }
  return result.config;
}
