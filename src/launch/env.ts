/**
 * Environment Configuration
 *
 * Creates, loads and validates the .env file the API server reads.
 * The file is parsed once per launch into a LauncherEnvironment that the
 * later steps receive explicitly.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { parse } from 'dotenv';

export const API_KEY_VAR = 'GOOGLE_API_KEY';
export const MODEL_VAR = 'GEMINI_MODEL';

/** Value written into the template until the operator supplies a real key */
export const PLACEHOLDER_API_KEY = 'your_gemini_api_key_here';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export const ENV_TEMPLATE = [
  '# UniMate API configuration',
  '# Get a key at https://aistudio.google.com/app/apikey',
  `${API_KEY_VAR}=${PLACEHOLDER_API_KEY}`,
  `${MODEL_VAR}=${DEFAULT_GEMINI_MODEL}`,
  ''
].join('\n');

export interface LauncherEnvironment {
  /** Absolute path of the file the values came from */
  path: string;
  apiKey: string | undefined;
  model: string;
  /** Every key in the file, including ones the launcher does not use */
  values: Record<string, string>;
}

/**
 * Write the template unless the file already exists.
 * Returns true when a new file was created.
 */
export function ensureEnvFile(envPath: string): boolean {
  if (existsSync(envPath)) {
    return false;
  }
  writeFileSync(envPath, ENV_TEMPLATE, 'utf-8');
  return true;
}

export function parseEnvironment(content: string, path: string): LauncherEnvironment {
  const values = parse(content);
  const model = values[MODEL_VAR]?.trim();
  return {
    path,
    apiKey: values[API_KEY_VAR]?.trim(),
    model: model || DEFAULT_GEMINI_MODEL,
    values
  };
}

export function loadEnvironment(envPath: string): LauncherEnvironment {
  if (!existsSync(envPath)) {
    throw new Error(`Configuration file not found: ${envPath}`);
  }
  return parseEnvironment(readFileSync(envPath, 'utf-8'), envPath);
}

/**
 * An API key counts as configured when it is non-empty and not the placeholder
 */
export function isConfigured(apiKey: string | undefined): apiKey is string {
  return apiKey !== undefined && apiKey !== '' && apiKey !== PLACEHOLDER_API_KEY;
}

/**
 * Mask sensitive values for display
 */
export function mask(value: string | undefined): string {
  if (!value) return '(not set)';
  if (value.length <= 8) return '***';
  return `${value.substring(0, 8)}...${value.substring(value.length - 4)}`;
}

/**
 * Get a summary of the loaded configuration
 */
export function getEnvSummary(env: LauncherEnvironment): string {
  const apiKey = env.apiKey === PLACEHOLDER_API_KEY ? '(placeholder)' : mask(env.apiKey);
  const lines: string[] = [
    '=== Environment Summary ===',
    '',
    `Config file:     ${env.path}`,
    `${API_KEY_VAR}:  ${apiKey}`,
    `${MODEL_VAR}:    ${env.model}`,
    ''
  ];

  return lines.join('\n');
}
