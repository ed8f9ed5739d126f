/**
 * Configuration Loader
 *
 * Reads the reader configuration from YAML, validates it and hands back an
 * immutable snapshot. Every failure is a `ConfigurationError` whose `reason`
 * tells the CLI what went wrong.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { YAMLParseError, parse, stringify } from 'yaml';

import { ConfigurationError, errorMessage } from '../ai/newsletter/errors';
import { listSchemaIssues } from '../ai/newsletter/structured-output';
import { NewsletterConfigSchema, type NewsletterConfig } from './schema';

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/interests.yaml');

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validates an already-parsed configuration document.
 *
 * @throws ConfigurationError with reason `empty` or `invalid`
 */
export function parseConfig(raw: unknown): NewsletterConfig {
  if (raw === null || raw === undefined) {
    throw new ConfigurationError('empty', 'Configuration file is empty');
  }

  const result = NewsletterConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = listSchemaIssues(result.error);
    throw new ConfigurationError(
      'invalid',
      `Configuration validation failed: ${issues.join('; ')}`,
      issues,
      { cause: result.error }
    );
  }

  return deepFreeze(result.data);
}

/**
 * Parses YAML text into a validated configuration.
 *
 * @throws ConfigurationError with reason `malformed_yaml`, `empty` or `invalid`
 */
export function parseConfigYaml(text: string): NewsletterConfig {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    const detail = error instanceof YAMLParseError ? error.message : errorMessage(error);
    throw new ConfigurationError('malformed_yaml', `Failed to parse YAML configuration: ${detail}`, [], {
      cause: error,
    });
  }
  return parseConfig(raw);
}

/**
 * Loads and validates the configuration file.
 *
 * @throws ConfigurationError, `not_found` when the file does not exist
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<NewsletterConfig> {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = await readFile(resolved, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ConfigurationError('not_found', `Configuration file not found: ${resolved}`, [], {
        cause: error,
      });
    }
    throw error;
  }
  return parseConfigYaml(text);
}

/**
 * Serializes a configuration back to YAML, keys in schema order.
 * Parsing the result yields an equal configuration.
 */
export function serializeConfig(config: NewsletterConfig): string {
  return stringify(config, { indent: 2 });
}

export async function saveConfig(config: NewsletterConfig, outputPath: string): Promise<void> {
  const resolved = path.resolve(outputPath);
  await mkdir(path.dirname(resolved), { recursive: true });
  await writeFile(resolved, serializeConfig(config), 'utf-8');
}

/**
 * A configuration populated with defaults around a few sample interests.
 */
export function createExampleConfig(): NewsletterConfig {
  return parseConfig({
    interests: ['artificial intelligence', 'machine learning', 'technology trends', 'climate change'],
  });
}
