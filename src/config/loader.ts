// Catalog loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, formatErrorMessage } from '../provisioning/errors.js';
import { resolveSettings } from './settings.js';
import { ConfigLoader, LoadedCatalog } from './types.js';
import { validateAndNormalizeCatalog } from './validator.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Target catalog loader that supports YAML and JSON files with environment variable substitution
 */
export class TargetCatalogLoader implements ConfigLoader {

  /**
   * Load and parse a target catalog from a file
   * @param path - Path to the catalog file (YAML or JSON)
   * @returns Promise resolving to the validated catalog and the rollout settings it selects
   */
  async load(path: string): Promise<LoadedCatalog> {
    try {
      if (!existsSync(path)) {
        throw new ConfigError(`Catalog file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      // Parse based on file extension
      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new ConfigError('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      const resolved = this.resolveEnvironmentVariables(rawConfig);
      const file = validateAndNormalizeCatalog(resolved);

      return {
        catalog: {
          displayNameParameter: file.displayNameParameter,
          targets: file.accounts
        },
        settings: resolveSettings(file.rollout)
      };
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(`Failed to load catalog from ${path}`, [error.message]);
      }
      throw new ConfigError(`Failed to load catalog from ${path}`, [formatErrorMessage(error)]);
    }
  }

  /**
   * Load the catalog from the first of several possible locations that works
   */
  async loadFromPaths(searchPaths: string[]): Promise<LoadedCatalog> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return await this.load(path);
      } catch (error) {
        errors.push(`${path}: ${formatErrorMessage(error)}`);
      }
    }

    throw new ConfigError('Could not load a catalog from any of the specified paths', errors);
  }

  /**
   * Recursively resolve environment variables in the parsed catalog
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(value)) {
      const result: PlainObject = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset variables without a default keep their placeholder
      return match;
    });
  }
}

export function createCatalogLoader(): TargetCatalogLoader {
  return new TargetCatalogLoader();
}

export const DEFAULT_CATALOG_FILES = [
  'account-parameters.json',
  'account-parameters.yml',
  'account-parameters.yaml'
];

/**
 * Load the catalog from its standard locations in a directory
 */
export async function loadDefaultCatalog(dir: string = process.cwd()): Promise<LoadedCatalog> {
  const loader = createCatalogLoader();
  return loader.loadFromPaths(DEFAULT_CATALOG_FILES.map(file => join(dir, file)));
}
