import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { ConfigError, formatErrorMessage } from '../provisioning/errors.js';
import { Capability, ResourceDefinition } from '../types/index.js';

export interface DefinitionOptions {
  capabilities: Capability[];
  description?: string;
  /** Strip whitespace from JSON templates before sending them */
  minify?: boolean;
}

/**
 * Reads a StackSet template from disk. The body is passed through as-is;
 * CloudFormation validates its syntax.
 */
export class DefinitionLoader {
  async load(path: string, options: DefinitionOptions): Promise<ResourceDefinition> {
    if (!existsSync(path)) {
      throw new ConfigError(`Template file not found: ${path}`);
    }

    const content = await readFile(path, 'utf-8');
    if (content.trim().length === 0) {
      throw new ConfigError(`Template file is empty: ${path}`);
    }

    return {
      templateBody: options.minify && path.endsWith('.json') ? this.minifyTemplate(content, path) : content,
      capabilities: [...options.capabilities],
      description: options.description,
    };
  }

  private minifyTemplate(template: string, path: string): string {
    try {
      return JSON.stringify(JSON.parse(template));
    } catch (error) {
      throw new ConfigError(`Template ${path} is not valid JSON`, [formatErrorMessage(error)]);
    }
  }
}
