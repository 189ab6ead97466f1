import { readFile } from 'node:fs/promises';
import { parse, YAMLParseError } from 'yaml';
import { InvalidOptionsError } from '../errors.js';
import { ConfigFileSchema, validate } from './schema.js';
import type { ConfigFile } from './schema.js';

/**
 * Load a YAML config file. An empty file is an empty config.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new InvalidOptionsError(`Config file not found: ${filePath}`);
    }
    throw e;
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (e) {
    if (e instanceof YAMLParseError) {
      throw new InvalidOptionsError(`Invalid config ${filePath}: ${e.message}`);
    }
    throw e;
  }

  return validate(ConfigFileSchema, raw ?? {}, `config ${filePath}`);
}
