/**
 * Read-only file access for configuration documents.
 * JSON and YAML are both accepted; YAML is the default for unknown extensions.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigFileError } from '../core/errors.js';

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw new ConfigFileError(filePath, `Failed to read: ${filePath}`, err);
  }
}

/**
 * Parse document text by file extension: `.json` through JSON.parse,
 * everything else through the YAML parser.
 */
export function parseDocument(filePath: string, content: string): unknown {
  const isJson = extname(filePath).toLowerCase() === '.json';
  try {
    return isJson ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigFileError(
      filePath,
      `Invalid ${isJson ? 'JSON' : 'YAML'} in: ${filePath}`,
      err,
    );
  }
}

/**
 * Read and parse a JSON or YAML file.
 * Returns null if the file does not exist; an empty YAML file yields `{ data: null }`.
 */
export async function readDocument(filePath: string): Promise<{ data: unknown } | null> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return { data: parseDocument(filePath, content) };
}
