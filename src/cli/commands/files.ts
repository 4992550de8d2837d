/**
 * files: one row per directory entry.
 */

import { lstat, readdir } from 'node:fs/promises';
import { join, relative } from 'node:path';
import type { Dirent, Stats } from 'node:fs';
import { defineRowsCommand } from '../../core/commands/define.js';
import type { RowsCommand } from '../../core/commands/types.js';
import { createLayer } from '../../core/parameters/layer.js';
import type { ParameterTypeRegistry } from '../../core/parameters/registry.js';
import type { RowEmitter } from '../../core/rows/pipeline.js';
import { standardLayers } from '../run.js';

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

function entryType(stats: Stats): EntryType {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

interface WalkOptions {
  root: string;
  recursive: boolean;
  hidden: boolean;
}

/**
 * Emit entries of `dir` in name order, descending into subdirectories when
 * recursive. Returns false once the pipeline wants no more rows.
 */
async function walk(dir: string, options: WalkOptions, rows: RowEmitter): Promise<boolean> {
  const entries: Dirent[] = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (!options.hidden && entry.name.startsWith('.')) continue;
    const path = join(dir, entry.name);
    const stats = await lstat(path);
    const type = entryType(stats);
    const more = await rows.addRow({
      name: relative(options.root, path),
      type,
      size: stats.size,
      modified: stats.mtime,
    });
    if (!more) return false;
    if (options.recursive && type === 'directory' && !(await walk(path, options, rows))) return false;
  }
  return true;
}

export function createFilesCommand(registry: ParameterTypeRegistry): RowsCommand {
  const layer = createLayer(registry, {
    slug: 'files',
    name: 'Files',
    parameters: [
      { name: 'path', type: 'string', default: '.', help: 'Directory to list' },
      { name: 'recursive', type: 'bool', shortFlag: 'r', help: 'Descend into subdirectories' },
      { name: 'hidden', type: 'bool', help: 'Include dot files' },
    ],
  });

  return defineRowsCommand(
    {
      name: 'files',
      description: 'List directory entries as rows',
      layers: [layer, ...standardLayers(registry)],
      async run(parsed, rows) {
        const files = parsed.require('files');
        const root = files.getString('path') ?? '.';
        await walk(root, {
          root,
          recursive: files.getBoolean('recursive') ?? false,
          hidden: files.getBoolean('hidden') ?? false,
        }, rows);
      },
    },
    registry,
  );
}
