import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ScriptBridge, ScriptChangeResult } from './bridge.js';

/**
 * Register every `*.js` file of `directory` as a script operator named
 * after the file (`pillar.js` → `pillar`). Files are read in name order.
 * Scripts that fail to load are registered anyway and reported.
 */
export function loadScriptDirectory(directory: string, bridge: ScriptBridge): ScriptChangeResult[] {
  const files = fs
    .readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith('.js'))
    .map((entry) => entry.name)
    .sort();
  return files.map((file) => bridge.applyChange({
    scriptId: path.basename(file, '.js'),
    source: fs.readFileSync(path.join(directory, file), 'utf-8'),
  }));
}
