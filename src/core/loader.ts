import { openSync, readSync, closeSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { XbrlSources } from '../parsing/xbrl-parser.js';
import { XbrlProcessingError } from './errors.js';
import { debug } from './logger.js';

/**
 * Filing directory loading. Files are classified by name:
 *
 *   *_pre.xml  presentation    *_cal.xml  calculation
 *   *_def.xml  definition      *_lab.xml  labels
 *   *.xsd      schema          other *.xml starting with an <xbrl root: instance
 */

export type SourceRole = keyof XbrlSources;

export type SourcePaths = Partial<Record<SourceRole, string>>;

const INSTANCE_SNIFF_CHARS = 2000;

const SUFFIX_ROLES: Array<[suffix: string, role: SourceRole]> = [
  ['_pre.xml', 'presentation'],
  ['_cal.xml', 'calculation'],
  ['_def.xml', 'definition'],
  ['_lab.xml', 'labels'],
  ['.xsd', 'schema'],
];

function head(path: string, chars: number): string {
  const fd = openSync(path, 'r');
  try {
    const buf = Buffer.alloc(chars * 4);
    const read = readSync(fd, buf, 0, buf.length, 0);
    return buf.subarray(0, read).toString('utf8').slice(0, chars);
  } finally {
    closeSync(fd);
  }
}

export function classifyFile(path: string, name: string): SourceRole | null {
  const lower = name.toLowerCase();
  for (const [suffix, role] of SUFFIX_ROLES) {
    if (lower.endsWith(suffix)) return role;
  }
  if (lower.endsWith('.xml') && head(path, INSTANCE_SNIFF_CHARS).includes('<xbrl')) return 'instance';
  return null;
}

/** First file (by name) of each role in `dir` */
export function classifyDirectory(dir: string): SourcePaths {
  let names: string[];
  try {
    names = readdirSync(dir).sort();
  } catch (err) {
    throw new XbrlProcessingError(`cannot read directory: ${err instanceof Error ? err.message : String(err)}`, dir);
  }

  const found: SourcePaths = {};
  for (const name of names) {
    const path = join(dir, name);
    if (!statSync(path).isFile()) continue;
    const role = classifyFile(path, name);
    if (!role || found[role] !== undefined) continue;
    found[role] = path;
  }
  if (!found.instance) debug(`no instance document in ${dir}`);
  return found;
}

export function readSources(paths: SourcePaths): XbrlSources {
  const sources: XbrlSources = {};
  for (const [role, path] of Object.entries(paths)) {
    if (path === undefined) continue;
    let content: string;
    try {
      content = readFileSync(path, 'utf8');
    } catch (err) {
      throw new XbrlProcessingError(`cannot read file: ${err instanceof Error ? err.message : String(err)}`, path);
    }
    switch (role) {
      case 'schema': sources.schema = content; break;
      case 'labels': sources.labels = content; break;
      case 'presentation': sources.presentation = content; break;
      case 'calculation': sources.calculation = content; break;
      case 'definition': sources.definition = content; break;
      case 'instance': sources.instance = content; break;
    }
  }
  return sources;
}
