import fs from 'fs';
import type { KeyStyle } from './keys';
import { MissingConfiguration } from '../utils/errors';

export interface ConfigEntry {
  key: string;
  value: string;
}

/**
 * Read-only hierarchical key/value view built once at startup.
 * Keys compare case-insensitively; the casing of the winning entry is kept.
 */
export class Configuration {
  private readonly entries: ReadonlyMap<string, ConfigEntry>;

  constructor(entries: Iterable<ConfigEntry>, readonly style: KeyStyle) {
    const map = new Map<string, ConfigEntry>();
    for (const entry of entries) {
      map.set(normalize(entry.key), Object.freeze({ key: entry.key, value: entry.value }));
    }
    this.entries = map;
    Object.freeze(this);
  }

  get(key: string): string | undefined {
    return this.entries.get(normalize(key))?.value;
  }

  getRequired(key: string): string {
    const value = this.get(key);
    if (value === undefined || value === '') throw new MissingConfiguration([key]);
    return value;
  }

  has(key: string): boolean {
    return this.entries.has(normalize(key));
  }

  keys(): string[] {
    return [...this.entries.values()].map(e => e.key);
  }

  /** Entries below `prefix`, with the prefix and its delimiter stripped from the keys. */
  section(prefix: string): Record<string, string> {
    const head = normalize(prefix) + this.style.localDelimiter;
    const out: Record<string, string> = {};
    for (const [norm, entry] of this.entries) {
      if (norm.startsWith(head)) out[entry.key.slice(head.length)] = entry.value;
    }
    return out;
  }
}

function normalize(key: string) {
  return key.toLowerCase();
}

// Later layers win.
export function buildConfiguration(layers: ConfigEntry[][], style: KeyStyle): Configuration {
  return new Configuration(layers.flat(), style);
}

export function environmentEntries(env: NodeJS.ProcessEnv, style: KeyStyle): ConfigEntry[] {
  const out: ConfigEntry[] = [];
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined) continue;
    out.push({ key: name.split('__').join(style.localDelimiter), value });
  }
  return out;
}

export function jsonFileEntries(file: string, style: KeyStyle): ConfigEntry[] {
  if (!fs.existsSync(file)) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new Error(`Settings file ${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return flatten(parsed, [], style);
}

export function flatten(value: unknown, path: string[], style: KeyStyle): ConfigEntry[] {
  if (Array.isArray(value)) {
    return value.flatMap((item, i) => flatten(item, [...path, String(i)], style));
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).flatMap(([k, v]) => flatten(v, [...path, k], style));
  }
  if (path.length === 0) return [];
  return [{ key: path.join(style.localDelimiter), value: value === null || value === undefined ? '' : String(value) }];
}
