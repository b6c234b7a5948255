import { readFileSync } from 'node:fs';
import type { LanguageMap } from './types.js';

const LANGUAGES_FILE = new URL('../../data/languages.json', import.meta.url);

/**
 * Build a language map from `{ aliases: { code: [alias...] }, fallback }`.
 */
export function parseLanguageMap(document: unknown): LanguageMap {
  const aliases = new Map<string, string>();
  let fallback = 'und';
  if (document !== null && typeof document === 'object' && !Array.isArray(document)) {
    const entries: unknown = Reflect.get(document, 'aliases');
    if (entries !== null && typeof entries === 'object') {
      for (const [code, list] of Object.entries(entries)) {
        if (!Array.isArray(list)) continue;
        for (const alias of list) {
          if (typeof alias === 'string') aliases.set(alias.toLowerCase(), code);
        }
      }
    }
    const configured: unknown = Reflect.get(document, 'fallback');
    if (typeof configured === 'string') fallback = configured;
  }
  return { aliases, fallback };
}

let bundled: LanguageMap | undefined;

/**
 * The language map shipped in data/languages.json.
 */
export function defaultLanguageMap(): LanguageMap {
  bundled ??= parseLanguageMap(JSON.parse(readFileSync(LANGUAGES_FILE, 'utf-8')));
  return bundled;
}

/**
 * Resolve a free-text language field (`English`, `en-GB`, `deu`) to a tag.
 * Unknown values resolve to the map's fallback.
 */
export function resolveLanguage(value: string, map: LanguageMap): string {
  const normalized = value.trim().toLowerCase();
  const direct = map.aliases.get(normalized);
  if (direct) return direct;
  const primary = normalized.split(/[-_\s]/)[0];
  if (primary) {
    const viaPrimary = map.aliases.get(primary);
    if (viaPrimary) return viaPrimary;
  }
  return map.fallback;
}
