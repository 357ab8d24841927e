import fs from 'node:fs';
import { ConfigError } from '../shared/errors.js';

export const NO_FORUMS_CONFIGURED = 'NO_FORUMS_CONFIGURED';

// `- <token>` with an optional whitespace-separated `# comment`. Leading
// whitespace is trimmed before matching; a line starting with `#` never matches.
const ACTIVE_ENTRY = /^-\s+([A-Za-z0-9_]+)(?:\s+#.*)?\s*$/;
const IDENTIFIER = /^[a-z0-9_]+$/;

/**
 * Normalize a single forum name. Returns null when it is not a bare
 * identifier (no `r/` prefix, no URL, no whitespace).
 */
export function normalizeForum(name: string): string | null {
  const lowered = name.trim().toLowerCase();
  return IDENTIFIER.test(lowered) ? lowered : null;
}

/**
 * Extract the enabled forum from one config line, or null when the line is
 * disabled, blank, a comment, or anything other than an exact active entry.
 */
export function parseForumLine(line: string): string | null {
  const trimmed = line.trimStart();
  if (trimmed.startsWith('#')) return null;
  const match = ACTIVE_ENTRY.exec(trimmed.trimEnd());
  if (!match?.[1]) return null;
  return normalizeForum(match[1]);
}

/**
 * Resolve the ordered, de-duplicated forum list from config lines.
 * Throws ConfigError(NO_FORUMS_CONFIGURED) when nothing is enabled.
 */
export function parseForumList(lines: Iterable<string>): string[] {
  return dedupeForums(Array.from(lines, parseForumLine));
}

export function resolveForumNames(names: string[]): string[] {
  const invalid = names.filter((n) => normalizeForum(n) === null);
  if (invalid.length > 0) {
    throw new ConfigError(`Invalid forum name(s): ${invalid.join(', ')}`, { invalid });
  }
  return dedupeForums(names.map(normalizeForum));
}

export function loadForumList(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Forum list not found: ${filePath}`, { path: filePath });
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseForumList(content.split(/\r?\n/));
}

function dedupeForums(candidates: Array<string | null>): string[] {
  const seen = new Set<string>();
  const forums: string[] = [];
  for (const forum of candidates) {
    if (forum === null || seen.has(forum)) continue;
    seen.add(forum);
    forums.push(forum);
  }

  if (forums.length === 0) {
    throw new ConfigError('No forums configured', undefined, NO_FORUMS_CONFIGURED);
  }
  return forums;
}
