import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function sha1(input: string): string {
  return createHash('sha1').update(input, 'utf8').digest('hex');
}

export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Lowercase host of a URL, without a leading "www.". Returns '' for unparseable input.
 */
export function hostFromUrl(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

/**
 * Parse a loosely formatted timestamp into ISO-8601 UTC.
 * Zone-less values are read as UTC. Returns null when nothing date-like is found.
 */
export function toIsoTimestamp(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const s = raw.trim();
  if (!s) return null;

  const dateOnly = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s);
  if (dateOnly) {
    return `${dateOnly[1]}-${dateOnly[2]}-${dateOnly[3]}T00:00:00.000Z`;
  }

  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(s);
  const isoLike = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(s);
  const candidate = isoLike && !hasZone ? `${s.replace(' ', 'T')}Z` : s;
  const ms = Date.parse(candidate);
  if (!Number.isNaN(ms)) return new Date(ms).toISOString();

  const leading = /^(\d{4}-\d{2}-\d{2})/.exec(s);
  if (leading) return `${leading[1]}T00:00:00.000Z`;
  return null;
}

export function getPackageRoot(): string {
  // Works from both src/shared/utils.ts and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getFeedpulseDir(): string {
  return resolvePath('~/.feedpulse');
}
