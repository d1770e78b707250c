/**
 * Fixture loading helpers
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export function fixturePath(name: string): string {
  return join(FIXTURES_DIR, name);
}

export function loadFixtureBytes(name: string): Uint8Array {
  return new Uint8Array(readFileSync(fixturePath(name)));
}

export function loadFixtureText(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
