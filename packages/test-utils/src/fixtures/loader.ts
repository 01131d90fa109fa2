/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to the fixtures directory
 * Works whether running from src or dist
 */
function getFixturesRoot(): string {
  // Compiled code lives in dist/fixtures, the fixture files stay in src/fixtures
  if (__dirname.includes(`${path.sep}dist${path.sep}`)) {
    const packageRoot = path.resolve(__dirname, '..', '..');
    return path.join(packageRoot, 'src', 'fixtures');
  }
  return __dirname;
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

/**
 * Load a tap log fixture synchronously, one entry per line
 */
export function loadLogLinesSync(name: string): string[] {
  const content = fs.readFileSync(getFixturePath(path.join('logs', name)), 'utf-8');
  return content.split('\n').filter((line) => line !== '');
}
