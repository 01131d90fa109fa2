/**
 * Parser for the arguments of an `info` line
 *
 * Example input (after the `info` keyword):
 * "depth 24 seldepth 32 multipv 1 score cp 35 nodes 12345678 nps 2500000 time 4938 pv e2e4 e7e5"
 */

import type { InfoFields, InfoScore } from '../types.js';

import { parseInteger } from './tokens.js';

const NUMERIC_KEYS = [
  'depth',
  'seldepth',
  'multipv',
  'nodes',
  'nps',
  'time',
  'hashfull',
  'tbhits',
] as const;

type NumericKey = (typeof NUMERIC_KEYS)[number];

/**
 * Keys outside the recognized vocabulary whose argument count is fixed
 */
const EXTRA_ARITY: Record<string, number> = {
  currmove: 1,
  currmovenumber: 1,
  cpuload: 1,
  sbhits: 1,
  wdl: 3,
};

const KEYWORDS = new Set<string>([...NUMERIC_KEYS, 'score', 'pv', 'string', ...Object.keys(EXTRA_ARITY)]);

function isNumericKey(key: string): key is NumericKey {
  return NUMERIC_KEYS.some((numeric) => numeric === key);
}

/**
 * Parse `info` arguments
 * @returns null when a recognized key has a malformed argument
 */
export function parseInfoFields(tokens: readonly string[]): InfoFields | null {
  const fields: InfoFields = { extra: {} };
  let i = 0;

  while (i < tokens.length) {
    const key = tokens[i] ?? '';

    if (isNumericKey(key)) {
      const value = parseInteger(tokens[i + 1]);
      if (value === null) return null;
      fields[key] = value;
      i += 2;
      continue;
    }

    switch (key) {
      case 'score': {
        const kind = tokens[i + 1];
        const value = parseInteger(tokens[i + 2]);
        if ((kind !== 'cp' && kind !== 'mate') || value === null) return null;
        const score: InfoScore = { kind, value };
        i += 3;
        const bound = tokens[i];
        if (bound === 'lowerbound' || bound === 'upperbound') {
          score.bound = bound;
          i++;
        }
        fields.score = score;
        break;
      }

      case 'pv':
        // PV is always the final field
        fields.pv = tokens.slice(i + 1);
        i = tokens.length;
        break;

      case 'string':
        fields.extra['string'] = tokens.slice(i + 1).join(' ');
        i = tokens.length;
        break;

      default: {
        const arity = EXTRA_ARITY[key];
        let end = i + 1;
        if (arity !== undefined) {
          end = Math.min(i + 1 + arity, tokens.length);
        } else {
          while (end < tokens.length && !KEYWORDS.has(tokens[end] ?? '')) end++;
        }
        fields.extra[key] = tokens.slice(i + 1, end).join(' ');
        i = end;
        break;
      }
    }
  }

  return fields;
}
