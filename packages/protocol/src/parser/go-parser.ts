/**
 * Parser for the arguments of a `go` command
 */

import type { GoParams } from '../types.js';

import { parseInteger } from './tokens.js';

const NUMERIC_PARAMS = [
  'wtime',
  'btime',
  'winc',
  'binc',
  'movestogo',
  'depth',
  'nodes',
  'mate',
  'movetime',
] as const;

type NumericParam = (typeof NUMERIC_PARAMS)[number];

const GO_KEYWORDS = new Set<string>([...NUMERIC_PARAMS, 'searchmoves', 'ponder', 'infinite']);

function isNumericParam(key: string): key is NumericParam {
  return NUMERIC_PARAMS.some((numeric) => numeric === key);
}

/**
 * Parse `go` arguments
 * @returns null on an unknown keyword or a malformed value
 */
export function parseGoParams(tokens: readonly string[]): GoParams | null {
  const params: GoParams = {};
  let i = 0;

  while (i < tokens.length) {
    const key = tokens[i] ?? '';

    if (isNumericParam(key)) {
      const value = parseInteger(tokens[i + 1]);
      if (value === null) return null;
      params[key] = value;
      i += 2;
      continue;
    }

    switch (key) {
      case 'ponder':
        params.ponder = true;
        i++;
        break;
      case 'infinite':
        params.infinite = true;
        i++;
        break;
      case 'searchmoves': {
        let end = i + 1;
        while (end < tokens.length && !GO_KEYWORDS.has(tokens[end] ?? '')) end++;
        params.searchmoves = tokens.slice(i + 1, end);
        i = end;
        break;
      }
      default:
        return null;
    }
  }

  return params;
}
