/**
 * Byte-range resolution for the `Range` request header.
 *
 * Only a single range is honoured. Anything we cannot parse, and any
 * multi-range request, falls back to the full body.
 */

export type RangeOutcome =
  | { kind: 'full' }
  | { kind: 'partial'; start: number; end: number }
  | { kind: 'unsatisfiable' };

const FULL: RangeOutcome = { kind: 'full' };
const UNSATISFIABLE: RangeOutcome = { kind: 'unsatisfiable' };

const RANGE_PATTERN = /^bytes\s*=\s*(\d*)\s*-\s*(\d*)$/i;

function parsePosition(digits: string): number | null {
  if (digits === '') return null;
  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : NaN;
}

/**
 * Resolve a `Range` header against a body of `totalLength` bytes.
 * A partial outcome always satisfies `0 <= start <= end < totalLength`.
 */
export function resolveRange(header: string | undefined, totalLength: number): RangeOutcome {
  if (header === undefined) return FULL;

  const trimmed = header.trim();
  if (trimmed.includes(',')) return FULL;

  const match = RANGE_PATTERN.exec(trimmed);
  if (!match) return FULL;

  const first = parsePosition(match[1] ?? '');
  const last = parsePosition(match[2] ?? '');
  if (Number.isNaN(first) || Number.isNaN(last)) return FULL;

  let start: number;
  let end: number;

  if (first === null) {
    // bytes=-N: the last N bytes
    if (last === null) return FULL;
    start = Math.max(0, totalLength - last);
    end = totalLength - 1;
  } else {
    start = first;
    end = last === null ? totalLength - 1 : last;
  }

  if (start > end || end >= totalLength) return UNSATISFIABLE;

  return { kind: 'partial', start, end };
}

export function contentRange(outcome: RangeOutcome, totalLength: number): string | undefined {
  switch (outcome.kind) {
    case 'partial':
      return `bytes ${outcome.start}-${outcome.end}/${totalLength}`;
    case 'unsatisfiable':
      return `bytes */${totalLength}`;
    case 'full':
      return undefined;
  }
}
