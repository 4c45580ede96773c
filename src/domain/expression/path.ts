/**
 * Path queries over a decoded JSON document.
 *
 * Syntax:
 *   a.b.c            nested object keys
 *   items.0.name     numeric segments index arrays
 *   items[0].name    bracket index
 *   a["x.y"]         quoted bracket key
 *   a\.b             escaped dot inside a key
 */

export type PathSegment = string | number;

export type LookupResult =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false };

const NOT_FOUND: LookupResult = { found: false };

/**
 * Splits a path into segments. Returns `null` for malformed paths
 * (empty segment, unterminated bracket or quote).
 */
export function parsePath(path: string): PathSegment[] | null {
  const segments: PathSegment[] = [];
  // what the previous character closed: nothing yet, a key character, a dot or a bracket
  let state: 'start' | 'key' | 'dot' | 'bracket' = 'start';
  let current = '';
  let i = 0;

  while (i < path.length) {
    const ch = path.charAt(i);

    if (ch === '.' || ch === '[') {
      if (state === 'start' || state === 'dot') return null;
      if (state === 'key') {
        segments.push(current);
        current = '';
      }
      if (ch === '.') {
        state = 'dot';
        i++;
        continue;
      }
      const bracket = readBracket(path, i);
      if (bracket === null) return null;
      segments.push(bracket.segment);
      state = 'bracket';
      i = bracket.end;
      continue;
    }

    if (state === 'bracket') return null;

    if (ch === '\\') {
      const next = path[i + 1];
      if (next === undefined) return null;
      current += next;
      i += 2;
    } else {
      current += ch;
      i++;
    }
    state = 'key';
  }

  if (state === 'dot' || state === 'start') return null;
  if (state === 'key') segments.push(current);
  return segments;
}

function readBracket(path: string, start: number): { segment: PathSegment; end: number } | null {
  const quote = path[start + 1];
  if (quote === '"' || quote === "'") {
    let key = '';
    let i = start + 2;
    while (i < path.length && path[i] !== quote) {
      if (path[i] === '\\' && i + 1 < path.length) {
        key += path.charAt(i + 1);
        i += 2;
        continue;
      }
      key += path.charAt(i);
      i++;
    }
    if (path[i] !== quote || path[i + 1] !== ']') return null;
    return { segment: key, end: i + 2 };
  }

  const close = path.indexOf(']', start);
  if (close === -1) return null;
  const body = path.slice(start + 1, close).trim();
  if (!/^\d+$/.test(body)) return null;
  return { segment: Number(body), end: close + 1 };
}

function step(current: unknown, segment: PathSegment): LookupResult {
  if (Array.isArray(current)) {
    const index = typeof segment === 'number' ? segment : /^\d+$/.test(segment) ? Number(segment) : -1;
    if (index < 0 || index >= current.length) return NOT_FOUND;
    return { found: true, value: current[index] };
  }

  if (typeof current === 'object' && current !== null) {
    const key = String(segment);
    if (!Object.prototype.hasOwnProperty.call(current, key)) return NOT_FOUND;
    return { found: true, value: Reflect.get(current, key) };
  }

  return NOT_FOUND;
}

/** Follows `path` through `root`. A JSON `null` at the end of the path counts as found. */
export function lookupPath(root: unknown, path: string): LookupResult {
  const segments = parsePath(path);
  if (segments === null) return NOT_FOUND;

  let result: LookupResult = { found: true, value: root };
  for (const segment of segments) {
    if (!result.found) return NOT_FOUND;
    result = step(result.value, segment);
  }
  return result;
}
