import type { FileDiffs } from '../types';

const BOUNDARY_PREFIX = 'diff --git ';

// Header lines that name a single side, read until the first hunk
const HEADER_PATHS: ReadonlyArray<[RegExp, 'old' | 'new']> = [
  [/^rename from (.+)$/, 'old'],
  [/^rename to (.+)$/, 'new'],
  [/^copy from (.+)$/, 'old'],
  [/^copy to (.+)$/, 'new'],
  [/^--- (.+)$/, 'old'],
  [/^\+\+\+ (.+)$/, 'new'],
];

const C_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

export interface BoundaryPaths {
  oldPath: string;
  newPath: string;
}

/**
 * Read one C-quoted path as git writes it for names with special or
 * non-ASCII characters. Returns the decoded text and the index past the
 * closing quote.
 */
function readQuoted(text: string, start: number): { value: string; end: number } | null {
  const bytes: number[] = [];
  let i = start + 1;

  while (i < text.length) {
    const char = text[i];
    if (char === '"') {
      return { value: Buffer.from(bytes).toString('utf-8'), end: i + 1 };
    }
    if (char !== '\\') {
      const raw = String.fromCodePoint(text.codePointAt(i) ?? 0);
      bytes.push(...Buffer.from(raw, 'utf-8'));
      i += raw.length;
      continue;
    }

    const next = text[i + 1] ?? '';
    const octal = text.slice(i + 1, i + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(parseInt(octal, 8));
      i += 4;
    } else if (next in C_ESCAPES) {
      bytes.push(C_ESCAPES[next]);
      i += 2;
    } else {
      return null;
    }
  }

  return null;
}

function stripPrefix(value: string, prefix: 'a/' | 'b/'): string | null {
  return value.startsWith(prefix) ? value.slice(prefix.length) : null;
}

/**
 * Path named by a `---`, `+++`, `rename` or `copy` header. `/dev/null` names no file.
 * Git appends a tab to unquoted names that contain a space.
 */
function parseHeaderPath(raw: string, prefix: 'a/' | 'b/' | null): string | null {
  let value: string;
  if (raw.startsWith('"')) {
    const quoted = readQuoted(raw, 0);
    if (quoted === null) return null;
    value = quoted.value;
  } else {
    value = raw.endsWith('\t') ? raw.slice(0, -1) : raw;
  }

  if (value === '/dev/null') return null;
  return prefix === null ? value : stripPrefix(value, prefix);
}

/**
 * Both sides of a `diff --git a/<old> b/<new>` line, quoted or not.
 * An unquoted line is ambiguous when a name contains " b/"; equal sides are
 * preferred, then the first separator.
 */
export function parseBoundaryPaths(line: string): BoundaryPaths | null {
  if (!line.startsWith(BOUNDARY_PREFIX)) return null;
  const rest = line.slice(BOUNDARY_PREFIX.length);

  if (rest.startsWith('"') || rest.endsWith('"')) {
    let oldRaw: string;
    let newRaw: string;
    if (rest.startsWith('"')) {
      const first = readQuoted(rest, 0);
      if (first === null || rest[first.end] !== ' ') return null;
      oldRaw = first.value;
      newRaw = rest.slice(first.end + 1);
    } else {
      const separator = rest.lastIndexOf(' "');
      if (separator === -1) return null;
      oldRaw = rest.slice(0, separator);
      newRaw = rest.slice(separator + 1);
    }

    if (newRaw.startsWith('"')) {
      const second = readQuoted(newRaw, 0);
      if (second === null || second.end !== newRaw.length) return null;
      newRaw = second.value;
    }

    const oldPath = stripPrefix(oldRaw, 'a/');
    const newPath = stripPrefix(newRaw, 'b/');
    return oldPath !== null && newPath !== null ? { oldPath, newPath } : null;
  }

  if (!rest.startsWith('a/')) return null;

  // "a/<p> b/<p>": both halves are the same length
  if (rest.length % 2 === 1) {
    const half = (rest.length - 1) / 2;
    const oldPath = stripPrefix(rest.slice(0, half), 'a/');
    const newPath = stripPrefix(rest.slice(half + 1), 'b/');
    if (rest[half] === ' ' && oldPath !== null && oldPath === newPath) {
      return { oldPath, newPath };
    }
  }

  const separator = rest.indexOf(' b/');
  if (separator === -1) return null;
  return { oldPath: rest.slice(2, separator), newPath: rest.slice(separator + 3) };
}

/**
 * Extract the repository-relative path from a boundary line.
 * Renames are keyed by the new path.
 */
export function parseBoundaryPath(line: string): string | null {
  return parseBoundaryPaths(line)?.newPath ?? null;
}

interface Segment {
  boundary: BoundaryPaths;
  oldPath: string | null;
  newPath: string | null;
  inHeader: boolean;
  lines: string[];
}

// Header lines name each side exactly; the boundary line is the fallback
function segmentKey(segment: Segment): string {
  return segment.newPath ?? segment.oldPath ?? segment.boundary.newPath;
}

function readHeader(segment: Segment, line: string): void {
  if (line.startsWith('@@') || line.startsWith('Binary files') || line === 'GIT binary patch') {
    segment.inHeader = false;
    return;
  }

  for (const [pattern, side] of HEADER_PATHS) {
    const match = line.match(pattern);
    if (!match) continue;

    const isRenameOrCopy = line.startsWith('rename ') || line.startsWith('copy ');
    const prefix = isRenameOrCopy ? null : side === 'old' ? 'a/' : 'b/';
    const parsed = parseHeaderPath(match[1], prefix);
    if (side === 'new') {
      // A deletion's "+++ /dev/null" must not hide the name from "--- a/"
      if (parsed !== null) segment.newPath = parsed;
    } else if (parsed !== null) {
      segment.oldPath = parsed;
    }
    return;
  }
}

/**
 * Split a combined staged diff into one segment per file.
 * Each segment starts at its own boundary line; anything before the first
 * boundary is dropped.
 */
export function splitDiffByFile(diff: string): FileDiffs {
  const files: FileDiffs = new Map();
  let current: Segment | null = null;

  const flush = () => {
    if (current === null) return;
    const key = segmentKey(current);
    const segment = current.lines.join('\n');
    const existing = files.get(key);
    files.set(key, existing === undefined ? segment : `${existing}\n${segment}`);
  };

  for (const line of diff.split('\n')) {
    const boundary = parseBoundaryPaths(line);
    if (boundary !== null) {
      flush();
      current = { boundary, oldPath: null, newPath: null, inHeader: true, lines: [line] };
      continue;
    }
    if (current === null) continue;

    current.lines.push(line);
    if (current.inHeader) {
      readHeader(current, line);
    }
  }
  flush();

  return files;
}
