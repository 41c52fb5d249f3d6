import { describe, it, expect } from 'vitest';
import { parseBoundaryPath, parseBoundaryPaths, splitDiffByFile } from './splitter';

const TWO_FILES = [
  'diff --git a/x b/x',
  'index 1111111..2222222 100644',
  '--- a/x',
  '+++ b/x',
  '@@ -1 +1 @@',
  '-old x',
  '+new x',
  'diff --git a/y b/y',
  '--- a/y',
  '+++ b/y',
  '@@ -0,0 +1 @@',
  '+new y',
].join('\n');

describe('parseBoundaryPath', () => {
  it('returns the b/ path of a boundary line', () => {
    expect(parseBoundaryPath('diff --git a/src/app.ts b/src/app.ts')).toBe('src/app.ts');
  });

  it('keys renames by the new path', () => {
    expect(parseBoundaryPath('diff --git a/old.ts b/new.ts')).toBe('new.ts');
  });

  it('decodes quoted paths with octal escapes', () => {
    expect(parseBoundaryPath('diff --git "a/caf\\303\\251.txt" "b/caf\\303\\251.txt"')).toBe('café.txt');
  });

  it('keeps a path containing " b/" whole when both sides match', () => {
    expect(parseBoundaryPath('diff --git a/x b/y.txt b/x b/y.txt')).toBe('x b/y.txt');
  });

  it('returns both sides of a rename', () => {
    expect(parseBoundaryPaths('diff --git a/old.ts b/new.ts')).toEqual({ oldPath: 'old.ts', newPath: 'new.ts' });
  });

  it('returns null for other lines', () => {
    expect(parseBoundaryPath('+++ b/x')).toBeNull();
  });
});

describe('splitDiffByFile', () => {
  it('splits two files into two keyed segments', () => {
    const files = splitDiffByFile(TWO_FILES);

    expect(Array.from(files.keys())).toEqual(['x', 'y']);
    expect(files.get('x')).toBe(
      ['diff --git a/x b/x', 'index 1111111..2222222 100644', '--- a/x', '+++ b/x', '@@ -1 +1 @@', '-old x', '+new x'].join(
        '\n'
      )
    );
    expect(files.get('y')).toBe(['diff --git a/y b/y', '--- a/y', '+++ b/y', '@@ -0,0 +1 @@', '+new y'].join('\n'));
  });

  it('keeps other files out of each segment', () => {
    const files = splitDiffByFile(TWO_FILES);
    expect(files.get('x')).not.toContain('new y');
    expect(files.get('y')).not.toContain('old x');
  });

  it('returns an empty map for an empty diff', () => {
    expect(splitDiffByFile('').size).toBe(0);
  });

  it('drops text before the first boundary', () => {
    const files = splitDiffByFile(['warning: preamble', 'diff --git a/z b/z', '+z'].join('\n'));
    expect(Array.from(files.entries())).toEqual([['z', 'diff --git a/z b/z\n+z']]);
  });

  it('flushes the final segment including its trailing newline', () => {
    const files = splitDiffByFile('diff --git a/z b/z\n+z\n');
    expect(files.get('z')).toBe('diff --git a/z b/z\n+z\n');
  });

  it('joins repeated paths under one key', () => {
    const files = splitDiffByFile(['diff --git a/z b/z', '+one', 'diff --git a/z b/z', '+two'].join('\n'));
    expect(files.size).toBe(1);
    expect(files.get('z')).toBe('diff --git a/z b/z\n+one\ndiff --git a/z b/z\n+two');
  });

  it('gives quoted paths their own segment', () => {
    const diff = [
      'diff --git a/a.txt b/a.txt',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/a.txt',
      '@@ -0,0 +1 @@',
      '+a',
      'diff --git "a/caf\\303\\251.txt" "b/caf\\303\\251.txt"',
      'new file mode 100644',
      '--- /dev/null',
      '+++ "b/caf\\303\\251.txt"',
      '@@ -0,0 +1 @@',
      '+cafe',
    ].join('\n');

    const files = splitDiffByFile(diff);

    expect(Array.from(files.keys())).toEqual(['a.txt', 'café.txt']);
    expect(files.get('a.txt')).not.toContain('+cafe');
  });

  it('keeps a quoted first file instead of dropping it', () => {
    const diff = ['diff --git "a/\\303\\251.md" "b/\\303\\251.md"', '+e', 'diff --git a/z b/z', '+z'].join('\n');
    expect(Array.from(splitDiffByFile(diff).entries())).toEqual([
      ['é.md', 'diff --git "a/\\303\\251.md" "b/\\303\\251.md"\n+e'],
      ['z', 'diff --git a/z b/z\n+z'],
    ]);
  });

  it('keys a path containing " b/" by the whole path', () => {
    expect(Array.from(splitDiffByFile('diff --git a/x b/y.txt b/x b/y.txt\n+1').keys())).toEqual(['x b/y.txt']);
  });

  it('takes rename targets from the rename headers', () => {
    const diff = ['diff --git a/x b/y b/z', 'similarity index 100%', 'rename from x b/y', 'rename to z'].join('\n');
    expect(Array.from(splitDiffByFile(diff).keys())).toEqual(['z']);
  });

  it('keys a deletion by the removed path', () => {
    const diff = [
      'diff --git a/gone.txt b/gone.txt',
      'deleted file mode 100644',
      '--- a/gone.txt',
      '+++ /dev/null',
      '@@ -1 +0,0 @@',
      '-bye',
    ].join('\n');
    expect(Array.from(splitDiffByFile(diff).keys())).toEqual(['gone.txt']);
  });

  it('ignores header-like lines inside hunks', () => {
    const diff = ['diff --git a/notes.md b/notes.md', '--- a/notes.md', '+++ b/notes.md', '@@ -1 +1,2 @@', ' x', '+++ b/other'].join(
      '\n'
    );
    expect(Array.from(splitDiffByFile(diff).keys())).toEqual(['notes.md']);
  });
});
