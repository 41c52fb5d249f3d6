import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createGitRunner, GitRepository, parseNameStatus } from './repository';
import type { GitRunner } from './repository';
import { CommitError } from '../../shared/errors';

function fakeRunner(handler: (args: string[]) => string = () => '') {
  const calls: string[][] = [];
  const messages: string[] = [];
  const runner: GitRunner = {
    raw: vi.fn(async (args: string[]) => {
      calls.push(args);
      const fileIndex = args.indexOf('-F');
      if (fileIndex !== -1) {
        messages.push(fs.readFileSync(args[fileIndex + 1], 'utf-8'));
      }
      return handler(args);
    }),
  };
  return { runner, calls, messages };
}

describe('GitRepository', () => {
  describe('getStagedDiff', () => {
    it('returns git diff --cached output', async () => {
      const { runner, calls } = fakeRunner(() => 'diff --git a/x b/x\n');
      await expect(new GitRepository(runner).getStagedDiff()).resolves.toBe('diff --git a/x b/x\n');
      expect(calls).toEqual([['diff', '--cached']]);
    });

    it('passes the context line count', async () => {
      const { runner, calls } = fakeRunner();
      await new GitRepository(runner).getStagedDiff({ contextLines: 0 });
      expect(calls).toEqual([['diff', '--cached', '--unified=0']]);
    });

    it('treats a failing git call as no changes', async () => {
      const { runner } = fakeRunner(() => {
        throw new Error('fatal: not a git repository');
      });
      await expect(new GitRepository(runner).getStagedDiff()).resolves.toBe('');
    });
  });

  it('splits the staged diff per file', async () => {
    const { runner } = fakeRunner(() => 'diff --git a/x b/x\n+x\ndiff --git a/y b/y\n+y');
    const files = await new GitRepository(runner).getStagedFileDiffs();
    expect(Array.from(files.keys())).toEqual(['x', 'y']);
  });

  describe('parseNameStatus', () => {
    it('reads plain, renamed and copied entries', () => {
      expect(parseNameStatus('M\0a.ts\0R087\0b.ts\0c.ts\0C100\0d.ts\0e.ts\0D\0f.ts\0')).toEqual([
        { status: 'M', previousPath: null, path: 'a.ts' },
        { status: 'R', previousPath: 'b.ts', path: 'c.ts' },
        { status: 'C', previousPath: 'd.ts', path: 'e.ts' },
        { status: 'D', previousPath: null, path: 'f.ts' },
      ]);
    });

    it('returns nothing for empty output', () => {
      expect(parseNameStatus('')).toEqual([]);
    });
  });

  describe('getRepoRoot', () => {
    it('returns the trimmed top-level path', async () => {
      const { runner, calls } = fakeRunner(() => '/work/repo\n');
      await expect(new GitRepository(runner).getRepoRoot()).resolves.toBe('/work/repo');
      expect(calls).toEqual([['rev-parse', '--show-toplevel']]);
    });

    it('returns null outside a repository', async () => {
      const { runner } = fakeRunner(() => {
        throw new Error('fatal: not a git repository');
      });
      await expect(new GitRepository(runner).getRepoRoot()).resolves.toBeNull();
    });
  });

  describe('commit', () => {
    it('commits from a message file holding title, blank line and body', async () => {
      const { runner, calls, messages } = fakeRunner();
      await new GitRepository(runner).commit({ title: 'feat: add login', body: 'Adds the form.' });

      expect(calls).toHaveLength(1);
      expect(calls[0].slice(0, 2)).toEqual(['commit', '-F']);
      expect(messages).toEqual(['feat: add login\n\nAdds the form.']);
    });

    it('stages and commits only the target file in per-file mode', async () => {
      const { runner, calls } = fakeRunner((args) => (args.includes('--name-status') ? 'M\0src/x.ts\0' : ''));
      await new GitRepository(runner).commit({ title: 'fix(x): y', body: '' }, 'src/x.ts');

      expect(calls[0]).toEqual(['diff', '--cached', '--name-status', '-z']);
      expect(calls[1]).toEqual(['add', '--', 'src/x.ts']);
      expect(calls[2][0]).toBe('commit');
      expect(calls[2].slice(-2)).toEqual(['--', 'src/x.ts']);
    });

    it('does not re-add a staged deletion', async () => {
      const { runner, calls } = fakeRunner((args) => (args.includes('--name-status') ? 'D\0gone.txt\0' : ''));
      await new GitRepository(runner).commit({ title: 'chore: remove gone', body: '' }, 'gone.txt');

      expect(calls.map((args) => args[0])).toEqual(['diff', 'commit']);
      expect(calls[1].slice(-2)).toEqual(['--', 'gone.txt']);
    });

    it('commits both sides of a rename', async () => {
      const { runner, calls } = fakeRunner((args) => (args.includes('--name-status') ? 'R100\0old.ts\0new.ts\0' : ''));
      await new GitRepository(runner).commit({ title: 'refactor: rename', body: '' }, 'new.ts');

      expect(calls[1]).toEqual(['add', '--', 'new.ts']);
      expect(calls[2].slice(-3)).toEqual(['--', 'old.ts', 'new.ts']);
    });

    it('removes the temporary message file', async () => {
      const { runner, calls } = fakeRunner();
      await new GitRepository(runner).commit({ title: 'feat: x', body: '' });
      expect(fs.existsSync(calls[0][2])).toBe(false);
    });

    it('raises CommitError when git commit fails', async () => {
      const { runner, calls } = fakeRunner((args) => {
        if (args[0] === 'commit') throw new Error('nothing to commit\n');
        return '';
      });
      const error = await new GitRepository(runner)
        .commit({ title: 'feat: x', body: '' }, 'a.ts')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommitError);
      expect(error).toMatchObject({ message: 'git commit failed: nothing to commit', path: 'a.ts' });
      expect(fs.existsSync(calls[2][2])).toBe(false);
    });
  });

  describe('writeMessageFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'commitgen-test-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes the formatted message without committing', () => {
      const { runner, calls } = fakeRunner();
      const file = path.join(dir, 'COMMIT_EDITMSG');
      new GitRepository(runner).writeMessageFile({ title: 'docs: x', body: 'y' }, file);

      expect(fs.readFileSync(file, 'utf-8')).toBe('docs: x\n\ny\n');
      expect(calls).toEqual([]);
    });
  });

  describe('against a real repository', () => {
    let dir: string;
    let git: GitRunner;

    beforeEach(async () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'commitgen-repo-'));
      git = createGitRunner(dir);
      await git.raw(['init', '-q']);
      await git.raw(['config', 'user.email', 'dev@example.com']);
      await git.raw(['config', 'user.name', 'Dev']);
      await git.raw(['config', 'commit.gpgsign', 'false']);
      fs.writeFileSync(path.join(dir, 'gone.txt'), 'bye\n');
      fs.writeFileSync(path.join(dir, 'keep.txt'), 'keep\n');
      await git.raw(['add', '.']);
      await git.raw(['commit', '-q', '-m', 'init']);
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('commits a staged deletion on its own', async () => {
      await git.raw(['rm', '-q', 'gone.txt']);
      fs.writeFileSync(path.join(dir, 'keep.txt'), 'kept\n');
      await git.raw(['add', 'keep.txt']);
      const repository = new GitRepository(git);

      expect(Array.from((await repository.getStagedFileDiffs()).keys())).toEqual(['gone.txt', 'keep.txt']);
      await repository.commit({ title: 'chore: remove gone', body: '' }, 'gone.txt');

      expect(await git.raw(['log', '-1', '--format=%s'])).toBe('chore: remove gone\n');
      expect(await git.raw(['diff', '--cached', '--name-only'])).toBe('keep.txt\n');
    });

    it('commits both sides of a rename', async () => {
      await git.raw(['mv', 'keep.txt', 'kept.txt']);
      const repository = new GitRepository(git);

      expect(Array.from((await repository.getStagedFileDiffs()).keys())).toEqual(['kept.txt']);
      await repository.commit({ title: 'refactor: rename keep', body: '' }, 'kept.txt');

      expect(await git.raw(['diff', '--cached', '--name-only'])).toBe('');
      expect(await git.raw(['ls-tree', '--name-only', 'HEAD'])).toBe('gone.txt\nkept.txt\n');
    });

    it('splits files whose names git quotes', async () => {
      fs.writeFileSync(path.join(dir, 'a.txt'), 'a\n');
      fs.writeFileSync(path.join(dir, 'café.txt'), 'cafe\n');
      await git.raw(['add', 'a.txt', 'café.txt']);

      const files = await new GitRepository(git).getStagedFileDiffs();

      expect(Array.from(files.keys())).toEqual(['a.txt', 'café.txt']);
      expect(files.get('a.txt')).not.toContain('+cafe');
    });
  });
});
