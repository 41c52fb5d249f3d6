import fs from 'fs';
import os from 'os';
import path from 'path';
import simpleGit from 'simple-git';
import { CommitError } from '../../shared/errors';
import { formatCommitMessage } from '../commit/parser';
import { splitDiffByFile } from '../diff/splitter';
import type { CommitMessage, FileDiffs } from '../types';

/**
 * The one simple-git call the repository needs; tests substitute a fake.
 */
export interface GitRunner {
  raw(commands: string[]): Promise<string>;
}

export function createGitRunner(baseDir: string = process.cwd()): GitRunner {
  return simpleGit({
    baseDir,
    // Treat every non-zero exit as a failure, even when git only wrote to stdout
    errors(error, result) {
      if (result.exitCode === 0) return undefined;
      return error ?? Buffer.concat([...result.stdOut, ...result.stdErr]);
    },
  });
}

export interface DiffOptions {
  contextLines?: number;
}

/**
 * One line of `git diff --cached --name-status`. `previousPath` is set for
 * renames and copies.
 */
export interface StagedEntry {
  status: string;
  path: string;
  previousPath: string | null;
}

export function parseNameStatus(output: string): StagedEntry[] {
  const fields = output.split('\0');
  const entries: StagedEntry[] = [];

  let i = 0;
  while (i < fields.length && fields[i] !== '') {
    const status = fields[i].charAt(0);
    if (status === 'R' || status === 'C') {
      entries.push({ status, previousPath: fields[i + 1], path: fields[i + 2] });
      i += 3;
    } else {
      entries.push({ status, previousPath: null, path: fields[i + 1] });
      i += 2;
    }
  }

  return entries;
}

export class GitRepository {
  constructor(private readonly git: GitRunner) {}

  /**
   * Staged changes as one diff. Failures read as "nothing staged".
   */
  async getStagedDiff(options: DiffOptions = {}): Promise<string> {
    const args = ['diff', '--cached'];
    if (options.contextLines !== undefined) {
      args.push(`--unified=${options.contextLines}`);
    }

    try {
      return await this.git.raw(args);
    } catch {
      return '';
    }
  }

  async getStagedFileDiffs(options: DiffOptions = {}): Promise<FileDiffs> {
    return splitDiffByFile(await this.getStagedDiff(options));
  }

  async getStagedEntries(): Promise<StagedEntry[]> {
    return parseNameStatus(await this.git.raw(['diff', '--cached', '--name-status', '-z']));
  }

  async getRepoRoot(): Promise<string | null> {
    return this.revParse('--show-toplevel');
  }

  async getGitDir(): Promise<string | null> {
    return this.revParse('--absolute-git-dir');
  }

  /**
   * Commit from a temporary message file. With a path, only that file is
   * staged and committed; a rename also takes the removal of its old path.
   */
  async commit(message: CommitMessage, filePath: string | null = null): Promise<void> {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'commitgen-'));
    const messageFile = path.join(tempDir, 'COMMIT_MSG');

    try {
      fs.writeFileSync(messageFile, formatCommitMessage(message), 'utf-8');

      if (filePath !== null) {
        const entry = (await this.getStagedEntries()).find((staged) => staged.path === filePath);
        // A staged deletion has nothing left to add
        if (entry?.status !== 'D') {
          await this.git.raw(['add', '--', filePath]);
        }
        const paths = entry?.status === 'R' && entry.previousPath !== null ? [entry.previousPath, filePath] : [filePath];
        await this.git.raw(['commit', '-F', messageFile, '--', ...paths]);
      } else {
        await this.git.raw(['commit', '-F', messageFile]);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CommitError(`git commit failed: ${reason.trim()}`, filePath);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  }

  writeMessageFile(message: CommitMessage, file: string): void {
    fs.writeFileSync(file, `${formatCommitMessage(message)}\n`, 'utf-8');
  }

  private async revParse(flag: string): Promise<string | null> {
    try {
      const output = (await this.git.raw(['rev-parse', flag])).trim();
      return output || null;
    } catch {
      return null;
    }
  }
}
