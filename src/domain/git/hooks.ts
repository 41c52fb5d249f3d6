import fs from 'fs';
import path from 'path';
import { FILE_CONSTANTS } from '../../shared/constants';
import type { Logger } from '../../shared/logger';
import { enOutputs } from '../../templates/outputs/en';

const HOOK_CONTENT = `#!/bin/sh
# ${FILE_CONSTANTS.HOOK_MARKER} ${FILE_CONSTANTS.HOOK_NAME} hook
# Fail-open: a hook failure never blocks the commit

set +e

COMMIT_MSG_FILE="$1"
COMMIT_SOURCE="$2"

# Leave -m, -F, templates, merges, squashes and amends alone
if [ -z "$COMMIT_SOURCE" ]; then
  if command -v commitgen >/dev/null 2>&1; then
    commitgen generate --yes --message-file "$COMMIT_MSG_FILE" </dev/null || true
  else
    echo "Warning: commitgen not found, skipping ${FILE_CONSTANTS.HOOK_NAME} hook" >&2
  fi
fi
`;

export class GitHookManager {
  private readonly hookPath: string;
  private readonly backupPath: string;

  constructor(gitDir: string, private readonly logger: Logger) {
    this.hookPath = path.join(gitDir, 'hooks', FILE_CONSTANTS.HOOK_NAME);
    this.backupPath = `${this.hookPath}${FILE_CONSTANTS.BACKUP_SUFFIX}`;
  }

  install(): void {
    fs.mkdirSync(path.dirname(this.hookPath), { recursive: true });

    if (fs.existsSync(this.hookPath)) {
      const existingContent = fs.readFileSync(this.hookPath, 'utf-8');
      if (this.isOwnHook(existingContent)) {
        this.logger.info(enOutputs.cli.hookAlreadyInstalled(FILE_CONSTANTS.HOOK_NAME));
        return;
      }

      if (!fs.existsSync(this.backupPath)) {
        fs.copyFileSync(this.hookPath, this.backupPath);
        this.logger.info(enOutputs.cli.hookBackedUp(path.basename(this.backupPath)));
      }

      fs.writeFileSync(this.hookPath, GitHookManager.mergeHooks(existingContent, HOOK_CONTENT));
    } else {
      fs.writeFileSync(this.hookPath, HOOK_CONTENT);
    }

    fs.chmodSync(this.hookPath, 0o755);
    this.logger.success(enOutputs.cli.hookInstalled(FILE_CONSTANTS.HOOK_NAME));
  }

  uninstall(): void {
    if (!fs.existsSync(this.hookPath)) {
      return;
    }

    if (!this.isOwnHook(fs.readFileSync(this.hookPath, 'utf-8'))) {
      this.logger.info(enOutputs.cli.hookNotFound(FILE_CONSTANTS.HOOK_NAME));
      return;
    }

    if (fs.existsSync(this.backupPath)) {
      fs.copyFileSync(this.backupPath, this.hookPath);
      fs.unlinkSync(this.backupPath);
      this.logger.success(enOutputs.cli.hookRestored(FILE_CONSTANTS.HOOK_NAME));
    } else {
      fs.unlinkSync(this.hookPath);
      this.logger.success(enOutputs.cli.hookRemoved(FILE_CONSTANTS.HOOK_NAME));
    }
  }

  static getHookContent(): string {
    return HOOK_CONTENT;
  }

  // Our hook first, then the original without its shebang
  static mergeHooks(existing: string, newHook: string): string {
    const existingWithoutShebang = existing
      .split('\n')
      .filter((line) => !line.startsWith('#!'))
      .join('\n');

    return `${newHook}\n\n# === Original hook below ===\n${existingWithoutShebang}`;
  }

  private isOwnHook(content: string): boolean {
    return content.includes(`# ${FILE_CONSTANTS.HOOK_MARKER} ${FILE_CONSTANTS.HOOK_NAME} hook`);
  }
}
