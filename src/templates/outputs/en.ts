export const enOutputs = {
  // Generation
  generate: {
    noStagedChanges: 'No staged changes detected.',
    generating: '🤖 Generating commit message...',
    generatingFor: (path: string) => `🤖 Generating commit message for ${path}...`,
    suggestedTitle: '🔤 Suggested Commit Title:',
    suggestedBody: '📄 Suggested Commit Body:',
    question: 'Use this commit message? (y = yes, r = regenerate, s = skip)',
    invalidChoice: 'Please answer y, r or s.',
    lowValue: '⏭️  Detected low-value commit. Skipping.',
    regenerating: '🔁 Regenerating commit message...',
    skipped: 'Commit skipped.',
    committed: 'Commit created successfully!',
    committedFile: (path: string) => `Committed ${path}`,
    written: (file: string) => `Commit message written to ${file}`,
  },

  // Setup commands
  cli: {
    notRepository: 'Not a git repository.',
    configCreated: (file: string) => `Created config at ${file}`,
    configExists: (file: string) => `Config already exists at ${file}`,
    hookInstalled: (name: string) => `Installed hook: ${name}`,
    hookAlreadyInstalled: (name: string) => `commitgen hook already installed: ${name}`,
    hookBackedUp: (name: string) => `Backed up existing hook to ${name}`,
    hookRestored: (name: string) => `Restored original ${name} hook`,
    hookRemoved: (name: string) => `Removed ${name} hook`,
    hookNotFound: (name: string) => `No commitgen hook found in ${name}`,
  },
};
