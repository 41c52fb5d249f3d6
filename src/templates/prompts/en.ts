export const FEW_SHOT_EXAMPLES = `
Example 1: Simple addition
Diff:
--- a/src/math.py
+++ b/src/math.py
@@ -1,1 +1,2 @@
 def subtract(x, y):
-    return x - y
+    return x - y
+
+def add(x, y):
+    return x + y
Commit Message:
feat(math): add add() helper function

Example 2: Debugging statement
Diff:
--- a/src/auth.py
+++ b/src/auth.py
@@ -10,3 +10,4 @@
 def login(user, pass):
     # ...
     authenticate(user, pass)
+    print("User authenticated")
Commit Message:
chore(auth): add temporary debug log

Example 3: Refactoring
Diff:
--- a/src/main.py
+++ b/src/main.py
@@ -5,5 +5,5 @@
-    logger.info("Starting app")
+    logger.debug("Starting app")
     run()
Commit Message:
refactor(logging): change log level from info to debug

Example 4: Multi-file change
Diff:
diff --git a/src/cli.py b/src/cli.py
--- a/src/cli.py
+++ b/src/cli.py
@@ -1,3 +1,3 @@
 def run_cli():
-    print("Running CLI tool")
+    # print("Running CLI tool")
     parse_args()
diff --git a/src/api.py b/src/api.py
--- a/src/api.py
+++ b/src/api.py
@@ -10,1 +10,1 @@
-    return {"status": "ok"}
+    return {"status": "live"}
Commit Message:
refactor(cli): comment out debug print
fix(api): correct status response from ok to live
`;

export const enPrompts = {
  system: 'Generate clear, accurate Git commit messages.',

  instructions: (types: readonly string[]) => `
You are a meticulous developer crafting Git commit messages in Conventional Commits format.

- Your primary goal is to accurately describe the changes in the provided diff.
- Use the format: <type>(<scope>): <summary>
- Allowed types: ${types.join(', ')}.
- The scope should be the name of the file or module most affected (e.g., "auth", "api", "cli").
- For changes spanning multiple files, you may provide multiple commit lines.
- Use "feat" for new features, "fix" for bug fixes, "refactor" for code changes that neither fix a bug nor add a feature, and "chore" for routine tasks.
- Optionally add a body after a blank line explaining what changed.
- Focus ONLY on the changes presented in the diff. Do not invent or generalize.`,

  wholeDiff: (diff: string) => `Now, write the commit message for the following diff:
${diff}`,

  fileDiff: (path: string, diff: string) => `Now, write the commit message for the following changes to ${path}:
${diff}`,
};
