/**
 * Environment for git invocations.
 *
 * Prompts parse our output, so porcelain must not be localized. Optional locks
 * are off so `git status` does not take index.lock and rewrite the index on
 * every refresh.
 */
export const execaEnv = {
  env: {
    LC_ALL: 'C',
    GIT_OPTIONAL_LOCKS: '0',
  },
};
