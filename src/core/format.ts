import type { OperationState, StatusSnapshot } from '../types/status.js';

export type Renderer = (snapshot: StatusSnapshot) => string;

const STATE_LABELS: Record<OperationState, string> = {
  clean: '',
  merge: 'merge',
  rebase: 'rebase',
  cherry_pick: 'cherry-pick',
  bisect: 'bisect',
  revert: 'revert',
};

export function renderJson(snapshot: StatusSnapshot): string {
  return JSON.stringify({
    branch: snapshot.branch,
    staged: snapshot.staged,
    modified: snapshot.modified,
    untracked: snapshot.untracked,
    conflicted: snapshot.conflicted,
    ahead: snapshot.ahead,
    behind: snapshot.behind,
    stash: snapshot.stash,
    state: snapshot.state,
  });
}

/**
 * Substitute `{branch}`, `{staged}`, `{modified}`, `{untracked}`,
 * `{conflicted}`, `{ahead}`, `{behind}`, `{stash}` and `{state}`, then expand
 * the literal escapes `\t` and `\n`. Unknown placeholders are left as-is.
 */
export function renderTemplate(snapshot: StatusSnapshot, template: string): string {
  const values: Record<string, string> = {
    branch: snapshot.branch,
    staged: String(snapshot.staged),
    modified: String(snapshot.modified),
    untracked: String(snapshot.untracked),
    conflicted: String(snapshot.conflicted),
    ahead: String(snapshot.ahead),
    behind: String(snapshot.behind),
    stash: String(snapshot.stash),
    state: STATE_LABELS[snapshot.state],
  };
  return template
    .replace(/\{(\w+)\}/g, (match, key: string) => (Object.hasOwn(values, key) ? values[key] : match))
    .replaceAll('\\t', '\t')
    .replaceAll('\\n', '\n');
}

export function createRenderer(template?: string): Renderer {
  if (template === undefined) return renderJson;
  return (snapshot) => renderTemplate(snapshot, template);
}
