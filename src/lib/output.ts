const RESET = '\x1b[0m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

const PREFIX = 'git-status-watch:';

// stdout carries status lines only; everything else goes to stderr.

export function outputError(error: unknown, json: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : 'UNKNOWN';
    console.error(JSON.stringify({ error: message, code }));
  } else {
    console.error(`${PREFIX} ${RED}error:${RESET} ${message}`);
  }
}

export function info(message: string): void {
  console.error(`${PREFIX} ${CYAN}▸${RESET} ${message}`);
}

export function warn(message: string): void {
  console.error(`${PREFIX} ${YELLOW}⚠${RESET} ${message}`);
}
