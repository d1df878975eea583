import fs from 'node:fs/promises';
import writeFileAtomic from 'write-file-atomic';
import { decodeSnapshot, encodeSnapshot } from './codec.js';
import type { StatusSnapshot } from '../types/status.js';

export async function ensureStateDir(stateDir: string): Promise<void> {
  await fs.mkdir(stateDir, { recursive: true });
}

/** Publish a snapshot by writing a temporary sibling and renaming it over the target. */
export async function writeStateFile(stateFile: string, snapshot: StatusSnapshot): Promise<void> {
  await writeFileAtomic(stateFile, encodeSnapshot(snapshot));
}

/**
 * Read the last published snapshot. A missing, unreadable or malformed file
 * yields `undefined`: a reader can land between the unlink and the link of a
 * rename, and the next notification will retry.
 */
export async function readStateFile(stateFile: string): Promise<StatusSnapshot | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(stateFile, 'utf-8');
  } catch {
    return undefined;
  }
  try {
    return decodeSnapshot(raw);
  } catch {
    return undefined;
  }
}
