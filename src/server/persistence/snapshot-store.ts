import fs from 'node:fs/promises';
import path from 'node:path';
import type { SessionSnapshot } from '../types.js';
import { createLogger } from '../log.js';
import { sessionSnapshotSchema } from './snapshot-schema.js';

const log = createLogger('snapshot');

export class SnapshotStore {
  private timer?: NodeJS.Timeout;
  constructor(private readonly filePath: string, private readonly flushMs: number) {}

  /** Null when there is no snapshot yet or it does not match the schema. */
  async loadSnapshot(): Promise<SessionSnapshot | null> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf8');
    } catch {
      return null;
    }
    try {
      return sessionSnapshotSchema.parse(JSON.parse(data));
    } catch (error) {
      log.warn('ignoring unreadable session snapshot', { path: this.filePath, err: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }

  async saveSnapshot(state: SessionSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(state, null, 2));
  }

  /**
   * Writes the snapshot flushMs after the first change since the last write.
   * Changes while a write is scheduled join it, so a steady stream of changes
   * still gets a write every flushMs.
   */
  scheduleSave(getter: () => SessionSnapshot): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.saveSnapshot(getter()).catch((error: unknown) => {
        log.error('session snapshot not saved', { path: this.filePath, err: error instanceof Error ? error.message : String(error) });
      });
    }, this.flushMs);
  }

  cancel(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
  }
}
