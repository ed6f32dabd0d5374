import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SnapshotStore } from '../../src/server/persistence/snapshot-store.js';
import type { SessionSnapshot } from '../../src/server/types.js';
import { makeSession, page } from '../helpers/fakes.js';

describe('restart recovery', () => {
  let dir = '';
  beforeEach(async () => { dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tabsession-')); });
  afterEach(async () => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('restores tabs and reloads their current entries', async () => {
    const before = makeSession({ now: () => 42 });
    before.session.newTab();
    before.session.completeNavigation(0, page('gemini://a/'), { fromHistory: false });
    before.session.completeNavigation(0, page('gemini://b/'), { fromHistory: false });
    before.session.back();
    before.session.newTab();
    before.session.completeNavigation(1, page('gemini://c/'), { fromHistory: false });

    const store = new SnapshotStore(path.join(dir, 'nested', 'snapshot.json'), 10);
    await store.saveSnapshot(before.session.exportSnapshot());
    const loaded = await store.loadSnapshot();
    expect(loaded).toEqual({
      version: 1,
      savedAt: 42,
      activeIndex: 1,
      tabs: [
        { history: { urls: ['gemini://a/', 'gemini://b/'], position: 0 } },
        { history: { urls: ['gemini://c/'], position: 0 } }
      ]
    });
    if (!loaded) return;

    const after = makeSession();
    after.session.importSnapshot(loaded);
    expect(after.session.activeIndex).toBe(1);
    expect(after.statusBar.getText()).toBe('gemini://c/');
    expect(after.navigator.loads).toEqual([
      [0, 'gemini://a/', { fromHistory: true }],
      [1, 'gemini://c/', { fromHistory: true }]
    ]);

    after.session.completeNavigation(0, page('gemini://a/'), { fromHistory: true });
    expect(after.session.tabs[0].history.entries()).toEqual(['gemini://a/', 'gemini://b/']);
    expect(after.session.forward()).toBe(false);
    expect(after.session.reloadMissing()).toBe(1);
  });

  it('ignores a snapshot that does not match the schema', async () => {
    const file = path.join(dir, 'snapshot.json');
    await fs.writeFile(file, JSON.stringify({ version: 1, tabs: 'nope' }));
    expect(await new SnapshotStore(file, 10).loadSnapshot()).toBeNull();
    expect(await new SnapshotStore(path.join(dir, 'missing.json'), 10).loadSnapshot()).toBeNull();
  });

  it('keeps writing snapshots while the session changes every second', () => {
    vi.useFakeTimers();
    const store = new SnapshotStore(path.join(dir, 'snapshot.json'), 2000);
    const saved: SessionSnapshot[] = [];
    vi.spyOn(store, 'saveSnapshot').mockImplementation(async (state) => { saved.push(state); });
    function exportLatest(): SessionSnapshot { return built.session.exportSnapshot(); }
    const built = makeSession({ onChange: () => store.scheduleSave(exportLatest) });

    built.session.newTab();
    for (let i = 0; i < 6; i += 1) {
      built.session.completeNavigation(0, page(`gemini://host/${i}`), { fromHistory: false });
      vi.advanceTimersByTime(1000);
    }

    expect(saved).toHaveLength(3);
    expect(saved[0].tabs[0].history).toEqual({ urls: ['gemini://host/0', 'gemini://host/1'], position: 1 });
    expect(saved[2].tabs[0].history.position).toBe(5);
  });

  it('writes the scheduled snapshot to disk', async () => {
    const file = path.join(dir, 'snapshot.json');
    const store = new SnapshotStore(file, 10);
    const { session } = makeSession({ now: () => 7 });
    session.newTab();
    store.scheduleSave(() => session.exportSnapshot());
    await vi.waitFor(async () => {
      expect(await store.loadSnapshot()).toEqual({ version: 1, savedAt: 7, activeIndex: 0, tabs: [{ history: { urls: [], position: -1 } }] });
    });
  });

  it('drops a scheduled snapshot when cancelled', () => {
    vi.useFakeTimers();
    const store = new SnapshotStore(path.join(dir, 'snapshot.json'), 2000);
    const save = vi.spyOn(store, 'saveSnapshot').mockResolvedValue();
    const { session } = makeSession();
    store.scheduleSave(() => session.exportSnapshot());
    store.cancel();
    vi.advanceTimersByTime(5000);
    expect(save).not.toHaveBeenCalled();
  });
});
