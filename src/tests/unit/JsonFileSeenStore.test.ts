import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StoreError } from '../../core/errors';
import { FileLock } from '../../store/FileLock';
import { JsonFileSeenStore } from '../../store/JsonFileSeenStore';
import { withSeenSet } from '../../store/SeenStore';
import { testLogger } from '../helpers/http';
import { makeListing } from '../helpers/listings';

describe('JsonFileSeenStore', () => {
  const logger = testLogger();
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'olx-watch-'));
    file = path.join(dir, 'seen_ads.json');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  function createStore(lockStaleMs = 600_000): JsonFileSeenStore {
    return new JsonFileSeenStore({ filePath: file, lockStaleMs }, logger);
  }

  async function readIds(): Promise<unknown> {
    return JSON.parse(await fs.promises.readFile(file, 'utf-8'));
  }

  it('starts empty when the file does not exist', async () => {
    const size = await withSeenSet(createStore(), async seen => seen.size);

    expect(size).toBe(0);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('persists every id as soon as it is marked', async () => {
    await withSeenSet(createStore(), async seen => {
      await seen.markSeen(makeListing('a'));
      expect(await readIds()).toEqual(['a']);
      await seen.markSeen(makeListing('b'));
    });

    expect(await readIds()).toEqual(['a', 'b']);
  });

  it('reloads what a previous session wrote', async () => {
    await fs.promises.writeFile(file, JSON.stringify(['a', 'b']));

    const known = await withSeenSet(createStore(), async seen => [seen.has('a'), seen.has('b'), seen.has('c'), seen.size]);

    expect(known).toEqual([true, true, false, 2]);
  });

  it('leaves no temporary file behind', async () => {
    await withSeenSet(createStore(), seen => seen.markSeen(makeListing('a')));

    expect(await fs.promises.readdir(dir)).toEqual(['seen_ads.json']);
  });

  it('sets a corrupt file aside and starts fresh', async () => {
    await fs.promises.writeFile(file, '{"not": "closed"');

    await withSeenSet(createStore(), async seen => {
      expect(seen.size).toBe(0);
      await seen.markSeen(makeListing('a'));
    });

    const entries = await fs.promises.readdir(dir);
    const backup = entries.find(name => name.startsWith('seen_ads.json.corrupt-'));
    expect(backup).toBeDefined();
    expect(await fs.promises.readFile(path.join(dir, backup ?? ''), 'utf-8')).toBe('{"not": "closed"');
    expect(await readIds()).toEqual(['a']);
  });

  it('treats a non-array file as corrupt', async () => {
    await fs.promises.writeFile(file, JSON.stringify({ a: true }));

    const size = await withSeenSet(createStore(), async seen => seen.size);

    expect(size).toBe(0);
  });

  it('refuses a second session while the first holds the lock', async () => {
    const first = createStore();
    const second = createStore();
    const handle = await first.acquire();

    await expect(second.acquire()).rejects.toBeInstanceOf(StoreError);

    await handle.release();
    const again = await second.acquire();
    await again.release();
  });

  it('removes the lock file on release', async () => {
    const handle = await createStore().acquire();
    expect(fs.existsSync(`${file}.lock`)).toBe(true);

    await handle.release();

    expect(fs.existsSync(`${file}.lock`)).toBe(false);
  });

  it('rejects markSeen after release', async () => {
    const handle = await createStore().acquire();
    await handle.release();

    await expect(handle.markSeen(makeListing('a'))).rejects.toThrow('Seen set handle used after release');
  });

  it('releases the lock when the callback throws', async () => {
    const store = createStore();

    await expect(withSeenSet(store, async () => {
      throw new Error('cycle blew up');
    })).rejects.toThrow('cycle blew up');

    expect(fs.existsSync(`${file}.lock`)).toBe(false);
  });
});

describe('FileLock', () => {
  const logger = testLogger();
  let dir: string;
  let lockPath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'olx-watch-lock-'));
    lockPath = path.join(dir, 'seen.lock');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('takes over a lock older than the stale age', async () => {
    await fs.promises.writeFile(lockPath, JSON.stringify({
      holder: 'other',
      pid: process.pid,
      host: os.hostname(),
      acquiredAtUtc: '2020-01-01T00:00:00.000Z'
    }));
    const lock = new FileLock(lockPath, 60_000, logger);

    await lock.acquire();

    expect(lock.isHeld()).toBe(true);
    const content: unknown = JSON.parse(await fs.promises.readFile(lockPath, 'utf-8'));
    expect(content).toMatchObject({ pid: process.pid });
    expect(content).not.toMatchObject({ holder: 'other' });
    await lock.release();
  });

  it('takes over an unreadable lock once its mtime is past the stale age', async () => {
    await fs.promises.writeFile(lockPath, 'garbage');
    const old = new Date(Date.now() - 120_000);
    await fs.promises.utimes(lockPath, old, old);
    const lock = new FileLock(lockPath, 60_000, logger);

    await lock.acquire();

    expect(lock.isHeld()).toBe(true);
    await lock.release();
  });

  it('leaves a fresh empty lock to the process still writing it', async () => {
    await fs.promises.writeFile(lockPath, '');
    const lock = new FileLock(lockPath, 60_000, logger);

    await expect(lock.acquire()).rejects.toThrow(/unreadable and younger than 60000ms/);
    expect(lock.isHeld()).toBe(false);
    expect(await fs.promises.readFile(lockPath, 'utf-8')).toBe('');
  });

  it('respects a fresh lock held by this live process', async () => {
    await fs.promises.writeFile(lockPath, JSON.stringify({
      holder: 'other',
      pid: process.pid,
      host: os.hostname(),
      acquiredAtUtc: new Date().toISOString()
    }));
    const lock = new FileLock(lockPath, 60_000, logger);

    await expect(lock.acquire()).rejects.toThrow(/Seen set is locked by other/);
  });

  it('leaves a lock that someone else took over', async () => {
    const lock = new FileLock(lockPath, 60_000, logger);
    await lock.acquire();
    await fs.promises.writeFile(lockPath, JSON.stringify({
      holder: 'intruder',
      pid: process.pid,
      host: os.hostname(),
      acquiredAtUtc: new Date().toISOString()
    }));

    await lock.release();

    expect(fs.existsSync(lockPath)).toBe(true);
  });
});
