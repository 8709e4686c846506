import fs from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProfileStore, fetchSubscription } from './profileStore';
import { InvalidProfileError, ProfileNotFoundError } from '../errors';

const SUBSCRIPTION = `proxies:
  - name: HK-Premium-01
    type: ss
    server: hk.example.com
    port: 8388
    cipher: aes-256-gcm
    password: test-secret
proxy-groups:
  - name: Proxy
    type: select
    proxies: [HK-Premium-01]
`;

describe('ProfileStore', () => {
  let home: string;
  const fetchText = vi.fn(async (_url: string, _timeoutMs: number) => SUBSCRIPTION);

  function createStore(): ProfileStore {
    return new ProfileStore({
      home,
      configsDir: path.join(home, 'configs'),
      subscriptionTimeoutMs: 30000,
      fetchText,
    });
  }

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'corebar-profiles-'));
    fetchText.mockReset();
    fetchText.mockResolvedValue(SUBSCRIPTION);
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('creates an active default profile once', async () => {
    const store = createStore();

    const created = await store.ensureDefault();
    expect(created).toMatchObject({ name: 'Default', subscriptionUrl: null, active: true });
    await expect(store.ensureDefault()).resolves.toBeNull();

    const text = fs.readFileSync(store.configPath(created?.id ?? ''), 'utf8');
    expect(text).toContain('proxy-groups:');
    expect(await store.list()).toHaveLength(1);
  });

  it('downloads and validates a subscription when added', async () => {
    const store = createStore();
    await store.ensureDefault();

    const profile = await store.add('Work', 'https://sub.example.com/work.yaml');

    expect(fetchText).toHaveBeenCalledWith('https://sub.example.com/work.yaml', 30000);
    expect(profile).toMatchObject({ name: 'Work', subscriptionUrl: 'https://sub.example.com/work.yaml', active: false });
    expect(profile.lastUpdated).not.toBeNull();
    expect(fs.readFileSync(store.configPath(profile.id), 'utf8')).toBe(SUBSCRIPTION);
  });

  it('rejects a subscription that is not a proxy configuration', async () => {
    fetchText.mockResolvedValueOnce('<html>login required</html>');
    const store = createStore();

    await expect(store.add('Broken', 'https://sub.example.com/broken')).rejects.toBeInstanceOf(InvalidProfileError);
    expect(await store.list()).toEqual([]);
  });

  it('makes the first profile active', async () => {
    const store = createStore();
    const profile = await store.add('Local');

    expect(profile.active).toBe(true);
    expect(fetchText).not.toHaveBeenCalled();
  });

  it('keeps exactly one profile active', async () => {
    const store = createStore();
    const first = await store.add('First');
    const second = await store.add('Second');

    await store.activate(second.id);

    const profiles = await store.list();
    expect(profiles.map((profile) => [profile.name, profile.active])).toEqual([['First', false], ['Second', true]]);
    expect((await store.active())?.id).toBe(second.id);
    expect(first.id).not.toBe(second.id);
  });

  it('hands the active flag to the next profile on removal', async () => {
    const store = createStore();
    const first = await store.add('First');
    const second = await store.add('Second');

    await store.remove(first.id);

    expect(fs.existsSync(store.configPath(first.id))).toBe(false);
    expect(await store.active()).toMatchObject({ id: second.id, active: true });
  });

  it('refreshes a subscription in place', async () => {
    const store = createStore();
    const profile = await store.add('Work', 'https://sub.example.com/work.yaml');
    const updated = SUBSCRIPTION.replace('hk.example.com', 'hk2.example.com');
    fetchText.mockResolvedValueOnce(updated);

    const refreshed = await store.refresh(profile.id);

    expect(refreshed.id).toBe(profile.id);
    expect(fs.readFileSync(store.configPath(profile.id), 'utf8')).toBe(updated);
  });

  it('refuses to refresh a local profile', async () => {
    const store = createStore();
    const profile = await store.add('Local');

    await expect(store.refresh(profile.id)).rejects.toThrow('Profile Local has no subscription');
  });

  it('imports and exports profile files', async () => {
    const store = createStore();
    const source = path.join(home, 'incoming.yaml');
    fs.writeFileSync(source, SUBSCRIPTION);

    const profile = await store.importFile(source, 'Imported');
    const target = path.join(home, 'exports', 'copy.yaml');
    await store.exportTo(profile.id, target);

    expect(fs.readFileSync(target, 'utf8')).toBe(SUBSCRIPTION);
  });

  it('rejects an import that fails validation', async () => {
    const store = createStore();
    const source = path.join(home, 'incoming.yaml');
    fs.writeFileSync(source, 'port: 7890\n');

    await expect(store.importFile(source, 'Imported')).rejects.toBeInstanceOf(InvalidProfileError);
  });

  it('resolves the active file path only while the file exists', async () => {
    const store = createStore();
    const profile = await store.add('Local');

    await expect(store.activePath()).resolves.toBe(store.configPath(profile.id));
    fs.unlinkSync(store.configPath(profile.id));
    await expect(store.activePath()).resolves.toBeNull();
  });

  it('persists profiles across instances', async () => {
    const profile = await createStore().add('Local');

    await expect(createStore().get(profile.id)).resolves.toEqual(profile);
  });

  it('fails for unknown ids', async () => {
    await expect(createStore().get('missing')).rejects.toBeInstanceOf(ProfileNotFoundError);
    await expect(createStore().activate('missing')).rejects.toBeInstanceOf(ProfileNotFoundError);
  });
});

describe('fetchSubscription', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeEach(async () => {
    server = http.createServer((req, res) => {
      if (req.url === '/ok') {
        res.end(SUBSCRIPTION);
      } else if (req.url === '/missing') {
        res.writeHead(404);
        res.end();
      }
      // any other path never answers
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    baseUrl = `http://127.0.0.1:${typeof address === 'object' && address !== null ? address.port : 0}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('returns the body', async () => {
    await expect(fetchSubscription(`${baseUrl}/ok`, 1000)).resolves.toBe(SUBSCRIPTION);
  });

  it('reports an error status', async () => {
    await expect(fetchSubscription(`${baseUrl}/missing`, 1000)).rejects.toThrow('Subscription download failed: HTTP 404');
  });

  it('gives up after the timeout', async () => {
    await expect(fetchSubscription(`${baseUrl}/hang`, 50)).rejects.toThrow('Subscription download timed out after 50ms');
  });
});
