import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger } from '../logger';
import { InvalidProfileError, ProfileNotFoundError, errorMessage } from '../errors';
import { validateProfileText } from './configReader';
import type { Profile } from '../types';

const DEFAULT_PROFILE_NAME = 'Default';

const DEFAULT_CONFIG = `port: 7890
socks-port: 7891
allow-lan: false
mode: rule
log-level: info

dns:
  enable: true
  nameserver:
    - 223.5.5.5
    - 114.114.114.114

proxies: []

proxy-groups:
  - name: PROXY
    type: select
    proxies:
      - DIRECT

rules:
  - MATCH,DIRECT
`;

const profileSchema = z.object({
  id: z.string(),
  name: z.string(),
  subscriptionUrl: z.string().nullable(),
  lastUpdated: z.string().nullable(),
  active: z.boolean(),
});

const profilesFileSchema = z.object({
  profiles: z.array(profileSchema),
});

export type FetchText = (url: string, timeoutMs: number) => Promise<string>;

export interface ProfileStoreOptions {
  home: string;
  configsDir: string;
  subscriptionTimeoutMs: number;
  fetchText?: FetchText;
}

/** Downloads a subscription body; non-2xx and timeouts are InvalidProfileError. */
export async function fetchSubscription(url: string, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      throw new InvalidProfileError(`Subscription download failed: HTTP ${response.status}`);
    }
    return await response.text();
  } catch (error) {
    if (error instanceof InvalidProfileError) throw error;
    if (error instanceof Error && error.name === 'AbortError') {
      throw new InvalidProfileError(`Subscription download timed out after ${timeoutMs}ms`);
    }
    throw new InvalidProfileError(`Subscription download failed: ${errorMessage(error)}`);
  } finally {
    clearTimeout(timeoutId);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Configuration profiles: records in profiles.json, one YAML file per
 * profile under configs/. Exactly one profile is active whenever any exist.
 */
export class ProfileStore {
  private profiles: Profile[] = [];
  private loaded = false;
  private fetchText: FetchText;

  constructor(private options: ProfileStoreOptions) {
    this.fetchText = options.fetchText || fetchSubscription;
  }

  get indexPath(): string {
    return path.join(this.options.home, 'profiles.json');
  }

  configPath(id: string): string {
    return path.join(this.options.configsDir, `${id}.yaml`);
  }

  async list(): Promise<Profile[]> {
    await this.load();
    return this.profiles.map((profile) => ({ ...profile }));
  }

  async get(id: string): Promise<Profile> {
    await this.load();
    const profile = this.profiles.find((candidate) => candidate.id === id);
    if (!profile) throw new ProfileNotFoundError(id);
    return { ...profile };
  }

  async active(): Promise<Profile | null> {
    await this.load();
    const profile = this.profiles.find((candidate) => candidate.active);
    return profile ? { ...profile } : null;
  }

  /** Config file of the active profile, or null when there is none on disk. */
  async activePath(): Promise<string | null> {
    const profile = await this.active();
    if (!profile) return null;
    const configPath = this.configPath(profile.id);
    try {
      await fs.promises.access(configPath, fs.constants.R_OK);
      return configPath;
    } catch (err) {
      logger.warn({ module: 'services.profileStore', profile_id: profile.id, error_detail: errorMessage(err) }, 'Active profile file missing');
      return null;
    }
  }

  async ensureDefault(): Promise<Profile | null> {
    await this.load();
    if (this.profiles.length > 0) return null;

    const profile: Profile = {
      id: uuidv4(),
      name: DEFAULT_PROFILE_NAME,
      subscriptionUrl: null,
      lastUpdated: new Date().toISOString(),
      active: true,
    };
    await this.writeConfig(profile.id, DEFAULT_CONFIG);
    this.profiles.push(profile);
    await this.save();
    logger.info({ module: 'services.profileStore', profile_id: profile.id }, 'Default profile created');
    return { ...profile };
  }

  async add(name: string, subscriptionUrl?: string | null): Promise<Profile> {
    await this.load();
    const id = uuidv4();
    const url = subscriptionUrl || null;

    const text = url ? await this.download(url) : DEFAULT_CONFIG;
    await this.writeConfig(id, text);

    const profile: Profile = {
      id,
      name,
      subscriptionUrl: url,
      lastUpdated: new Date().toISOString(),
      active: this.profiles.length === 0,
    };
    this.profiles.push(profile);
    await this.save();
    logger.info({ module: 'services.profileStore', profile_id: id, subscription: url !== null }, 'Profile added');
    return { ...profile };
  }

  async importFile(sourcePath: string, name: string): Promise<Profile> {
    await this.load();
    const text = await fs.promises.readFile(sourcePath, 'utf8');
    validateProfileText(text);

    const profile: Profile = {
      id: uuidv4(),
      name,
      subscriptionUrl: null,
      lastUpdated: new Date().toISOString(),
      active: this.profiles.length === 0,
    };
    await this.writeConfig(profile.id, text);
    this.profiles.push(profile);
    await this.save();
    logger.info({ module: 'services.profileStore', profile_id: profile.id, source_path: sourcePath }, 'Profile imported');
    return { ...profile };
  }

  async remove(id: string): Promise<void> {
    const profile = await this.get(id);
    this.profiles = this.profiles.filter((candidate) => candidate.id !== id);
    if (profile.active && this.profiles.length > 0) {
      this.profiles[0] = { ...this.profiles[0], active: true };
    }

    try {
      await fs.promises.unlink(this.configPath(id));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    await this.save();
    logger.info({ module: 'services.profileStore', profile_id: id }, 'Profile removed');
  }

  async activate(id: string): Promise<Profile> {
    await this.get(id);
    this.profiles = this.profiles.map((profile) => ({ ...profile, active: profile.id === id }));
    await this.save();
    logger.info({ module: 'services.profileStore', profile_id: id }, 'Profile activated');
    return this.get(id);
  }

  /** Pulls the subscription again and replaces the profile's file. */
  async refresh(id: string): Promise<Profile> {
    const profile = await this.get(id);
    if (!profile.subscriptionUrl) {
      throw new InvalidProfileError(`Profile ${profile.name} has no subscription`);
    }

    const text = await this.download(profile.subscriptionUrl);
    await this.writeConfig(id, text);
    const lastUpdated = new Date().toISOString();
    this.profiles = this.profiles.map((candidate) => (candidate.id === id ? { ...candidate, lastUpdated } : candidate));
    await this.save();
    logger.info({ module: 'services.profileStore', profile_id: id }, 'Subscription refreshed');
    return this.get(id);
  }

  async exportTo(id: string, destPath: string): Promise<void> {
    await this.get(id);
    await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
    await fs.promises.copyFile(this.configPath(id), destPath);
    logger.info({ module: 'services.profileStore', profile_id: id, dest_path: destPath }, 'Profile exported');
  }

  private async download(url: string): Promise<string> {
    const text = await this.fetchText(url, this.options.subscriptionTimeoutMs);
    validateProfileText(text);
    return text;
  }

  private async writeConfig(id: string, text: string): Promise<void> {
    await fs.promises.mkdir(this.options.configsDir, { recursive: true });
    // write then rename so a reader never sees half a file
    const target = this.configPath(id);
    const temp = `${target}.tmp`;
    await fs.promises.writeFile(temp, text, 'utf8');
    await fs.promises.rename(temp, target);
  }

  private async load(): Promise<void> {
    if (this.loaded) return;

    let raw: string;
    try {
      raw = await fs.promises.readFile(this.indexPath, 'utf8');
    } catch (err) {
      if (!isNotFound(err)) throw err;
      this.profiles = [];
      this.loaded = true;
      return;
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err) {
      throw new InvalidProfileError(`Profile index is not valid JSON: ${errorMessage(err)}`);
    }
    const parsed = profilesFileSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidProfileError(`Profile index is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    this.profiles = parsed.data.profiles;
    if (this.profiles.length > 0 && !this.profiles.some((profile) => profile.active)) {
      this.profiles[0] = { ...this.profiles[0], active: true };
    }
    this.loaded = true;
  }

  private async save(): Promise<void> {
    await fs.promises.mkdir(this.options.home, { recursive: true });
    await fs.promises.writeFile(this.indexPath, `${JSON.stringify({ profiles: this.profiles }, null, 2)}\n`, 'utf8');
  }
}
