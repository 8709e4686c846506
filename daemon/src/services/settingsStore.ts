import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../logger';
import { errorMessage } from '../errors';
import type { Preferences } from '../types';

const DEFAULT_PREFERENCES: Preferences = {
  mode: 'rule',
  systemProxyEnabled: false,
};

const preferencesSchema = z.object({
  mode: z.enum(['global', 'rule', 'direct']).default(DEFAULT_PREFERENCES.mode),
  systemProxyEnabled: z.boolean().default(DEFAULT_PREFERENCES.systemProxyEnabled),
});

/** User preferences persisted in settings.json under the daemon home. */
export class SettingsStore {
  private cached: Preferences | null = null;

  constructor(private home: string) {}

  get filePath(): string {
    return path.join(this.home, 'settings.json');
  }

  async load(): Promise<Preferences> {
    if (this.cached) return { ...this.cached };

    let preferences = DEFAULT_PREFERENCES;
    try {
      const raw = await fs.promises.readFile(this.filePath, 'utf8');
      const parsed = preferencesSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        preferences = parsed.data;
      } else {
        logger.warn({ module: 'services.settingsStore', file_path: this.filePath }, 'Settings malformed, using defaults');
      }
    } catch (err) {
      logger.debug({ module: 'services.settingsStore', error_detail: errorMessage(err) }, 'Settings unreadable, using defaults');
    }

    this.cached = { ...preferences };
    return { ...preferences };
  }

  async update(changes: Partial<Preferences>): Promise<Preferences> {
    const next = { ...(await this.load()), ...changes };
    await fs.promises.mkdir(this.home, { recursive: true });
    await fs.promises.writeFile(this.filePath, `${JSON.stringify(next, null, 2)}\n`, 'utf8');
    this.cached = next;
    return { ...next };
  }
}
