import fs from 'fs';
import { parse } from 'yaml';
import { InvalidProfileError, errorMessage } from '../errors';
import { PROXY_MODES } from '../types';
import type { GroupStrategy, ProfileConfig, ProxyGroup, ProxyNode } from '../types';

const GROUP_STRATEGIES: GroupStrategy[] = ['select', 'url-test', 'fallback', 'load-balance', 'relay'];

type YamlMap = Record<string, unknown>;

function isMap(value: unknown): value is YamlMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function int(value: unknown): number | null {
  const parsed = typeof value === 'number' ? value : parseInt(String(value), 10);
  return Number.isInteger(parsed) ? parsed : null;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function toNode(entry: YamlMap): ProxyNode | null {
  const name = str(entry.name);
  const type = str(entry.type);
  if (!name || !type) return null;

  const node: ProxyNode = {
    name,
    type,
    server: str(entry.server) || 'unknown',
    port: int(entry.port) ?? 0,
    delay: { status: 'untested' },
  };
  const password = str(entry.password);
  const cipher = str(entry.cipher);
  if (password !== undefined) node.password = password;
  if (cipher !== undefined) node.cipher = cipher;
  if (Array.isArray(entry.alpn)) node.alpn = entry.alpn.map(String);
  const skipCertVerify = entry['skip-cert-verify'];
  if (typeof skipCertVerify === 'boolean') node.skipCertVerify = skipCertVerify;
  return node;
}

function toGroup(entry: YamlMap): ProxyGroup | null {
  const name = str(entry.name);
  const type = GROUP_STRATEGIES.find((strategy) => strategy === entry.type);
  if (!name || !type) return null;

  const group: ProxyGroup = {
    name,
    type,
    members: list(entry.proxies).map(String),
  };
  const url = str(entry.url);
  const interval = int(entry.interval);
  if (url) group.url = url;
  if (interval !== null) group.interval = interval;
  return group;
}

function parseDocument(text: string): YamlMap {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err) {
    throw new InvalidProfileError(`Configuration is not valid YAML: ${errorMessage(err)}`);
  }
  if (!isMap(document)) {
    throw new InvalidProfileError('Configuration must be a YAML mapping');
  }
  return document;
}

function fromDocument(document: YamlMap): ProfileConfig {
  const mode = PROXY_MODES.find((candidate) => candidate === str(document.mode)?.toLowerCase());

  return {
    ports: {
      http: int(document.port),
      socks: int(document['socks-port']),
      mixed: int(document['mixed-port']),
    },
    mode: mode ?? null,
    proxies: list(document.proxies).filter(isMap).map(toNode).filter((node): node is ProxyNode => node !== null),
    proxyGroups: list(document['proxy-groups']).filter(isMap).map(toGroup).filter((group): group is ProxyGroup => group !== null),
    rules: list(document.rules).map(String),
  };
}

/**
 * Reads the parts of a core configuration this daemon relies on:
 * listener ports, routing mode, proxies, proxy groups and rules.
 */
export function parseProfileConfig(text: string): ProfileConfig {
  return fromDocument(parseDocument(text));
}

/** Like parseProfileConfig, but also rejects documents that define no proxies or groups. */
export function validateProfileText(text: string): ProfileConfig {
  const document = parseDocument(text);
  if (!Array.isArray(document.proxies) && !Array.isArray(document['proxy-groups'])) {
    throw new InvalidProfileError('Configuration has neither a proxies nor a proxy-groups list');
  }
  return fromDocument(document);
}

export async function readProfileConfig(configPath: string): Promise<ProfileConfig> {
  const text = await fs.promises.readFile(configPath, 'utf8');
  return parseProfileConfig(text);
}
