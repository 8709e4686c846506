import regionTable from '../data/regions.json';
import type { DelayState, NodeStatistics, ProxyNode } from '../types';

export const FAST_THRESHOLD_MS = 300;
export const UNHEALTHY_THRESHOLD_MS = 1000;
export const OTHER_REGION = 'other';

interface RegionMatcher {
  region: string;
  label: string;
  test: (name: string) => boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Two-letter codes only count as a standalone token ("HK-01", "US West"),
// longer keywords match anywhere in the name.
function keywordMatcher(keyword: string): (name: string) => boolean {
  if (/^[A-Za-z]{2}$/.test(keyword)) {
    const pattern = new RegExp(`(^|[^A-Za-z])${escapeRegExp(keyword)}($|[^A-Za-z])`, 'i');
    return (name) => pattern.test(name);
  }
  const needle = keyword.toUpperCase();
  return (name) => name.toUpperCase().includes(needle);
}

const REGION_MATCHERS: RegionMatcher[] = regionTable.flatMap((entry) =>
  entry.keywords.map((keyword) => ({ region: entry.region, label: entry.label, test: keywordMatcher(keyword) })),
);

export const REGION_LABELS: Record<string, string> = Object.fromEntries<string>([
  ...regionTable.map((entry): [string, string] => [entry.region, entry.label]),
  [OTHER_REGION, 'Other'],
]);

export function classifyRegion(nodeName: string): string {
  const match = REGION_MATCHERS.find((matcher) => matcher.test(nodeName));
  return match ? match.region : OTHER_REGION;
}

export function delayMs(delay: DelayState): number | null {
  return delay.status === 'ok' ? delay.ms : null;
}

export function isUnhealthy(delay: DelayState): boolean {
  if (delay.status === 'failed') return true;
  return delay.status === 'ok' && delay.ms > UNHEALTHY_THRESHOLD_MS;
}

/** Measured nodes first by ascending delay; the rest keep their order. */
export function sortByDelay(nodes: readonly ProxyNode[]): ProxyNode[] {
  return [...nodes].sort((a, b) => {
    const delayA = delayMs(a.delay);
    const delayB = delayMs(b.delay);
    if (delayA === null && delayB === null) return 0;
    if (delayA === null) return 1;
    if (delayB === null) return -1;
    return delayA - delayB;
  });
}

export function fastNodes(nodes: readonly ProxyNode[], thresholdMs = FAST_THRESHOLD_MS): ProxyNode[] {
  return nodes.filter((node) => {
    const delay = delayMs(node.delay);
    return delay !== null && delay < thresholdMs;
  });
}

export function groupByRegion(nodes: readonly ProxyNode[]): Record<string, ProxyNode[]> {
  const regions: Record<string, ProxyNode[]> = {};
  for (const node of nodes) {
    const region = classifyRegion(node.name);
    (regions[region] ||= []).push(node);
  }
  return regions;
}

export function regionDistribution(nodes: readonly ProxyNode[]): Record<string, number> {
  return Object.fromEntries(
    Object.entries(groupByRegion(nodes)).map(([region, members]): [string, number] => [region, members.length]),
  );
}

export function nodeStatistics(nodes: readonly ProxyNode[]): NodeStatistics {
  const delays = nodes.map((node) => delayMs(node.delay)).filter((delay): delay is number => delay !== null);
  return {
    total: nodes.length,
    measured: delays.length,
    failed: nodes.filter((node) => node.delay.status === 'failed').length,
    fast: fastNodes(nodes).length,
    averageDelay: delays.length === 0 ? 0 : delays.reduce((sum, delay) => sum + delay, 0) / delays.length,
  };
}

export function pickFastest(nodes: readonly ProxyNode[]): ProxyNode | null {
  const [fastest] = sortByDelay(nodes);
  return fastest && fastest.delay.status === 'ok' ? fastest : null;
}
