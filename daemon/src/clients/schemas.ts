import { z } from 'zod';

export const trafficSchema = z.object({
  up: z.number().int().nonnegative(),
  down: z.number().int().nonnegative(),
});

export const delayHistorySchema = z.object({
  time: z.string(),
  delay: z.number().int(),
});

export const proxyInfoSchema = z.object({
  name: z.string().optional(),
  type: z.string(),
  now: z.string().optional(),
  all: z.array(z.string()).optional(),
  history: z.array(delayHistorySchema).optional(),
}).passthrough();

export const proxiesSchema = z.object({
  proxies: z.record(z.string(), proxyInfoSchema),
});

export const delaySchema = z.object({
  delay: z.number().int().nonnegative(),
});

export const modeSchema = z.enum(['global', 'rule', 'direct']);

export const configsSchema = z.object({
  port: z.number().int().optional(),
  'socks-port': z.number().int().optional(),
  'mixed-port': z.number().int().optional(),
  mode: z.string(),
}).passthrough();

export type TrafficResponse = z.infer<typeof trafficSchema>;
export type ProxyInfo = z.infer<typeof proxyInfoSchema>;
export type ProxiesResponse = z.infer<typeof proxiesSchema>;
export type DelayResponse = z.infer<typeof delaySchema>;
export type ConfigsResponse = z.infer<typeof configsSchema>;

export interface SelectProxyRequest {
  name: string;
}

export interface PatchConfigsRequest {
  mode: z.infer<typeof modeSchema>;
}
