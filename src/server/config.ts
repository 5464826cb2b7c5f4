import { z } from 'zod';
import { AddressSchema, EndpointSchema } from '../types/config.js';

/**
 * Configuration of the echo demo. Parse at the boundary (process.env).
 * Keeps the endpoint schema reusable while centralizing env inputs.
 */
export const AppConfigSchema = z.object({
  listen: EndpointSchema.extend({
    host: z.string().trim().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(19994),
  }),
  target: EndpointSchema.extend({
    host: z.string().trim().min(1).default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).default(19994),
  }),
  echo: z.object({
    address: AddressSchema.default('/some/addr'),
    delayMs: z.number().int().min(0).max(60_000).default(500),
  }),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : Number(raw);
}

export function loadAppConfigFromEnv(): AppConfig {
  // Map env -> config fields; rely on sub-schemas for defaults and validation.
  const raw = {
    listen: {
      host: process.env['OSC_LISTEN_HOST'],
      port: numberFromEnv('OSC_LISTEN_PORT'),
    },
    target: {
      host: process.env['OSC_TARGET_HOST'],
      port: numberFromEnv('OSC_TARGET_PORT'),
    },
    echo: {
      address: process.env['OSC_ECHO_ADDRESS'],
      delayMs: numberFromEnv('OSC_ECHO_DELAY_MS'),
    },
  } as const;
  return AppConfigSchema.parse(raw);
}
