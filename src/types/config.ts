import { z } from 'zod';

// Centralized config schemas (code-as-contracts).

export const EndpointSchema = z.object({
  host: z.string().trim().min(1),
  port: z.number().int().min(0).max(65535),
});
export type Endpoint = z.infer<typeof EndpointSchema>;

export const AddressSchema = z
  .string()
  .startsWith('/', "OSC address must start with '/'")
  .refine((s) => !s.includes('\0'), 'OSC address must not contain NUL');

export function endpointKey(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}
