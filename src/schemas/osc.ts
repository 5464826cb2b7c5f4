import { z } from 'zod';

// OSC ingress payload schemas (zod-typed) for hardening at the boundary.
// Handlers parse `valuesOf(args)` against these.

// Echo text: [text]
export const EchoArgsSchema = z.tuple([z.string()]);
