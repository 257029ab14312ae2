/**
 * Venue Configuration
 * Loads and validates the venue list from a JSON file
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { getAddress } from 'viem';

export const addressField = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid Ethereum address')
  .transform((value) => getAddress(value));

const feedSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('chain'),
    wsUrl: z.string().url(),
  }),
  z.object({
    type: z.literal('relay'),
    wsUrl: z.string().url(),
    snapshotUrl: z.string().url(),
  }),
]);

export const venueConfigSchema = z.object({
  id: z.string().min(1).max(40),
  kind: z.enum(['amm', 'lending']).default('amm'),
  feed: feedSchema,
  factory: addressField.optional(),
  router: addressField.optional(),
  pools: z.array(addressField).default([]),
  feeBps: z.number().int().min(0).max(10000).default(30),
  latencyMs: z.number().nonnegative().default(250),
  trackLaunches: z.boolean().default(false),
});

export const venuesFileSchema = z.object({
  quoteTokens: z.array(addressField).min(1),
  venues: z.array(venueConfigSchema),
});

export type VenueConfig = z.infer<typeof venueConfigSchema>;
export type VenuesFile = z.infer<typeof venuesFileSchema>;

/**
 * Read and validate a venues file; throws with the zod issues on invalid content
 */
export function loadVenuesConfig(path: string): VenuesFile {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const parsed = venuesFileSchema.safeParse(raw);

  if (!parsed.success) {
    throw new Error(`Invalid venues config at ${path}: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
  }

  return parsed.data;
}
