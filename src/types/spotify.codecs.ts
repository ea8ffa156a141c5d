import { z } from 'zod';

// Track (subset)
export const TrackCodec = z.object({
  id: z.string().nullable().optional(),
  uri: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  artists: z.array(z.object({ name: z.string().nullable().optional() })).optional(),
  album: z.object({ name: z.string().nullable().optional() }).nullable().optional(),
  duration_ms: z.number().nullable().optional(),
  external_urls: z.object({ spotify: z.string().optional() }).optional(),
});
export type TrackCodecType = z.infer<typeof TrackCodec>;

// Devices
export const DeviceCodec = z.object({
  id: z.string().nullable(),
  name: z.string(),
  type: z.string(),
  is_active: z.boolean(),
  is_restricted: z.boolean().optional(),
  volume_percent: z.number().nullable().optional(),
});
export const DevicesResponseCodec = z.object({ devices: z.array(DeviceCodec) });
export type DevicesResponseCodecType = z.infer<typeof DevicesResponseCodec>;

// Search response (minimal structure)
const SearchBlockCodec = z.object({
  items: z.array(z.unknown()).optional(),
  total: z.number().optional(),
});
export const SearchResponseCodec = z.object({
  tracks: SearchBlockCodec.optional(),
});
export type SearchResponseCodecType = z.infer<typeof SearchResponseCodec>;

// Spotify Accounts Token response (refresh/access token exchange)
export const SpotifyTokenResponseCodec = z.object({
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});
export type SpotifyTokenResponseCodecType = z.infer<typeof SpotifyTokenResponseCodec>;
