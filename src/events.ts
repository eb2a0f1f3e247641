import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { EngagementEvent, InboundEvent } from './types.js';

export const InboundEventSchema = z.object({
  video_id: z.string().regex(/^[A-Za-z0-9_-]{11}$/, 'video_id must be 11 characters of [A-Za-z0-9_-]'),
  event_timestamp: z.number().int().min(0),
  event_type: z.enum(['view', 'like', 'comment', 'share']),
  user_id: z.string().min(1).optional(),
  watch_time: z.number().min(0).optional(),
  country_code: z.string().regex(/^[A-Z]{2}$/, 'country_code must be a 2-letter uppercase code').optional(),
  device_type: z.enum(['desktop', 'mobile', 'tablet', 'tv', 'other']).optional(),
  playback_quality: z.enum(['144p', '240p', '360p', '480p', '720p', '1080p', '1440p', '2160p', 'auto']).optional(),
  metadata: z.record(z.unknown()).optional(),
});

// JSON with sorted object keys, so equal content always hashes the same
const canonicalJson = (value: unknown): string => {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
};

/**
 * Deduplication key. With a user id the key is (video, user, type, event time);
 * anonymous events fall back to a hash of the remaining payload fields.
 */
export const identityKeyOf = (event: InboundEvent): string => {
  const { video_id, user_id, event_type, event_timestamp } = event;
  if (user_id !== undefined) {
    return `${video_id}|${user_id}|${event_type}|${event_timestamp}`;
  }

  const rest = {
    watch_time: event.watch_time,
    country_code: event.country_code,
    device_type: event.device_type,
    playback_quality: event.playback_quality,
    metadata: event.metadata,
  };
  const digest = createHash('sha256').update(canonicalJson(rest)).digest('hex').slice(0, 32);
  return `${video_id}|${event_type}|${event_timestamp}|${digest}`;
};

/** Stamps processing time and identity onto a validated event. The result is frozen. */
export const toEngagementEvent = (event: InboundEvent, ingestTimestamp: number): EngagementEvent => {
  return Object.freeze({
    video_id: event.video_id,
    event_timestamp: event.event_timestamp,
    event_type: event.event_type,
    user_id: event.user_id,
    watch_time_seconds: event.watch_time,
    country_code: event.country_code,
    device_type: event.device_type,
    playback_quality: event.playback_quality,
    metadata: event.metadata === undefined ? undefined : Object.freeze({ ...event.metadata }),
    ingest_timestamp: ingestTimestamp,
    identity_key: identityKeyOf(event),
  });
};
