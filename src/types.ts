export type EventType = 'view' | 'like' | 'comment' | 'share';
export type DeviceType = 'desktop' | 'mobile' | 'tablet' | 'tv' | 'other';
export type PlaybackQuality = '144p' | '240p' | '360p' | '480p' | '720p' | '1080p' | '1440p' | '2160p' | 'auto';

// Event as delivered by the transport, already schema-validated
export type InboundEvent = {
  video_id: string;
  event_timestamp: number; // unix seconds, event time
  event_type: EventType;
  user_id?: string;
  watch_time?: number;
  country_code?: string;
  device_type?: DeviceType;
  playback_quality?: PlaybackQuality;
  metadata?: Record<string, unknown>;
};

export type EngagementEvent = Readonly<{
  video_id: string;
  event_timestamp: number;
  event_type: EventType;
  user_id?: string;
  watch_time_seconds?: number;
  country_code?: string;
  device_type?: DeviceType;
  playback_quality?: PlaybackQuality;
  metadata?: Readonly<Record<string, unknown>>;
  ingest_timestamp: number; // unix seconds, processing time
  identity_key: string;
}>;

// rejected: event time too far ahead of the ingest clock to be deduplicated
export type IngestOutcome = 'accepted' | 'duplicate' | 'dropped_late' | 'rejected';

// open -> closed -> flushed
export type WindowState = 'open' | 'closed' | 'flushed';

export type Counters = {
  views: number;
  likes: number;
  comments: number;
  shares: number;
  watch_time: number;
};

export type Approximation = {
  unique_users: boolean;
  countries_reached: boolean;
};

// Serializable totals without sketches; what the cache holds
export type MetricsSnapshot = Counters & {
  unique_users: number;
  countries_reached: number;
  approximate: Approximation;
};

export type CacheEntry = {
  video_id: string;
  snapshot: MetricsSnapshot;
  last_updated: number;
  expires_at: number;
};

export type SerializedEstimator =
  | { kind: 'exact'; values: string[] }
  | { kind: 'hll'; precision: number; registers: string }; // registers base64

// `version` is the fold count of the window when committed; a store never replaces a row with a lower one
export type HistoricalRecord = Counters & {
  video_id: string;
  window_start: number;
  window_end: number;
  version: number;
  unique_users: number;
  countries_reached: number;
  user_sketch: SerializedEstimator;
  country_sketch: SerializedEstimator;
  committed_at: number;
};

// Closed-but-unflushed window state persisted for crash recovery
export type WindowCheckpoint = Counters & {
  video_id: string;
  window_start: number;
  window_end: number;
  version: number;
  user_sketch: SerializedEstimator;
  country_sketch: SerializedEstimator;
};

export type MetricsSource = 'cache' | 'live' | 'history';

// Response shape of the query API
export type VideoMetrics = MetricsSnapshot & {
  video_id: string;
  engagement_rate: number;
  avg_watch_time: number;
  last_updated: string | null;
};

export type CurrentMetrics = VideoMetrics & {
  source: MetricsSource;
};

export type HistoricalMetrics = VideoMetrics & {
  start_time: string;
  end_time: string;
  windows: number;
};
