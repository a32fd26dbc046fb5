/**
 * OpenTimelineIO (OTIO) type definitions.
 *
 * Only the schema subset a cut list needs: rational time, external media
 * references, clips, tracks, a stack and the timeline root.
 *
 * @see https://opentimelineio.readthedocs.io/
 */

// =============================================================================
// Core Time Types
// =============================================================================

/**
 * Rational time: `value / rate` seconds.
 */
export interface OTIORationalTime {
  OTIO_SCHEMA: 'RationalTime.1';
  value: number;
  rate: number;
}

export interface OTIOTimeRange {
  OTIO_SCHEMA: 'TimeRange.1';
  start_time: OTIORationalTime;
  duration: OTIORationalTime;
}

// =============================================================================
// Media Reference
// =============================================================================

export interface OTIOExternalReference {
  OTIO_SCHEMA: 'ExternalReference.1';
  name: string;
  target_url: string;
  available_range?: OTIOTimeRange;
  metadata?: Record<string, unknown>;
}

// =============================================================================
// Items and Tracks
// =============================================================================

/**
 * A clip cut from a source. `media_references` is keyed by reference name;
 * "DEFAULT_MEDIA" is the standard key.
 */
export interface OTIOClip {
  OTIO_SCHEMA: 'Clip.2';
  name: string;
  source_range: OTIOTimeRange;
  media_references: Record<string, OTIOExternalReference>;
  active_media_reference_key: string;
  metadata?: Record<string, unknown>;
}

export type OTIOTrackKind = 'Video' | 'Audio';

export interface OTIOTrack {
  OTIO_SCHEMA: 'Track.1';
  name: string;
  kind: OTIOTrackKind;
  children: OTIOClip[];
  metadata?: Record<string, unknown>;
}

export interface OTIOStack {
  OTIO_SCHEMA: 'Stack.1';
  name: string;
  children: OTIOTrack[];
  metadata?: Record<string, unknown>;
}

export interface OTIOTimeline {
  OTIO_SCHEMA: 'Timeline.1';
  name: string;
  global_start_time?: OTIORationalTime;
  tracks: OTIOStack;
  metadata?: Record<string, unknown>;
}

// =============================================================================
// Export Result Types
// =============================================================================

export interface OTIOExportStats {
  clipCount: number;
  /** Seconds, summed from the rounded clip ranges */
  duration: number;
  fps: number;
}

export interface OTIOExportResult {
  timeline: OTIOTimeline;
  /** JSON string ready to write to file */
  otioJson: string;
  stats: OTIOExportStats;
}

export interface OTIOExportOptions {
  /** Frames per second used to quantise clip ranges */
  fps: number;
  /** Timeline name; defaults to the output file stem */
  name?: string;
  /** Track kind; follows the export strategy */
  kind?: OTIOTrackKind;
}
