/**
 * Frame Lookup
 *
 * Finds stream frames captured around a comment so the vision service can
 * match against what was on screen. Frames are written by the capture service.
 */

import { query as defaultQuery, type QueryFn } from '../db/client.js';
import type { Frame } from '../types/models.js';

export interface FrameLookup {
  /** URLs of frames within ±windowSeconds of the timestamp, nearest first */
  framesNear(streamer: string, timestamp: string, windowSeconds: number, limit: number): Promise<string[]>;
}

export class PgFrameLookup implements FrameLookup {
  constructor(private query: QueryFn = defaultQuery) {}

  async framesNear(streamer: string, timestamp: string, windowSeconds: number, limit: number): Promise<string[]> {
    const result = await this.query<{ minio_url: string }>(
      `SELECT minio_url
       FROM streamer_frames
       WHERE streamer = $1
         AND frame_timestamp BETWEEN $2::timestamptz - make_interval(secs => $3)
                                 AND $2::timestamptz + make_interval(secs => $3)
       ORDER BY ABS(EXTRACT(EPOCH FROM (frame_timestamp - $2::timestamptz))) ASC
       LIMIT $4`,
      [streamer, timestamp, windowSeconds, limit]
    );
    return result.rows.map((row) => row.minio_url);
  }
}

export class InMemoryFrameLookup implements FrameLookup {
  constructor(private frames: Frame[] = []) {}

  add(frame: Frame) {
    this.frames.push(frame);
  }

  async framesNear(streamer: string, timestamp: string, windowSeconds: number, limit: number): Promise<string[]> {
    const target = Date.parse(timestamp);
    if (Number.isNaN(target)) {
      return [];
    }

    return this.frames
      .filter((frame) => frame.streamer === streamer)
      .map((frame) => ({ url: frame.url, distance: Math.abs(Date.parse(frame.frameTimestamp) - target) }))
      .filter((frame) => frame.distance <= windowSeconds * 1000)
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit)
      .map((frame) => frame.url);
  }
}
