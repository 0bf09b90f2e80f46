import type { STEREOTYPES } from '../constants/eaf';

/** How a tier's annotations relate to time and to the parent tier */
export type Stereotype = (typeof STEREOTYPES)[number];

export interface EafTimeSlot {
  id: string;
  time: number; // milliseconds
}

/** One row of the segmentation store */
export interface Segment {
  tier: string;
  start: number; // milliseconds
  end: number; // milliseconds
  text: string;
  id: string;
  duration: number;
}

export type SegmentTuple = [tier: string, start: number, end: number, text: string, id: string, duration: number];

/** Column-oriented form of the store, one array per field */
export type SegmentColumns = { [K in keyof Segment]: Segment[K][] };

/** Input row for EafDocument.fromTable */
export interface TableRow {
  tier: string;
  start: number | string;
  end: number | string;
  text?: string;
}

export interface TierMetadata {
  participant?: string;
  annotator?: string;
}

export interface DocumentMetadata {
  author?: string;
  date?: string;
}

/** Where to cut a segment: a literal timestamp (ms) or a fraction of its length */
export type SplitPoint = number | { fraction: number };
