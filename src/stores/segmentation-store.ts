import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { EAF_ENCODING } from '../constants/eaf';
import type { Segment, SegmentColumns, SegmentTuple, SplitPoint } from '../types/elan';
import { CorruptionError, describeError, FormatError, InvalidArgumentError, NotFoundError } from '../utils/errors';
import { annotationId, nextAnnotationNumber, normalizeAnnotationId } from '../utils/id-generator';
import { toMs } from '../utils/time';
import { childElements, descendants, firstChildElement, parseXml, requireAttribute } from '../utils/xml';

export interface GetSegmentOptions {
  /** Return a copy the caller may mutate freely */
  deep?: boolean;
  /** Return `[tier, start, end, text, id, duration]` instead of an object */
  asTuple?: boolean;
}

export interface SegmentationState {
  /** Rows in insertion order; each row is frozen */
  segments: readonly Segment[];
  /** Numeric part of the next id handed out */
  nextId: number;

  getSegment(id: string | number, options?: GetSegmentOptions & { asTuple?: false }): Segment | undefined;
  getSegment(id: string | number, options: GetSegmentOptions & { asTuple: true }): SegmentTuple | undefined;
  addSegment: (tier: string, start: number | string, end: number | string, text?: string) => Segment;
  removeSegment: (id: string | number) => boolean;
  splitSegment: (id: string | number, point: SplitPoint) => [Segment, Segment];
  clear: () => void;
}

export type SegmentationStore = StoreApi<SegmentationState>;

const timeField = z.union([z.number(), z.string()]).transform((value, ctx) => {
  try {
    return toMs(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(err) });
    return z.NEVER;
  }
});
const stringField = z.union([z.string(), z.number()]).transform(String);

// duration is derived, so any supplied value is dropped and recomputed
const rowSchema = z
  .object({
    tier: stringField,
    start: timeField,
    end: timeField,
    text: stringField.nullish().transform((value) => value ?? ''),
    id: z.union([z.string(), z.number()]).transform((value) => normalizeAnnotationId(value)),
  })
  .refine((row) => row.start >= 0 && row.end > row.start, {
    message: 'expected 0 <= start < end',
  })
  .transform((row): Segment => ({ ...row, duration: row.end - row.start }));

const columnsSchema = z
  .object({
    tier: z.array(z.unknown()),
    start: z.array(z.unknown()),
    end: z.array(z.unknown()),
    text: z.array(z.unknown()),
    id: z.array(z.unknown()),
    duration: z.array(z.unknown()).optional(),
  })
  .refine(
    (cols) => [cols.start, cols.end, cols.text, cols.id].every((col) => col.length === cols.tier.length),
    { message: 'all columns must have the same length' }
  );

/** Copy, validate and coerce column-oriented or row-oriented input into rows */
function toRows(data: unknown): Segment[] {
  if (data === undefined || data === null) return [];

  let candidates: unknown[];
  if (Array.isArray(data)) {
    candidates = data;
  } else {
    const columns = columnsSchema.safeParse(data);
    if (!columns.success) {
      throw new InvalidArgumentError(
        `Segmentation data must be a column mapping or an array of rows: ${columns.error.issues.map((i) => i.message).join('; ')}`
      );
    }
    const cols = columns.data;
    candidates = cols.tier.map((tier, i) => ({
      tier,
      start: cols.start[i],
      end: cols.end[i],
      text: cols.text[i],
      id: cols.id[i],
    }));
  }

  return candidates.map((candidate, i) => {
    const row = rowSchema.safeParse(candidate);
    if (!row.success) {
      const detail = row.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new InvalidArgumentError(`Invalid segment at row ${i}: ${detail}`);
    }
    return Object.freeze(row.data);
  });
}

function toTuple(s: Segment): SegmentTuple {
  return [s.tier, s.start, s.end, s.text, s.id, s.duration];
}

function matching(segments: readonly Segment[], id: string): number[] {
  const found: number[] = [];
  segments.forEach((s, i) => {
    if (s.id === id) found.push(i);
  });
  return found;
}

function resolveSplit(segment: Segment, point: SplitPoint): number {
  let at: number;
  if (typeof point === 'number') {
    at = toMs(point, 'split point');
  } else {
    if (!(point.fraction >= 0 && point.fraction <= 1)) {
      throw new InvalidArgumentError(`Split fraction ${point.fraction} is outside [0, 1]`);
    }
    at = Math.round(segment.start + point.fraction * segment.duration);
  }
  if (at < segment.start || at > segment.end) {
    throw new InvalidArgumentError(
      `Split point ${at} is outside segment ${segment.id} [${segment.start}, ${segment.end}]`
    );
  }
  if (at === segment.start || at === segment.end) {
    throw new InvalidArgumentError(`Splitting ${segment.id} at ${at} would leave an empty half`);
  }
  return at;
}

/**
 * Create the table of annotations. `data` is either a column mapping
 * (`{ tier: [], start: [], ... }`) or an array of rows; it is copied,
 * unknown fields are dropped and every value is coerced to its column type.
 */
export function createSegmentationStore(data?: unknown): SegmentationStore {
  const initial = toRows(data);

  return createStore<SegmentationState>()((set, get) => {
    function getSegment(id: string | number, options?: GetSegmentOptions & { asTuple?: false }): Segment | undefined;
    function getSegment(id: string | number, options: GetSegmentOptions & { asTuple: true }): SegmentTuple | undefined;
    function getSegment(id: string | number, options: GetSegmentOptions = {}): Segment | SegmentTuple | undefined {
      const key = normalizeAnnotationId(id);
      const segment = get().segments.find((s) => s.id === key);
      if (!segment) return undefined;
      if (options.asTuple) return toTuple(segment);
      return options.deep ? { ...segment } : segment;
    }

    return {
      segments: initial,
      nextId: nextAnnotationNumber(initial.map((s) => s.id)),

      getSegment,

      addSegment: (tier, start, end, text = '') => {
        const startMs = toMs(start, 'start');
        const endMs = toMs(end, 'end');
        if (startMs < 0) {
          throw new InvalidArgumentError(`Segment start ${startMs} must be 0 or greater`);
        }
        if (endMs <= startMs) {
          throw new InvalidArgumentError(`Segment end ${endMs} must be greater than start ${startMs}`);
        }
        const { nextId } = get();
        const segment: Segment = Object.freeze({
          tier,
          start: startMs,
          end: endMs,
          text,
          id: annotationId(nextId),
          duration: endMs - startMs,
        });
        set((s) => ({ segments: [...s.segments, segment], nextId: s.nextId + 1 }));
        return segment;
      },

      removeSegment: (id) => {
        const key = normalizeAnnotationId(id);
        const found = matching(get().segments, key);
        if (found.length > 1) {
          throw new CorruptionError(`${found.length} segments share the id ${key}`);
        }
        if (found.length === 0) return false;
        set((s) => ({ segments: s.segments.filter((_, i) => i !== found[0]) }));
        return true;
      },

      splitSegment: (id, point) => {
        const key = normalizeAnnotationId(id);
        const found = matching(get().segments, key);
        if (found.length > 1) {
          throw new CorruptionError(`${found.length} segments share the id ${key}`);
        }
        if (found.length === 0) {
          throw new NotFoundError(`No segment with id ${key}`);
        }
        const index = found[0];
        const original = get().segments[index];
        const at = resolveSplit(original, point);
        const { nextId } = get();

        // Both halves keep the original text
        const first: Segment = Object.freeze({
          ...original,
          end: at,
          id: annotationId(nextId),
          duration: at - original.start,
        });
        const second: Segment = Object.freeze({
          ...original,
          start: at,
          id: annotationId(nextId + 1),
          duration: original.end - at,
        });

        set((s) => ({
          segments: [...s.segments.slice(0, index), first, second, ...s.segments.slice(index + 1)],
          nextId: s.nextId + 2,
        }));
        return [first, second];
      },

      clear: () => set({ segments: [], nextId: 1 }),
    };
  });
}

/** Read the time-aligned annotations of every tier in a parsed .eaf tree */
export function readSegments(tree: Document): SegmentColumns {
  const root = tree.documentElement;
  const slots = new Map<string, string | null>();
  for (const timeOrder of childElements(root, 'TIME_ORDER')) {
    for (const slot of childElements(timeOrder, 'TIME_SLOT')) {
      slots.set(requireAttribute(slot, 'TIME_SLOT_ID'), slot.getAttribute('TIME_VALUE'));
    }
  }

  const resolve = (annotation: Element, attr: string): number => {
    const ref = requireAttribute(annotation, attr);
    const value = slots.get(ref);
    if (value === undefined) {
      throw new NotFoundError(`Annotation ${annotation.getAttribute('ANNOTATION_ID')} refers to missing time slot ${ref}`);
    }
    if (value === null) {
      throw new NotFoundError(`Time slot ${ref} has no TIME_VALUE`);
    }
    return toMs(value, `time slot ${ref}`);
  };

  const columns: SegmentColumns = { tier: [], start: [], end: [], text: [], id: [], duration: [] };

  for (const tierEl of childElements(root, 'TIER')) {
    const tier = requireAttribute(tierEl, 'TIER_ID');
    for (const annotation of descendants(tierEl, 'ALIGNABLE_ANNOTATION')) {
      const id = requireAttribute(annotation, 'ANNOTATION_ID');
      const start = resolve(annotation, 'TIME_SLOT_REF1');
      const end = resolve(annotation, 'TIME_SLOT_REF2');
      if (start < 0 || end <= start) {
        throw new FormatError(`Annotation ${id} on tier ${tier} spans ${start} to ${end} ms; expected 0 <= start < end`);
      }
      columns.tier.push(tier);
      columns.id.push(id);
      columns.start.push(start);
      columns.end.push(end);
      columns.duration.push(end - start);
      columns.text.push(firstChildElement(annotation, 'ANNOTATION_VALUE')?.textContent ?? '');
    }
  }

  return columns;
}

/** Build a store straight from an .eaf file on disk */
export function segmentationsFromFile(file: string): SegmentationStore {
  const tree = parseXml(readFileSync(file, EAF_ENCODING));
  return createSegmentationStore(readSegments(tree));
}
