import { LAST_ANNOTATION_ID_PROPERTY, LOG_PREFIX } from '../../constants/eaf';
import type { Tier } from '../../models/tier';
import type { TierType } from '../../models/tier-type';
import type { EafTimeSlot, Segment } from '../../types/elan';
import { FormatError } from '../../utils/errors';
import { timeSlotId } from '../../utils/id-generator';
import { childElements, firstChildElement, indentXml, parseXml, requireAttribute, serializeXml } from '../../utils/xml';

interface WriteOptions {
  /** Tree the document was loaded from; header and unmodelled elements are kept */
  tree: Document;
  tierTypes: Iterable<TierType>;
  /** Root tiers followed by subtiers, parents before children */
  tiers: Iterable<Tier>;
  segments: readonly Segment[];
  /** Highest annotation number handed out so far; written to the HEADER for ELAN */
  lastAnnotationId?: number;
  indent?: string;
}

interface RefAnnotation {
  tier: string;
  id: string;
  parentId: string;
  /** The ANNOTATION wrapper, moved as is into the rebuilt tier */
  element: Element;
}

/**
 * One slot per distinct time value, numbered in ascending time order, so
 * abutting segments share the slot between them.
 */
export function buildTimeSlots(segments: readonly Segment[]): EafTimeSlot[] {
  const times = new Set<number>();
  for (const segment of segments) {
    times.add(segment.start);
    times.add(segment.end);
  }
  return [...times].sort((a, b) => a - b).map((time, i) => ({ id: timeSlotId(i + 1), time }));
}

function removeAll(root: Element, tagName: string): void {
  for (const el of childElements(root, tagName)) root.removeChild(el);
}

/** REF_ANNOTATIONs of the source tree, in document order. They have no times, so the store does not hold them. */
function collectRefAnnotations(root: Element): RefAnnotation[] {
  const refs: RefAnnotation[] = [];
  for (const tierEl of childElements(root, 'TIER')) {
    const tier = requireAttribute(tierEl, 'TIER_ID');
    for (const wrapper of childElements(tierEl, 'ANNOTATION')) {
      const ref = firstChildElement(wrapper, 'REF_ANNOTATION');
      if (!ref) continue;
      refs.push({
        tier,
        id: requireAttribute(ref, 'ANNOTATION_ID'),
        parentId: requireAttribute(ref, 'ANNOTATION_REF'),
        element: wrapper,
      });
    }
  }
  return refs;
}

/**
 * Keep the reference annotations whose tier is written and whose parent
 * annotation is written too, following chains of references.
 */
function resolveRefAnnotations(
  refs: readonly RefAnnotation[],
  tierNames: ReadonlySet<string>,
  writtenIds: ReadonlySet<string>
): RefAnnotation[] {
  const known = new Set(writtenIds);
  const kept = new Set<RefAnnotation>();
  let pending = refs.filter((ref) => tierNames.has(ref.tier));
  for (;;) {
    const ready = pending.filter((ref) => known.has(ref.parentId));
    if (ready.length === 0) break;
    for (const ref of ready) {
      kept.add(ref);
      known.add(ref.id);
    }
    pending = pending.filter((ref) => !kept.has(ref));
  }
  return refs.filter((ref) => kept.has(ref));
}

function writeLastAnnotationId(root: Element, lastId: number): void {
  const header = firstChildElement(root, 'HEADER');
  if (!header) return;
  const property = childElements(header, 'PROPERTY').find(
    (el) => el.getAttribute('NAME') === LAST_ANNOTATION_ID_PROPERTY
  );
  if (property) {
    const previous = parseInt(property.textContent ?? '', 10);
    property.textContent = String(Number.isNaN(previous) ? lastId : Math.max(previous, lastId));
    return;
  }
  if (lastId === 0) return;
  const created = root.ownerDocument.createElement('PROPERTY');
  created.setAttribute('NAME', LAST_ANNOTATION_ID_PROPERTY);
  created.textContent = String(lastId);
  header.appendChild(created);
}

/** Generate the .eaf XML for the in-memory model */
export function generateEaf(options: WriteOptions): string {
  const { tree, tierTypes, tiers, segments, lastAnnotationId, indent = '\t' } = options;

  // Work on a copy so the caller's tree stays as it was loaded
  const doc = parseXml(serializeXml(tree));
  const root = doc.documentElement;

  const timeOrder = firstChildElement(root, 'TIME_ORDER');
  if (!timeOrder) {
    throw new FormatError('Document has no TIME_ORDER element');
  }

  const refAnnotations = collectRefAnnotations(root);
  removeAll(root, 'TIER');
  removeAll(root, 'LINGUISTIC_TYPE');
  for (const slot of childElements(timeOrder, 'TIME_SLOT')) timeOrder.removeChild(slot);

  const tierList = [...tiers];
  const names = new Set(tierList.map((t) => t.name));
  const kept = segments.filter((s) => names.has(s.tier));
  if (kept.length < segments.length) {
    const orphaned = new Set(segments.filter((s) => !names.has(s.tier)).map((s) => s.tier));
    console.warn(
      `${LOG_PREFIX} Skipping ${segments.length - kept.length} segment(s) on removed tier(s): ${[...orphaned].join(', ')}`
    );
  }

  const carried = resolveRefAnnotations(refAnnotations, names, new Set(kept.map((s) => s.id)));
  if (carried.length < refAnnotations.length) {
    console.warn(
      `${LOG_PREFIX} Dropping ${refAnnotations.length - carried.length} reference annotation(s) whose tier or parent annotation was removed`
    );
  }

  const timeSlots = buildTimeSlots(kept);
  const slotByTime = new Map<number, string>();
  for (const ts of timeSlots) {
    const slotEl = doc.createElement('TIME_SLOT');
    slotEl.setAttribute('TIME_SLOT_ID', ts.id);
    slotEl.setAttribute('TIME_VALUE', String(ts.time));
    timeOrder.appendChild(slotEl);
    slotByTime.set(ts.time, ts.id);
  }

  const byTier = new Map<string, Segment[]>();
  for (const segment of kept) {
    const list = byTier.get(segment.tier) ?? [];
    list.push(segment);
    byTier.set(segment.tier, list);
  }

  // TIER elements go right after TIME_ORDER, LINGUISTIC_TYPEs right after them
  let anchor: Element = timeOrder;
  const insertAfterAnchor = (el: Element): void => {
    root.insertBefore(el, anchor.nextSibling);
    anchor = el;
  };

  for (const tier of tierList) {
    const tierEl = tier.toTag(doc);
    for (const segment of byTier.get(tier.name) ?? []) {
      const annotEl = doc.createElement('ANNOTATION');
      const alignEl = doc.createElement('ALIGNABLE_ANNOTATION');
      alignEl.setAttribute('ANNOTATION_ID', segment.id);
      alignEl.setAttribute('TIME_SLOT_REF1', slotByTime.get(segment.start) ?? '');
      alignEl.setAttribute('TIME_SLOT_REF2', slotByTime.get(segment.end) ?? '');
      const valueEl = doc.createElement('ANNOTATION_VALUE');
      valueEl.textContent = segment.text;
      alignEl.appendChild(valueEl);
      annotEl.appendChild(alignEl);
      tierEl.appendChild(annotEl);
    }
    for (const ref of carried) {
      if (ref.tier === tier.name) tierEl.appendChild(ref.element);
    }
    insertAfterAnchor(tierEl);
  }

  for (const tierType of tierTypes) {
    insertAfterAnchor(tierType.toTag(doc));
  }

  if (lastAnnotationId !== undefined) writeLastAnnotationId(root, lastAnnotationId);

  indentXml(root, indent);
  return serializeXml(doc);
}
