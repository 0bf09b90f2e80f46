const ANNOTATION_ID = /^a(\d+)$/;

export function annotationId(n: number): string {
  return `a${n}`;
}

export function timeSlotId(n: number): string {
  return `ts${n}`;
}

/** Numeric suffix of an `a<N>` id, or null when the id has another shape */
export function annotationNumber(id: string): number | null {
  const match = id.match(ANNOTATION_ID);
  return match ? parseInt(match[1], 10) : null;
}

/** Accept `a12` or the number 12 and return the canonical `a12` form */
export function normalizeAnnotationId(id: string | number): string {
  return typeof id === 'number' ? annotationId(id) : id;
}

/** First free counter value after every `a<N>` id in `ids` (1 when there are none) */
export function nextAnnotationNumber(ids: Iterable<string>): number {
  let max = 0;
  for (const id of ids) {
    const n = annotationNumber(id);
    if (n !== null) max = Math.max(max, n);
  }
  return max + 1;
}
