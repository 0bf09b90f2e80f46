import type { Segment } from '../../types/elan';
import type { EafDocument, PathLike } from '../elan/eaf-document';
import { loadDocument, writeTextFile } from '../file-system/file-writer';

export type SegmentFormatter = (segment: Segment) => string;

export interface TextExportOptions {
  exclude?: readonly string[];
  /** Formats one line; the newline is appended for you */
  formatter?: SegmentFormatter;
}

export const defaultFormatter: SegmentFormatter = (s) => `${s.tier} ${s.start}-${s.end}: ${s.text.trim()}`;

export function exportText(doc: EafDocument, options: TextExportOptions = {}): string {
  const exclude = new Set(options.exclude ?? []);
  const format = options.formatter ?? defaultFormatter;
  return doc
    .segments()
    .filter((s) => !exclude.has(s.tier))
    .map((s) => format(s) + '\n')
    .join('');
}

export function writeText(src: EafDocument | PathLike, dst: PathLike, options: TextExportOptions = {}): void {
  writeTextFile(dst, exportText(loadDocument(src), options));
}
