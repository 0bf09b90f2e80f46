import { basename, extname } from 'node:path';
import type { EafDocument, PathLike } from '../elan/eaf-document';
import { loadDocument, writeTextFile } from '../file-system/file-writer';
import { formatSeconds } from '../../utils/time';

export interface RttmExportOptions {
  /** Tier names left out of the output, e.g. noise or comment tiers */
  exclude?: readonly string[];
}

/**
 * Rich Transcription Time Marked lines, one SPEAKER line per segment.
 * Spaces in tier names become underscores.
 */
export function exportRttm(doc: EafDocument, options: RttmExportOptions = {}): string {
  const exclude = new Set(options.exclude ?? []);
  const fileId = basename(doc.file, extname(doc.file));

  const lines: string[] = [];
  for (const segment of doc.segments()) {
    if (exclude.has(segment.tier)) continue;
    lines.push(
      [
        'SPEAKER',
        fileId,
        '1',
        formatSeconds(segment.start),
        formatSeconds(segment.duration),
        '<NA>',
        '<NA>',
        segment.tier.trim().replace(/ /g, '_'),
        '<NA>',
        '<NA>',
      ].join(' ')
    );
  }
  return lines.map((line) => line + '\n').join('');
}

export function writeRttm(src: EafDocument | PathLike, dst: PathLike, options: RttmExportOptions = {}): void {
  writeTextFile(dst, exportRttm(loadDocument(src), options));
}
