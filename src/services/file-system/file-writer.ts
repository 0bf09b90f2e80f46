import { writeFileSync } from 'node:fs';
import { EAF_ENCODING } from '../../constants/eaf';
import { EafDocument } from '../elan/eaf-document';
import type { PathLike } from '../elan/eaf-document';

/** Use a loaded document as is, or load one from its .eaf path */
export function loadDocument(src: EafDocument | PathLike): EafDocument {
  return src instanceof EafDocument ? src : EafDocument.fromFile(src);
}

/** Write a string to a file, replacing any previous content */
export function writeTextFile(dst: PathLike, content: string): void {
  writeFileSync(dst, content, EAF_ENCODING);
}
