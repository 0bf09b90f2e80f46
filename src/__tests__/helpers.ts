import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseXml } from '../utils/xml';

export const SAMPLE_EAF = fileURLToPath(new URL('./fixtures/sample.eaf', import.meta.url));

/** Root element of a one-off XML snippet */
export function tag(xml: string): Element {
  return parseXml(xml).documentElement;
}

/** A fresh temp directory and a function that removes it */
export function tempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'eaf-data-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/** Minimal .eaf body around the given TIME_ORDER, TIER and LINGUISTIC_TYPE markup */
export function eafWith(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<ANNOTATION_DOCUMENT AUTHOR="" DATE="" FORMAT="3.0" VERSION="3.0">
  <HEADER MEDIA_FILE="" TIME_UNITS="milliseconds"/>
  ${body}
</ANNOTATION_DOCUMENT>`;
}
