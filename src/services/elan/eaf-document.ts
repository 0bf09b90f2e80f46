import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, extname, resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import {
  DEFAULT_MIME_TYPE,
  DEFAULT_TIER,
  DEFAULT_TIER_TYPE,
  EAF_ENCODING,
  LOG_PREFIX,
  MEDIA_MIME_TYPES,
  MINIMUM_EAF,
} from '../../constants/eaf';
import { Subtier, Tier } from '../../models/tier';
import { TierType } from '../../models/tier-type';
import { createSegmentationStore, readSegments } from '../../stores/segmentation-store';
import type { SegmentationStore } from '../../stores/segmentation-store';
import type { DocumentMetadata, Segment, SplitPoint, TableRow, TierMetadata } from '../../types/elan';
import { FileExistsError, FormatError, InvalidArgumentError } from '../../utils/errors';
import { toMs } from '../../utils/time';
import { firstChildElement, parseXml } from '../../utils/xml';
import { extractAudio, extractTiers, lastAnnotationNumber } from './eaf-parser';
import { generateEaf } from './eaf-writer';

export type PathLike = string | URL;

export interface SaveOptions {
  /** Save under a new path; the document keeps the new path afterwards */
  file?: PathLike;
  /** Replace an existing file instead of throwing FileExistsError */
  overwrite?: boolean;
}

export interface CreateEafOptions {
  /** Start without the `default` tier */
  removeDefault?: boolean;
}

function toPath(file: unknown): string {
  if (file instanceof URL) return fileURLToPath(file);
  if (typeof file !== 'string') {
    throw new TypeError('Invalid file type given; expected a path string or file URL');
  }
  if (file === '') {
    throw new InvalidArgumentError('No file given');
  }
  return file;
}

function mimeTypeFor(file: string): string {
  return MEDIA_MIME_TYPES[extname(file).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

/**
 * An ELAN annotation document: tier types, tiers, subtiers and the
 * segmentation store, plus the raw tree they were read from.
 */
export class EafDocument {
  file: string;
  audio: string | undefined;
  tree: Document;
  readonly tiers: Map<string, Tier>;
  readonly subtiers: Map<string, Subtier>;
  readonly tierTypes: Map<string, TierType>;
  readonly segmentations: SegmentationStore;
  private _modified = false;

  private constructor(file: string, tree: Document, segmentations: SegmentationStore) {
    this.file = file;
    this.tree = tree;
    const { tiers, subtiers, tierTypes } = extractTiers(tree);
    this.tiers = tiers;
    this.subtiers = subtiers;
    this.tierTypes = tierTypes;
    this.segmentations = segmentations;
    this.audio = undefined;
  }

  /** A new, empty document that will be written to `file` on save */
  static create(file: PathLike): EafDocument {
    const path = toPath(file);
    return new EafDocument(path, parseXml(MINIMUM_EAF), createSegmentationStore());
  }

  /**
   * Load an existing .eaf file. Read and parse errors propagate as they are;
   * an annotation with an empty or reversed time range is a FormatError.
   */
  static fromFile(file: PathLike): EafDocument {
    const path = toPath(file);
    const tree = parseXml(readFileSync(path, EAF_ENCODING));
    const segmentations = createSegmentationStore(readSegments(tree));
    // Ids of reference annotations and deleted annotations stay taken
    const reserved = lastAnnotationNumber(tree) + 1;
    segmentations.setState((state) => ({ nextId: Math.max(state.nextId, reserved) }));

    const doc = new EafDocument(path, tree, segmentations);
    doc.audio = extractAudio(tree, path);
    return doc;
  }

  /**
   * Build a document from flat rows of `{ tier, start, end, text }`.
   * Only plain tiers of the default type are created; subtiers cannot be
   * expressed in this form.
   */
  static fromTable(rows: readonly TableRow[], file: PathLike, audio?: PathLike): EafDocument {
    if (!Array.isArray(rows)) {
      throw new InvalidArgumentError('fromTable expects an array of rows');
    }
    const doc = EafDocument.create(file);
    if (audio !== undefined) doc.addAudio(audio);

    const used = new Set(rows.map((row) => row.tier));
    if (!used.has(DEFAULT_TIER)) doc.removeTiers([DEFAULT_TIER]);

    for (const row of rows) {
      doc.addSegment(row.tier, row.start, row.end, row.text ?? '');
    }
    doc._modified = false;
    return doc;
  }

  /** A new document with the given tiers and, optionally, its audio */
  static createEaf(
    file: PathLike,
    audio: PathLike | undefined,
    tiers: readonly string[],
    options: CreateEafOptions = {}
  ): EafDocument {
    const doc = EafDocument.create(file);
    if (options.removeDefault) doc.removeTiers([DEFAULT_TIER]);
    doc.addTiers(tiers);
    if (audio !== undefined) doc.addAudio(audio);
    doc._modified = false;
    return doc;
  }

  // ===================== ACCESSORS =====================

  /** Has the document changed since it was created, loaded or saved? */
  get modified(): boolean {
    return this._modified;
  }

  get filename(): string {
    return basename(this.file);
  }

  /** Number of segments */
  get size(): number {
    return this.segmentations.getState().segments.length;
  }

  /** Names of every tier and subtier */
  tierNames(): Set<string> {
    return new Set([...this.tiers.keys(), ...this.subtiers.keys()]);
  }

  segments(): readonly Segment[] {
    return this.segmentations.getState().segments;
  }

  audioPath(): string | undefined {
    return this.audio;
  }

  /** Text of the segment with this id, or undefined */
  getSegment(id: string | number): string | undefined {
    return this.segmentations.getState().getSegment(id)?.text;
  }

  getTier(name: string): Tier | undefined {
    return this.tiers.get(name) ?? this.subtiers.get(name);
  }

  has(item: string | Tier | TierType): boolean {
    if (typeof item === 'string') return this.tierNames().has(item);
    if (item instanceof TierType) return this.tierTypes.get(item.name) === item;
    return this.getTier(item.name) === item;
  }

  [Symbol.iterator](): Iterator<Segment> {
    return this.segments()[Symbol.iterator]();
  }

  // ===================== MUTATORS =====================

  /** Add a tier of the default type; empty or existing names are ignored */
  addTier(name: string | undefined | null, metadata: TierMetadata = {}): void {
    if (!name || this.tierNames().has(name)) return;
    this.tiers.set(name, new Tier({ name, tierType: this.defaultTierType(), ...metadata }));
    this._modified = true;
  }

  addTiers(names: readonly (string | undefined | null)[] | undefined | null): void {
    for (const name of names ?? []) this.addTier(name);
  }

  /** Add a subtier under an existing tier or subtier */
  addSubtier(name: string, parent: string, tierType: TierType, metadata: TierMetadata = {}): Subtier {
    if (!name) throw new InvalidArgumentError('No subtier name given');
    if (this.tierNames().has(name)) {
      throw new InvalidArgumentError(`Tier ${name} already exists`);
    }
    const parentTier = this.getTier(parent);
    if (!parentTier) throw new InvalidArgumentError(`Parent tier ${parent} does not exist`);

    const subtier = new Subtier({ name, parent: parentTier, tierType: this.registerTierType(tierType), ...metadata });
    this.subtiers.set(name, subtier);
    this._modified = true;
    return subtier;
  }

  /** Remove tiers or subtiers by name. Their segments stay in the store. */
  removeTiers(names: readonly string[] | undefined | null): void {
    for (const name of names ?? []) {
      const removed = this.tiers.delete(name) || this.subtiers.delete(name);
      if (!removed) continue;
      this._modified = true;

      const children = [...this.subtiers.values()].filter((s) => s.parent.name === name);
      if (children.length > 0) {
        console.warn(
          `${LOG_PREFIX} Removed tier "${name}" is still the parent of ${children.map((c) => c.name).join(', ')}`
        );
      }
    }
  }

  /** Replace a tier's participant and/or annotator */
  setTierMetadata(name: string, metadata: TierMetadata): void {
    const tier = this.getTier(name);
    if (!tier) return;
    if (metadata.participant !== undefined) tier.participant = metadata.participant;
    if (metadata.annotator !== undefined) tier.annotator = metadata.annotator;
    this._modified = true;
  }

  /** Set the AUTHOR and DATE attributes of the document root */
  setMetadata(metadata: DocumentMetadata): void {
    const root = this.tree.documentElement;
    if (metadata.author !== undefined) root.setAttribute('AUTHOR', metadata.author);
    if (metadata.date !== undefined) root.setAttribute('DATE', metadata.date);
    this._modified = true;
  }

  /** Point the document at another path without touching either file */
  changeFile(file: PathLike): void {
    const path = toPath(file);
    if (path === this.file) return;
    this.file = path;
    this._modified = true;
  }

  /**
   * Add or replace the associated media. The path is stored absolute; giving
   * the same file again leaves the document unmodified.
   */
  addAudio(audio: PathLike | undefined | null): void {
    if (!audio) return;
    const path = resolve(toPath(audio));
    const url = pathToFileURL(path).href;

    const header = firstChildElement(this.tree.documentElement, 'HEADER');
    if (!header) throw new FormatError('Document has no HEADER element');

    const old = firstChildElement(header, 'MEDIA_DESCRIPTOR');
    if (old) {
      if (old.getAttribute('MEDIA_URL') === url) return;
      header.removeChild(old);
    }

    const descriptor = this.tree.createElement('MEDIA_DESCRIPTOR');
    descriptor.setAttribute('MEDIA_URL', url);
    descriptor.setAttribute('MIME_TYPE', mimeTypeFor(path));
    header.insertBefore(descriptor, header.firstChild);

    this.audio = path;
    this._modified = true;
  }

  /** Add a segment, creating the tier first when it does not exist */
  addSegment(tier: string, start: number | string, end: number | string, text = ''): Segment {
    if (!tier) throw new InvalidArgumentError('No tier given');

    // Checked here as well so invalid input never creates a tier
    const startMs = toMs(start, 'start');
    const endMs = toMs(end, 'end');
    if (startMs < 0 || endMs <= startMs) {
      throw new InvalidArgumentError(`Expected 0 <= start < end, got start ${startMs} and end ${endMs}`);
    }

    this.addTier(tier);
    const segment = this.segmentations.getState().addSegment(tier, startMs, endMs, text);
    this._modified = true;
    return segment;
  }

  removeSegment(id: string | number): void {
    if (this.segmentations.getState().removeSegment(id)) this._modified = true;
  }

  splitSegment(id: string | number, point: SplitPoint): [Segment, Segment] {
    const halves = this.segmentations.getState().splitSegment(id, point);
    this._modified = true;
    return halves;
  }

  // ===================== SERIALIZATION =====================

  /** The document as .eaf XML */
  serialize(): string {
    const subtiers = [...this.subtiers.values()];
    const attached = subtiers.filter((s) => this.isAttached(s));
    if (attached.length < subtiers.length) {
      const detached = subtiers.filter((s) => !attached.includes(s)).map((s) => s.name);
      console.warn(`${LOG_PREFIX} Skipping subtier(s) whose parent was removed: ${detached.join(', ')}`);
    }

    const tiers: Tier[] = [...this.tiers.values(), ...attached];
    return generateEaf({
      tree: this.tree,
      tierTypes: this.tierTypes.values(),
      tiers,
      segments: this.segments(),
      lastAnnotationId: this.segmentations.getState().nextId - 1,
    });
  }

  /** Write the document to its file (or `options.file`) */
  save(options: SaveOptions = {}): void {
    const path = options.file !== undefined ? toPath(options.file) : this.file;
    if (!options.overwrite && existsSync(path)) {
      throw new FileExistsError(path);
    }
    writeFileSync(path, this.serialize(), EAF_ENCODING);
    this.file = path;
    this._modified = false;
    console.info(`${LOG_PREFIX} Saved ${path}`);
  }

  // ===================== OTHER METHODS =====================

  /** Same file, audio, tier names and segment rows */
  equals(other: EafDocument): boolean {
    const names = this.tierNames();
    const otherNames = other.tierNames();
    const a = this.segments();
    const b = other.segments();
    return (
      this.file === other.file &&
      this.audio === other.audio &&
      names.size === otherNames.size &&
      [...names].every((n) => otherNames.has(n)) &&
      a.length === b.length &&
      a.every((s, i) => JSON.stringify(s) === JSON.stringify(b[i]))
    );
  }

  toString(): string {
    return [
      `name: ${this.filename}`,
      `located at: ${resolve(this.file)}`,
      `tiers: ${[...this.tierNames()].join(', ')}`,
      `associated audio file: ${this.audio ? basename(this.audio) : 'None'}`,
      `associated audio location: ${this.audio ?? 'None'}`,
      `modified: ${this._modified}`,
      '',
    ].join('\n');
  }

  /** Is every tier up the parent chain still part of the document? */
  private isAttached(tier: Tier): boolean {
    if (tier instanceof Subtier) {
      return this.subtiers.get(tier.name) === tier && this.isAttached(tier.parent);
    }
    return this.tiers.get(tier.name) === tier;
  }

  private defaultTierType(): TierType {
    return this.tierTypes.get(DEFAULT_TIER_TYPE) ?? this.registerTierType(new TierType(DEFAULT_TIER_TYPE));
  }

  /** Reuse the document's type of this name, or add `tierType` when there is none */
  private registerTierType(tierType: TierType): TierType {
    const existing = this.tierTypes.get(tierType.name);
    if (!existing) {
      this.tierTypes.set(tierType.name, tierType);
      return tierType;
    }
    if (existing.stereotype !== tierType.stereotype) {
      throw new InvalidArgumentError(
        `Tier type ${tierType.name} already exists with stereotype ${existing.stereotype}`
      );
    }
    return existing;
  }
}
