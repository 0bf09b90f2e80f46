import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { LAST_ANNOTATION_ID_PROPERTY } from '../../constants/eaf';
import { Subtier, Tier } from '../../models/tier';
import { TierType } from '../../models/tier-type';
import { FormatError } from '../../utils/errors';
import { nextAnnotationNumber } from '../../utils/id-generator';
import { childElements, descendants, firstChildElement, requireAttribute } from '../../utils/xml';

export interface ExtractedTiers {
  tiers: Map<string, Tier>;
  subtiers: Map<string, Subtier>;
  tierTypes: Map<string, TierType>;
}

/**
 * Resolve the TierTypes, Tiers and Subtiers declared in an .eaf tree.
 *
 * Root tiers are built first and indexed by name; subtiers follow in file
 * order and look their parent up in that index, so a parent must be a root
 * tier or a subtier declared before its child.
 */
export function extractTiers(tree: Document): ExtractedTiers {
  const root = tree.documentElement;

  const typeTags = new Map<string, Element>();
  for (const el of childElements(root, 'LINGUISTIC_TYPE')) {
    typeTags.set(requireAttribute(el, 'LINGUISTIC_TYPE_ID'), el);
  }

  const tierTypes = new Map<string, TierType>();
  const typeFor = (tierEl: Element): TierType => {
    const typeName = requireAttribute(tierEl, 'LINGUISTIC_TYPE_REF');
    const cached = tierTypes.get(typeName);
    if (cached) return cached;

    const tag = typeTags.get(typeName);
    if (!tag) {
      throw new FormatError(
        `${tierEl.getAttribute('TIER_ID')} has unknown linguistic type reference ${typeName}`
      );
    }
    const tierType = TierType.fromTag(tag);
    tierTypes.set(typeName, tierType);
    return tierType;
  };

  // 1. Root tiers
  const index = new Map<string, Tier>();
  const tiers = new Map<string, Tier>();
  const subtierTags: Element[] = [];

  for (const el of childElements(root, 'TIER')) {
    const tierType = typeFor(el);
    if (el.hasAttribute('PARENT_REF')) {
      subtierTags.push(el);
      continue;
    }
    const tier = Tier.fromTag(el, tierType);
    tiers.set(tier.name, tier);
    index.set(tier.name, tier);
  }

  // 2. Subtiers, now that every root tier exists as an object
  const subtiers = new Map<string, Subtier>();
  for (const el of subtierTags) {
    const parentName = requireAttribute(el, 'PARENT_REF');
    const parent = index.get(parentName);
    if (!parent) {
      throw new FormatError(`${el.getAttribute('TIER_ID')} refers to unknown parent tier ${parentName}`);
    }
    const subtier = Subtier.fromTag(el, typeFor(el), parent);
    subtiers.set(subtier.name, subtier);
    index.set(subtier.name, subtier);
  }

  // Declared types no tier uses still belong to the document
  for (const [name, tag] of typeTags) {
    if (!tierTypes.has(name)) tierTypes.set(name, TierType.fromTag(tag));
  }

  return { tiers, subtiers, tierTypes };
}

/** Turn a MEDIA_URL into a local path; relative URLs resolve against the .eaf's directory */
export function mediaUrlToPath(url: string, eafFile: string): string {
  if (url.startsWith('file:')) {
    try {
      return fileURLToPath(url);
    } catch {
      // a host or other non-local form; keep whatever path follows the scheme
      return resolve(dirname(eafFile), url.replace(/^file:(\/\/)?/, ''));
    }
  }
  return resolve(dirname(eafFile), url);
}

/** Path of the associated media, or undefined when the header has no media descriptor */
export function extractAudio(tree: Document, eafFile: string): string | undefined {
  const descriptor = Array.from(tree.getElementsByTagName('MEDIA_DESCRIPTOR')).find((el) =>
    el.hasAttribute('MIME_TYPE')
  );
  const url = descriptor?.getAttribute('MEDIA_URL');
  return url ? mediaUrlToPath(url, eafFile) : undefined;
}

/**
 * Highest annotation number the file has used: alignable and reference
 * annotations, and the HEADER's lastUsedAnnotationId when it is larger.
 */
export function lastAnnotationNumber(tree: Document): number {
  const root = tree.documentElement;
  const ids = ['ALIGNABLE_ANNOTATION', 'REF_ANNOTATION'].flatMap((tag) =>
    descendants(root, tag).map((el) => el.getAttribute('ANNOTATION_ID') ?? '')
  );
  const used = nextAnnotationNumber(ids) - 1;

  const header = firstChildElement(root, 'HEADER');
  const property = header
    ? childElements(header, 'PROPERTY').find((el) => el.getAttribute('NAME') === LAST_ANNOTATION_ID_PROPERTY)
    : undefined;
  const declared = parseInt(property?.textContent ?? '', 10);
  return Number.isNaN(declared) ? used : Math.max(used, declared);
}
