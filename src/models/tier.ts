import { z } from 'zod';
import { DEFAULT_TIER } from '../constants/eaf';
import { FormatError, InvalidArgumentError, WrongVariantError } from '../utils/errors';
import { requireAttribute } from '../utils/xml';
import { TierType } from './tier-type';

export interface TierInit {
  name?: string;
  participant?: string;
  annotator?: string;
  tierType?: TierType;
}

export interface SubtierInit extends TierInit {
  parent: Tier;
}

const tierSchema = z.object({
  name: z.string().default(DEFAULT_TIER),
  participant: z.string().default(''),
  annotator: z.string().default(''),
  tierType: z.instanceof(TierType).default(() => new TierType()),
});

const subtierSchema = tierSchema.extend({
  parent: z.custom<Tier>((value) => value instanceof Tier, { message: 'parent must be a Tier or Subtier' }),
});

function invalid(kind: string, error: z.ZodError): InvalidArgumentError {
  const detail = error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
  return new InvalidArgumentError(`Invalid ${kind}: ${detail}`);
}

function checkTierTag(tag: Element): string {
  if (tag.tagName !== 'TIER') {
    throw new FormatError(`Expected a TIER tag, got <${tag.tagName}>`);
  }
  return requireAttribute(tag, 'TIER_ID');
}

function resolveType(tierType: TierType | Element): TierType {
  return tierType instanceof TierType ? tierType : TierType.fromTag(tierType);
}

/** A named track of annotations, e.g. one per speaker */
export class Tier {
  readonly name: string;
  readonly tierType: TierType;
  participant: string;
  annotator: string;

  constructor(init: TierInit = {}) {
    const parsed = tierSchema.safeParse(init);
    if (!parsed.success) throw invalid('tier', parsed.error);
    this.name = parsed.data.name;
    this.participant = parsed.data.participant;
    this.annotator = parsed.data.annotator;
    this.tierType = parsed.data.tierType;
  }

  /** Build from untrusted input */
  static parse(input: unknown): Tier {
    const parsed = tierSchema.safeParse(input);
    if (!parsed.success) throw invalid('tier', parsed.error);
    return new Tier(parsed.data);
  }

  /**
   * Create a Tier from a TIER tag. `tierType` is either the resolved TierType
   * or its LINGUISTIC_TYPE tag.
   */
  static fromTag(tag: Element, tierType: TierType | Element): Tier {
    const name = checkTierTag(tag);
    if (tag.hasAttribute('PARENT_REF')) {
      throw new WrongVariantError(`Tier ${name} has a PARENT_REF; build it with Subtier.fromTag`);
    }
    return new Tier({
      name,
      tierType: resolveType(tierType),
      participant: tag.getAttribute('PARTICIPANT') ?? '',
      annotator: tag.getAttribute('ANNOTATOR') ?? '',
    });
  }

  toTag(doc: Document): Element {
    const element = doc.createElement('TIER');
    element.setAttribute('LINGUISTIC_TYPE_REF', this.tierType.name);
    element.setAttribute('TIER_ID', this.name);
    // Absent metadata is omitted, never written as an empty attribute
    if (this.participant) element.setAttribute('PARTICIPANT', this.participant);
    if (this.annotator) element.setAttribute('ANNOTATOR', this.annotator);
    return element;
  }

  toString(): string {
    return `name: ${this.name}\ntier type: ${this.tierType.name}\n`;
  }
}

/**
 * A tier whose annotations depend on a parent tier. The parent has to be built
 * first: its type lives in a separate LINGUISTIC_TYPE tag, so it cannot be
 * recovered from the child's TIER tag.
 */
export class Subtier extends Tier {
  readonly parent: Tier;

  constructor(init: SubtierInit) {
    const parsed = subtierSchema.safeParse(init);
    if (!parsed.success) throw invalid('subtier', parsed.error);
    super(parsed.data);
    this.parent = parsed.data.parent;
  }

  static override parse(input: unknown): Subtier {
    const parsed = subtierSchema.safeParse(input);
    if (!parsed.success) throw invalid('subtier', parsed.error);
    return new Subtier(parsed.data);
  }

  static override fromTag(tag: Element, tierType: TierType | Element, parent?: Tier): Subtier {
    const name = checkTierTag(tag);
    if (!tag.hasAttribute('PARENT_REF')) {
      throw new WrongVariantError(`Tier ${name} has no PARENT_REF; build it with Tier.fromTag`);
    }
    if (!parent) {
      throw new InvalidArgumentError(`Subtier ${name} needs its parent tier`);
    }
    return new Subtier({
      name,
      parent,
      tierType: resolveType(tierType),
      participant: tag.getAttribute('PARTICIPANT') ?? '',
      annotator: tag.getAttribute('ANNOTATOR') ?? '',
    });
  }

  override toTag(doc: Document): Element {
    const element = super.toTag(doc);
    element.setAttribute('PARENT_REF', this.parent.name);
    return element;
  }

  override toString(): string {
    return `name: ${this.name}\nparent: ${this.parent.name}\ntier type: ${this.tierType.name}\n`;
  }
}
