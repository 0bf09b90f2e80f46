import { z } from 'zod';
import { DEFAULT_TIER_TYPE, STEREOTYPES } from '../constants/eaf';
import type { Stereotype } from '../types/elan';
import { FormatError, InvalidArgumentError } from '../utils/errors';
import { requireAttribute } from '../utils/xml';

const tierTypeSchema = z.object({
  name: z.string({ invalid_type_error: 'tier type name must be a string' }),
  stereotype: z.enum(STEREOTYPES),
});

export function isStereotype(value: string): value is Stereotype {
  return STEREOTYPES.some((s) => s === value);
}

/**
 * A LINGUISTIC_TYPE: a named annotation category and the constraint its tiers
 * follow. Immutable; tiers share one instance per name.
 */
export class TierType {
  readonly name: string;
  readonly stereotype: Stereotype;

  constructor(name: string = DEFAULT_TIER_TYPE, stereotype: Stereotype = 'None') {
    const parsed = tierTypeSchema.safeParse({ name, stereotype });
    if (!parsed.success) {
      throw new InvalidArgumentError(`Invalid tier type: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    this.name = parsed.data.name;
    this.stereotype = parsed.data.stereotype;
    Object.freeze(this);
  }

  /** Build from untrusted input such as decoded JSON */
  static parse(input: unknown): TierType {
    const parsed = tierTypeSchema.partial().safeParse(input);
    if (!parsed.success) {
      throw new InvalidArgumentError(`Invalid tier type: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return new TierType(parsed.data.name, parsed.data.stereotype);
  }

  /** Create a TierType from a LINGUISTIC_TYPE tag */
  static fromTag(tag: Element): TierType {
    if (tag.tagName !== 'LINGUISTIC_TYPE') {
      throw new FormatError(`Expected a LINGUISTIC_TYPE tag, got <${tag.tagName}>`);
    }
    const name = requireAttribute(tag, 'LINGUISTIC_TYPE_ID');
    const constraint = tag.getAttribute('CONSTRAINTS');
    if (constraint === null) return new TierType(name);
    if (!isStereotype(constraint)) {
      throw new FormatError(`Tier type ${name} has unknown constraint ${constraint}`);
    }
    return new TierType(name, constraint);
  }

  toTag(doc: Document): Element {
    const element = doc.createElement('LINGUISTIC_TYPE');
    // Graphic references are not supported
    element.setAttribute('GRAPHIC_REFERENCES', 'false');
    element.setAttribute('LINGUISTIC_TYPE_ID', this.name);

    switch (this.stereotype) {
      case 'None':
        element.setAttribute('TIME_ALIGNABLE', 'true');
        break;
      case 'Time_Subdivision':
        element.setAttribute('TIME_ALIGNABLE', 'true');
        element.setAttribute('CONSTRAINTS', this.stereotype);
        break;
      default:
        element.setAttribute('TIME_ALIGNABLE', 'false');
        element.setAttribute('CONSTRAINTS', this.stereotype);
    }
    return element;
  }

  equals(other: TierType): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return `name: ${this.name}\nstereotype: ${this.stereotype}\n`;
  }
}
