import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { Subtier } from '../../../models/tier';
import { FormatError } from '../../../utils/errors';
import { parseXml } from '../../../utils/xml';
import { eafWith, SAMPLE_EAF } from '../../../__tests__/helpers';
import { extractAudio, extractTiers, mediaUrlToPath } from '../eaf-parser';

const TYPES = `
  <LINGUISTIC_TYPE GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="default-lt" TIME_ALIGNABLE="true"/>
  <LINGUISTIC_TYPE CONSTRAINTS="Included_In" GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="sub-lt" TIME_ALIGNABLE="true"/>`;

describe('extractTiers', () => {
  const sample = parseXml(readFileSync(SAMPLE_EAF, 'utf-8'));

  it('separates root tiers from subtiers', () => {
    const { tiers, subtiers } = extractTiers(sample);
    expect([...tiers.keys()]).toEqual(['default', 'noise']);
    expect([...subtiers.keys()]).toEqual(['child']);
  });

  it('links a subtier to its parent object', () => {
    const { tiers, subtiers } = extractTiers(sample);
    const child = subtiers.get('child');
    expect(child?.parent).toBe(tiers.get('default'));
    expect(child?.annotator).toBe('AB');
    expect(child?.tierType.stereotype).toBe('Included_In');
    expect(tiers.get('default')?.participant).toBe('Speaker A');
  });

  it('shares one TierType between tiers of the same type', () => {
    const { tiers, tierTypes } = extractTiers(sample);
    expect(tiers.get('default')?.tierType).toBe(tierTypes.get('default-lt'));
    expect(tiers.get('noise')?.tierType).toBe(tierTypes.get('default-lt'));
  });

  it('keeps declared types no tier uses', () => {
    const { tierTypes } = extractTiers(sample);
    expect([...tierTypes.keys()].sort()).toEqual(['default-lt', 'sub-lt', 'unused-lt']);
    expect(tierTypes.get('unused-lt')?.stereotype).toBe('Symbolic_Association');
  });

  it('resolves nested subtiers declared after their parent', () => {
    const { subtiers } = extractTiers(
      parseXml(
        eafWith(`<TIME_ORDER/>
          <TIER LINGUISTIC_TYPE_REF="default-lt" TIER_ID="root"/>
          <TIER LINGUISTIC_TYPE_REF="sub-lt" PARENT_REF="root" TIER_ID="words"/>
          <TIER LINGUISTIC_TYPE_REF="sub-lt" PARENT_REF="words" TIER_ID="morphs"/>
          ${TYPES}`)
      )
    );
    const morphs = subtiers.get('morphs');
    expect(morphs?.parent).toBeInstanceOf(Subtier);
    expect(morphs?.parent.name).toBe('words');
  });

  it('rejects a subtier whose parent does not exist', () => {
    const tree = parseXml(
      eafWith(`<TIME_ORDER/>
        <TIER LINGUISTIC_TYPE_REF="default-lt" TIER_ID="default"/>
        <TIER LINGUISTIC_TYPE_REF="sub-lt" PARENT_REF="ghost" TIER_ID="child"/>
        ${TYPES}`)
    );
    expect(() => extractTiers(tree)).toThrow('child refers to unknown parent tier ghost');
  });

  it('rejects a subtier whose parent subtier is declared later', () => {
    const tree = parseXml(
      eafWith(`<TIME_ORDER/>
        <TIER LINGUISTIC_TYPE_REF="default-lt" TIER_ID="root"/>
        <TIER LINGUISTIC_TYPE_REF="sub-lt" PARENT_REF="words" TIER_ID="morphs"/>
        <TIER LINGUISTIC_TYPE_REF="sub-lt" PARENT_REF="root" TIER_ID="words"/>
        ${TYPES}`)
    );
    expect(() => extractTiers(tree)).toThrow(FormatError);
  });

  it('rejects a tier with an undeclared type', () => {
    const tree = parseXml(
      eafWith(`<TIME_ORDER/><TIER LINGUISTIC_TYPE_REF="missing-lt" TIER_ID="default"/>${TYPES}`)
    );
    expect(() => extractTiers(tree)).toThrow('default has unknown linguistic type reference missing-lt');
  });
});

describe('media paths', () => {
  it('reads the first media descriptor', () => {
    const tree = parseXml(readFileSync(SAMPLE_EAF, 'utf-8'));
    expect(extractAudio(tree, SAMPLE_EAF)).toBe('/data/recording.wav');
  });

  it('returns undefined without a media descriptor', () => {
    expect(extractAudio(parseXml(eafWith('<TIME_ORDER/>')), '/corpus/session.eaf')).toBeUndefined();
  });

  it('converts file URLs', () => {
    expect(mediaUrlToPath('file:///corpus/audio/a%20b.wav', '/corpus/session.eaf')).toBe('/corpus/audio/a b.wav');
  });

  it('resolves relative URLs against the document directory', () => {
    expect(mediaUrlToPath('./clip.wav', '/corpus/session.eaf')).toBe('/corpus/clip.wav');
    expect(mediaUrlToPath('../media/clip.wav', '/corpus/eaf/session.eaf')).toBe('/corpus/media/clip.wav');
  });
});
