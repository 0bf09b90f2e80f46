export { VERSION, EAF_ENCODING, MINIMUM_EAF, STEREOTYPES, DEFAULT_TIER, DEFAULT_TIER_TYPE } from './constants/eaf';
export { TierType, isStereotype } from './models/tier-type';
export { Tier, Subtier } from './models/tier';
export type { TierInit, SubtierInit } from './models/tier';
export {
  createSegmentationStore,
  readSegments,
  segmentationsFromFile,
} from './stores/segmentation-store';
export type { GetSegmentOptions, SegmentationState, SegmentationStore } from './stores/segmentation-store';
export { EafDocument } from './services/elan/eaf-document';
export type { CreateEafOptions, PathLike, SaveOptions } from './services/elan/eaf-document';
export { extractAudio, extractTiers, lastAnnotationNumber, mediaUrlToPath } from './services/elan/eaf-parser';
export { buildTimeSlots, generateEaf } from './services/elan/eaf-writer';
export { exportRttm, writeRttm } from './services/export/rttm-exporter';
export type { RttmExportOptions } from './services/export/rttm-exporter';
export { defaultFormatter, exportText, writeText } from './services/export/text-exporter';
export type { SegmentFormatter, TextExportOptions } from './services/export/text-exporter';
export {
  CorruptionError,
  EafError,
  FileExistsError,
  FormatError,
  InvalidArgumentError,
  NotFoundError,
  WrongVariantError,
} from './utils/errors';
export type {
  DocumentMetadata,
  EafTimeSlot,
  Segment,
  SegmentColumns,
  SegmentTuple,
  SplitPoint,
  Stereotype,
  TableRow,
  TierMetadata,
} from './types/elan';
