export const VERSION = '2.0.0';

/** Encoding used for every .eaf read and write */
export const EAF_ENCODING = 'utf-8' as const;

export const DEFAULT_TIER = 'default';
export const DEFAULT_TIER_TYPE = 'default-lt';

/** Tag every console line we emit carries */
export const LOG_PREFIX = '[EAF]';

export const STEREOTYPES = [
  'None',
  'Time_Subdivision',
  'Symbolic_Subdivision',
  'Symbolic_Association',
  'Included_In',
] as const;

// Smallest document ELAN will open; new documents start from this
export const MINIMUM_EAF = `<?xml version="1.0" encoding="UTF-8"?>
<ANNOTATION_DOCUMENT AUTHOR="" DATE="" FORMAT="3.0" VERSION="3.0"
    xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xsi:noNamespaceSchemaLocation="http://www.mpi.nl/tools/elan/EAFv3.0.xsd">
    <HEADER MEDIA_FILE="" TIME_UNITS="milliseconds"/>
    <TIME_ORDER/>
    <TIER LINGUISTIC_TYPE_REF="${DEFAULT_TIER_TYPE}" TIER_ID="${DEFAULT_TIER}"/>
    <LINGUISTIC_TYPE GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="${DEFAULT_TIER_TYPE}" TIME_ALIGNABLE="true"/>
    <CONSTRAINT DESCRIPTION="Time subdivision of parent annotation's time interval, no time gaps allowed within this interval" STEREOTYPE="Time_Subdivision"/>
    <CONSTRAINT DESCRIPTION="Symbolic subdivision of a parent annotation. Annotations refering to the same parent are ordered" STEREOTYPE="Symbolic_Subdivision"/>
    <CONSTRAINT DESCRIPTION="1-1 association with a parent annotation" STEREOTYPE="Symbolic_Association"/>
    <CONSTRAINT DESCRIPTION="Time alignable annotations within the parent annotation's time interval, gaps are allowed" STEREOTYPE="Included_In"/>
</ANNOTATION_DOCUMENT>`;

/** HEADER property ELAN reads to pick the next annotation id */
export const LAST_ANNOTATION_ID_PROPERTY = 'lastUsedAnnotationId';

export const DEFAULT_MIME_TYPE = 'audio/x-wav';

export const MEDIA_MIME_TYPES: Readonly<Record<string, string>> = Object.freeze({
  '.wav': 'audio/x-wav',
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.flac': 'audio/flac',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
});
