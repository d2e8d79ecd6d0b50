/**
 * Card Constants
 *
 * Tag, class and attribute names of the card markup, plus the numeric rules
 * applied while validating schemas.
 */

// =============================================================================
// Document Body
// =============================================================================

export const TAXOID_PROP = 'data-taxoid';
export const INSTRUMENTID_PROP = 'data-instrumentid';
export const BODY_ATTRS = [TAXOID_PROP, INSTRUMENTID_PROP] as const;

export const TEMPLATES_CLASS = 'svg-templates';
export const MORPHO_CRITERIA_CLASS = 'morpho-criteria';
export const DESCRIPTIVE_SCHEMAS_CLASS = 'descriptive-schemas';

export const MORE_EXAMPLES_CLASS = 'more-examples';
export const PHOTOS_AND_FIGURES_CLASS = 'photos-and-figures';
export const POSSIBLE_CONFUSIONS_CLASS = 'possible-confusions';

/** Optional containers after the descriptive schemas, in their only valid order */
export const OPTIONAL_SECTIONS_ORDER = [
  MORE_EXAMPLES_CLASS,
  PHOTOS_AND_FIGURES_CLASS,
  POSSIBLE_CONFUSIONS_CLASS,
] as const;

export type OptionalSectionClass = (typeof OPTIONAL_SECTIONS_ORDER)[number];

// =============================================================================
// Identification Criteria
// =============================================================================

export const TOP_LEVEL_ARTICLE_TAGS = ['p', 'ul'] as const;
export const ARTICLE_EFFECT_TAGS = ['em', 'strong'] as const;
export const LIST_ITEM_TAG = 'li';

/** Pictographic (emoji-like) code points are not allowed in card text */
export const FORBIDDEN_CHARS = /\p{Extended_Pictographic}/u;

// =============================================================================
// Schemas
// =============================================================================

export const VIEW_NAME_PROP = 'data-view-name';
export const INSTANCE_PROP = 'data-instance';
export const OBJECT_ID_PROP = 'data-object-id';
export const VIEW_PROPS = [VIEW_NAME_PROP, INSTANCE_PROP, OBJECT_ID_PROP] as const;
export const EXAMPLE_PROPS = [INSTANCE_PROP, OBJECT_ID_PROP] as const;

export const CONFUSION_PAIR_CLASS = 'confusion-pair';
export const CONFUSION_SELF_CLASS = 'confusion-self';
export const CONFUSION_OTHER_CLASS = 'confusion-other';
export const CONFUSION_OTHER_ATTRS = ['class', TAXOID_PROP, INSTRUMENTID_PROP] as const;

export const PHOTO_LINK_ATTRS = ['href'] as const;

// =============================================================================
// SVG Regions
// =============================================================================

export const XLINK_HREF = 'xlink:href';

/** Attributes the top <svg> of every schema carries, no more, no less */
export const SCHEMA_SVG_ATTRS = [
  'xmlns',
  'viewBox',
  'font-size',
  'xmlns:xlink',
  'version',
  'baseProfile',
] as const;

export const SHAPES_GROUP_CLASS = 'shapes';
export const ZOOMS_GROUP_CLASS = 'zooms';
export const IMAGE_SVG_CLASS = 'background';

export const LABEL_PROP = 'data-label';
export const DEFAULT_LABEL = '?';

export const MARKER_SUFFIX = '_triangle';
export const SEGMENT_SUFFIX = '_segment';

/** Tags accepted inside <g class="shapes">, <title> is tolerated and skipped */
export const SHAPE_GROUP_TAGS = ['line', 'path', 'circle', 'svg', 'use', 'text'] as const;
export const SKIPPED_SHAPE_TAGS = ['title'] as const;

export const MANDATORY_ATTRS_IN_LINE = ['id', LABEL_PROP, 'x1', 'y1', 'x2', 'y2'] as const;
export const MANDATORY_ATTRS_IN_CURVES = ['id', LABEL_PROP, 'd'] as const;
export const OPTIONAL_ATTRS_IN_ARROWABLE = ['marker-start', 'marker-end'] as const;
export const MANDATORY_ATTRS_IN_CIRCLE = ['id', LABEL_PROP, 'r', 'cx', 'cy'] as const;
export const MANDATORY_ATTRS_IN_NUMBER = ['id', 'x', 'y'] as const;
export const MANDATORY_ATTRS_IN_SEGMENT = ['id', 'x', 'y', 'width', 'height', XLINK_HREF] as const;
export const OPTIONAL_ATTRS_IN_SEGMENT = ['transform'] as const;
/** The id is mandatory too, but checked with the other shape ids */
export const MANDATORY_ATTRS_IN_IMAGE_SVG = ['class', 'width', 'height'] as const;
export const OPTIONAL_ATTRS_IN_IMAGE_SVG = ['id'] as const;
export const MANDATORY_ATTRS_IN_IMAGE = [XLINK_HREF] as const;
export const OPTIONAL_ATTRS_IN_IMAGE = ['x', 'y', 'width', 'height', 'transform'] as const;
export const MANDATORY_ATTRS_IN_ZOOM = ['id', 'x', 'y', 'width', 'height'] as const;

/** Crop used when the schema <svg> cannot be trusted */
export const DEFAULT_CROP = { x: 0, y: 0, width: 100, height: 100 } as const;

/** Glyphs a number shape may display */
export const NUMBER_GLYPHS: readonly string[] = ['①', '②', '③', '④', '⑤', '⑥', '⑦', '⑧', '⑨'];

// =============================================================================
// Numeric Rules
// =============================================================================

/**
 * Rotation angles a segment may use. Earlier card revisions only accepted
 * 0, 45 and 90; override through CardReaderOptions when reading those.
 */
export const SEGMENT_ROTATION_ANGLES: readonly number[] = [-90, -45, 0, 45, 90];

/** Commands allowed after the initial move of a curve */
export const MAX_PARTS_IN_CURVE = 16;

/** font-size of a schema must be round(image height / FONT_SIZE_RATIO) */
export const FONT_SIZE_RATIO = 36;
