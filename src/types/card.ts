/**
 * Card Type Definitions
 *
 * The in-memory taxonomic card, as produced by the CardReader.
 * Everything is built during one read and never mutated afterwards.
 */

// =============================================================================
// Identifiers
// =============================================================================

/** Category id in the taxonomy server */
export type ClassifId = number;
/** Imaging instrument id, e.g. "Zooscan" */
export type InstrumentId = string;
/** Image reference in the source instance */
export type ObjectId = number;
/** Name of a view, e.g. "frontal", "dorsal", "lateral" */
export type ViewName = string;
export type LabelName = string;
export type SegmentName = string;

// =============================================================================
// Geometry
// =============================================================================

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Rectangle {
  /** Top-left corner */
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Rectangle for zooming, <rect x y width height/> */
export type ZoomArea = Rectangle;

/** Region of interest in the background image, from the schema viewBox */
export type CropArea = Rectangle;

export function rectangleCenter(rect: Rectangle): Point {
  return {
    x: rect.x + rect.width / 2,
    y: rect.y + rect.height / 2,
  };
}

// =============================================================================
// Shapes
// =============================================================================

/** Arrow heads drawn from marker-start / marker-end */
export type ArrowType = 'none' | 'start' | 'end' | 'both';

interface BaseShape {
  /** The label this shape illustrates */
  readonly label: LabelName;
}

/** Either horizontal or vertical */
export interface LineShape extends BaseShape {
  readonly type: 'line';
  readonly arrow: ArrowType;
  readonly from: Point;
  readonly to: Point;
}

export interface CircleShape extends BaseShape {
  readonly type: 'circle';
  readonly center: Point;
  readonly radius: number;
}

export interface CurvesShape extends BaseShape {
  readonly type: 'curves';
  readonly arrow: ArrowType;
  readonly origin: Point;
  /** The d attribute, kept verbatim */
  readonly moves: string;
}

/** A circled digit placed on the image, the glyph is the label */
export interface NumberShape extends BaseShape {
  readonly type: 'number';
  readonly at: Point;
}

export type Shape = LineShape | CircleShape | CurvesShape | NumberShape;

export function isLineShape(shape: Shape): shape is LineShape {
  return shape.type === 'line';
}

export function isNumberShape(shape: Shape): shape is NumberShape {
  return shape.type === 'number';
}

/**
 * A bracket drawn parallel to a measured feature, with its name as text.
 * Realized with <use> of a <symbol> so that one rotation edits it all.
 */
export interface Segment {
  readonly label: SegmentName;
  readonly rect: Rectangle;
  /** Degrees, 0 when not rotated */
  readonly rotation: number;
}

// =============================================================================
// Schemas
// =============================================================================

/**
 * Base of all annotated images coming from the source instance
 */
export interface SchemaFromImage {
  /** Source instance, not normalized */
  readonly instance: string;
  readonly objectId: ObjectId;
  /** Encoded image, as embedded in the card */
  readonly image: Uint8Array;
  readonly crop: CropArea | null;
}

export interface AnnotatedSchema extends SchemaFromImage {
  readonly shapes: readonly Shape[];
  readonly segments: readonly Segment[];
}

export interface DescriptiveSchema extends AnnotatedSchema {
  readonly zooms: readonly ZoomArea[];
}

export interface ConfusionSchema extends SchemaFromImage {
  /** Arrows pointing at what differs, one per explanation */
  readonly whereConfusing: readonly LineShape[];
  readonly numbers: readonly NumberShape[];
  readonly texts: readonly string[];
}

// =============================================================================
// Card Sections
// =============================================================================

export interface IdentificationCriteria {
  /**
   * Rich text restricted to paragraphs and bullet lists, bold and italics,
   * with no pictographic characters.
   */
  readonly text: string;
}

/** A link to some web explanation, with a plain text comment */
export interface CommentedLink {
  readonly url: string;
  readonly comment: string;
}

export interface ConfusionSide {
  readonly schema: ConfusionSchema;
}

export interface OtherConfusionSide extends ConfusionSide {
  /** The taxon not to confuse with the card's one */
  readonly taxoId: ClassifId;
  readonly instrumentId: InstrumentId;
}

export interface Confusion {
  readonly self: ConfusionSide;
  readonly other: OtherConfusionSide;
}

/**
 * A taxonomic card. The pair (taxoId, instrumentId) identifies it.
 */
export interface Card {
  readonly taxoId: ClassifId;
  readonly instrumentId: InstrumentId;
  readonly identificationCriteria: IdentificationCriteria;
  /** One schema per view, in document order */
  readonly descriptiveSchemas: ReadonlyMap<ViewName, DescriptiveSchema>;
  readonly moreExamples: readonly AnnotatedSchema[];
  readonly photosAndFigures: readonly CommentedLink[];
  readonly confusions: readonly Confusion[];
}
