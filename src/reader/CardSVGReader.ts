/**
 * CardSVGReader
 *
 * Reads and validates one schema <svg>: crop, background image, shapes,
 * segments and zoom areas. Every check reports and carries on with a
 * placeholder so that the rest of the region is still validated.
 */

import type {
  ArrowType,
  CircleShape,
  CropArea,
  CurvesShape,
  LineShape,
  NumberShape,
  Point,
  Rectangle,
  Segment,
  Shape,
  ZoomArea,
} from '../types/card';
import { rectangleCenter } from '../types/card';
import type { DiagnosticsSink } from '../stores/diagnosticsStore';
import type { ResolvedReaderOptions } from './options';
import {
  DEFAULT_CROP,
  DEFAULT_LABEL,
  IMAGE_SVG_CLASS,
  LABEL_PROP,
  MANDATORY_ATTRS_IN_CIRCLE,
  MANDATORY_ATTRS_IN_CURVES,
  MANDATORY_ATTRS_IN_IMAGE,
  MANDATORY_ATTRS_IN_IMAGE_SVG,
  MANDATORY_ATTRS_IN_LINE,
  MANDATORY_ATTRS_IN_NUMBER,
  MANDATORY_ATTRS_IN_SEGMENT,
  MANDATORY_ATTRS_IN_ZOOM,
  MARKER_SUFFIX,
  NUMBER_GLYPHS,
  OPTIONAL_ATTRS_IN_ARROWABLE,
  OPTIONAL_ATTRS_IN_IMAGE,
  OPTIONAL_ATTRS_IN_IMAGE_SVG,
  OPTIONAL_ATTRS_IN_SEGMENT,
  SCHEMA_SVG_ATTRS,
  SEGMENT_SUFFIX,
  SHAPES_GROUP_CLASS,
  SHAPE_GROUP_TAGS,
  SKIPPED_SHAPE_TAGS,
  XLINK_HREF,
  ZOOMS_GROUP_CLASS,
} from '../constants/card';
import { isElement, parseNumeric, parseStrictInt } from '../utils/markup-tree';
import {
  checkAttributes,
  checkExactAttributes,
  checkOnlyClassIs,
  nonBlankChildren,
} from '../utils/tree-utils';
import {
  buildIdIndex,
  decomposePath,
  isAxisAligned,
  isRelativeCommand,
  parseReference,
  parseViewBox,
  resolveUse,
  type IdIndex,
} from '../utils/svg-geometry';
import { parseTransformList, resolvePoint } from '../utils/transform-utils';
import { decodeDataUri, decodeImage } from '../utils/image-decoder';

// =============================================================================
// Types
// =============================================================================

/**
 * Everything extracted from one schema <svg>
 */
export interface SchemaRegion {
  crop: CropArea | null;
  /** Embedded image bytes, empty when it could not be read */
  image: Uint8Array;
  shapes: Shape[];
  segments: Segment[];
  zooms: ZoomArea[];
}

interface SchemaGroups {
  shapes: Element | null;
  zooms: Element | null;
}

interface BackgroundImage {
  bytes: Uint8Array;
  /** Pixel height, 0 when the image could not be decoded */
  height: number;
}

function noImage(): BackgroundImage {
  return { bytes: new Uint8Array(0), height: 0 };
}

// =============================================================================
// CardSVGReader Class
// =============================================================================

export class CardSVGReader {
  /** Markers and symbols from the templates, then ids of this region */
  private readonly ids: IdIndex;

  constructor(
    private readonly svg: Element,
    defs: Element | null,
    private readonly sink: DiagnosticsSink,
    private readonly options: ResolvedReaderOptions
  ) {
    this.ids = buildIdIndex(defs ? [defs, svg] : [svg]);
  }

  /**
   * Run all checks in order and return what could be extracted
   */
  async read(): Promise<SchemaRegion> {
    const crop = this.readCrop();
    if (crop === DEFAULT_CROP) {
      // The region root itself is wrong, nothing below can be trusted
      return { crop, image: new Uint8Array(0), shapes: [], segments: [], zooms: [] };
    }

    const fontSize = this.readFontSize();
    const groups = this.readGroups();

    let image = noImage();
    let shapes: Shape[] = [];
    let segments: Segment[] = [];
    if (groups.shapes) {
      image = await this.readImage(groups.shapes, crop);
      const index = this.indexShapes(groups.shapes);
      this.checkFontSize(fontSize, image.height);
      shapes = this.readShapes(index);
      segments = this.readSegments(index);
    }

    const zooms = groups.zooms ? this.readZooms(groups.zooms) : [];

    return { crop, image: image.bytes, shapes, segments, zooms };
  }

  // ===========================================================================
  // Region Root
  // ===========================================================================

  /**
   * The crop area is the viewBox of the top <svg>. DEFAULT_CROP is returned
   * when the <svg> attributes are wrong.
   */
  readCrop(): CropArea | null {
    const values = checkExactAttributes(this.svg, SCHEMA_SVG_ATTRS, this.sink);
    if (values === null) {
      return DEFAULT_CROP;
    }
    const viewBoxAttr = this.svg.getAttribute('viewBox');
    const viewBox = parseViewBox(viewBoxAttr);
    if (viewBox === null) {
      this.sink.record('content', 'viewBox should be 4 numbers, not "%s"', this.svg, viewBoxAttr);
    }
    return viewBox;
  }

  /**
   * Declared font size, 0 if not an integer
   */
  readFontSize(): number {
    return parseStrictInt(this.svg.getAttribute('font-size')) ?? 0;
  }

  /**
   * One <g class="shapes">, optionally followed by one <g class="zooms">
   */
  readGroups(): SchemaGroups {
    for (const defs of Array.from(this.svg.getElementsByTagName('defs'))) {
      this.sink.record('structural', '<defs> should be grouped in the document-level templates <svg>', defs);
    }

    const children = nonBlankChildren(this.svg);
    if (children.length < 1 || children.length > 2) {
      this.sink.record('structural', 'should contain 1 or 2 <g>, not %d node(s)', this.svg, children.length);
    }
    const [first, second] = children;
    return {
      shapes: first !== undefined ? this.checkGroup(first, SHAPES_GROUP_CLASS) : null,
      zooms: second !== undefined ? this.checkGroup(second, ZOOMS_GROUP_CLASS) : null,
    };
  }

  private checkGroup(node: ChildNode, expectedClass: string): Element | null {
    if (!isElement(node) || node.localName !== 'g') {
      this.sink.record('structural', 'should be a <g class="%s">', node, expectedClass);
      return null;
    }
    return checkOnlyClassIs(node, expectedClass, this.sink) ? node : null;
  }

  // ===========================================================================
  // Background Image
  // ===========================================================================

  /**
   * The <svg class="background"><image/></svg> in the shapes group. Its
   * dimensions are the base of the coordinates system, so they must agree
   * with the decoded image, the crop and the enclosing <svg>.
   */
  async readImage(shapesGroup: Element, crop: CropArea | null): Promise<BackgroundImage> {
    const svgs = nonBlankChildren(shapesGroup)
      .filter(isElement)
      .filter((child) => child.localName === 'svg');
    if (svgs.length !== 1) {
      this.sink.record('structural', 'one image <svg> is expected, found %d', shapesGroup, svgs.length);
      return noImage();
    }
    const imageSvg = svgs[0];
    checkAttributes(imageSvg, MANDATORY_ATTRS_IN_IMAGE_SVG, this.sink, OPTIONAL_ATTRS_IN_IMAGE_SVG);
    const svgClass = imageSvg.getAttribute('class');
    if (svgClass !== null && svgClass !== IMAGE_SVG_CLASS) {
      this.sink.record('attribute', 'class should be %s, not %s', imageSvg, IMAGE_SVG_CLASS, svgClass);
    }

    const inside = nonBlankChildren(imageSvg);
    const image = inside.length === 1 ? inside[0] : undefined;
    if (image === undefined || !isElement(image) || image.localName !== 'image') {
      this.sink.record('structural', 'exactly one <image> is expected, found %d node(s)', imageSvg, inside.length);
      return noImage();
    }
    checkAttributes(image, MANDATORY_ATTRS_IN_IMAGE, this.sink, OPTIONAL_ATTRS_IN_IMAGE);
    const href = image.getAttribute(XLINK_HREF);
    if (href === null) {
      return noImage();
    }
    const bytes = decodeDataUri(href);
    if (bytes === null) {
      this.sink.record('content', 'image should be embedded as a base64 data: URI', image);
      return noImage();
    }

    let width: number;
    let height: number;
    try {
      ({ width, height } = await decodeImage(bytes));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.sink.record('consistency', 'image could not be decoded: %s', image, message);
      return { bytes, height: 0 };
    }

    // Validations
    const declaredWidth = this.readNumber(image, 'width') ?? width;
    const declaredHeight = this.readNumber(image, 'height') ?? height;
    if (declaredWidth !== width || declaredHeight !== height) {
      this.sink.record(
        'consistency',
        'size differs b/w <image> (%s, %s) and physical image (%s, %s)',
        image,
        declaredWidth,
        declaredHeight,
        width,
        height
      );
    }
    const x = this.readNumber(image, 'x') ?? 0;
    const y = this.readNumber(image, 'y') ?? 0;
    if (x !== 0 || y !== 0) {
      this.sink.record('consistency', 'image is not at (0,0) but at (%s, %s)', image, x, y);
    }
    if (this.isRotated(image)) {
      this.sink.record('consistency', 'image is rotated', image);
    }

    // A crop offset enlarges the enclosing <svg> so the whole image stays reachable
    const offsetX = crop?.x ?? 0;
    const offsetY = crop?.y ?? 0;
    const expectedWidth = width + offsetX;
    const expectedHeight = height + offsetY;
    const svgWidth = this.readNumber(imageSvg, 'width');
    const svgHeight = this.readNumber(imageSvg, 'height');
    if (svgWidth !== undefined && svgHeight !== undefined) {
      if (svgWidth !== expectedWidth || svgHeight !== expectedHeight) {
        const why = offsetX !== 0 || offsetY !== 0 ? 'image size plus crop offset' : 'image size';
        this.sink.record(
          'consistency',
          'size of image <svg> (%s, %s) should be %s (%s, %s)',
          imageSvg,
          svgWidth,
          svgHeight,
          why,
          expectedWidth,
          expectedHeight
        );
      }
    }
    if (crop !== null && (crop.width > width || crop.height > height)) {
      this.sink.record(
        'consistency',
        'crop %sx%s is larger than image %sx%s',
        this.svg,
        crop.width,
        crop.height,
        width,
        height
      );
    }

    return { bytes, height };
  }

  private isRotated(element: Element): boolean {
    const transform = element.getAttribute('transform');
    if (transform === null) return false;
    const ops = parseTransformList(transform);
    if (ops === null) {
      this.sink.record('content', 'unreadable transform "%s"', element, transform);
      return false;
    }
    return ops.some((op) => op.kind === 'rotate' && (op.values[0] ?? 0) % 360 !== 0);
  }

  /**
   * font-size is proportional to the image height, so that labels keep
   * the same visual size whatever the image
   */
  checkFontSize(fontSize: number, imageHeight: number): void {
    if (imageHeight <= 0) return;
    const expected = Math.round(imageHeight / this.options.fontSizeRatio);
    if (fontSize !== expected) {
      this.sink.record(
        'consistency',
        'font-size should be %d for an image %d pixels high, not %d',
        this.svg,
        expected,
        imageHeight,
        fontSize
      );
    }
  }

  // ===========================================================================
  // Shapes
  // ===========================================================================

  /**
   * Index the children of the shapes group by id, in document order.
   * Offending children are reported and left out.
   */
  indexShapes(shapesGroup: Element): Map<string, Element> {
    const ret = new Map<string, Element>();
    for (const child of nonBlankChildren(shapesGroup)) {
      if (!isElement(child)) {
        this.sink.record('structural', 'free text is not allowed among shapes', child);
        continue;
      }
      const tag = child.localName;
      if (SKIPPED_SHAPE_TAGS.some((t) => t === tag)) {
        continue;
      }
      if (!SHAPE_GROUP_TAGS.some((t) => t === tag)) {
        this.sink.record('structural', 'unexpected tag, should be one of %s', child, SHAPE_GROUP_TAGS);
        continue;
      }
      const id = child.getAttribute('id');
      if (!id) {
        this.sink.record('attribute', 'id= is missing', child);
      } else if (ret.has(id)) {
        this.sink.record('structural', 'duplicate id %s', child, id);
      } else {
        ret.set(id, child);
      }
    }
    return ret;
  }

  /**
   * Read the drawn shapes, keeping their document order
   */
  readShapes(index: ReadonlyMap<string, Element>): Shape[] {
    const ret: Shape[] = [];
    for (const element of index.values()) {
      switch (element.localName) {
        case 'line':
          ret.push(this.readLine(element));
          break;
        case 'circle':
          ret.push(this.readCircle(element));
          break;
        case 'path':
          ret.push(this.readCurves(element));
          break;
        case 'text':
          ret.push(this.readNumberShape(element));
          break;
        // <svg> is the background, <use> are segments
      }
    }
    return ret;
  }

  private readLine(element: Element): LineShape {
    checkAttributes(element, MANDATORY_ATTRS_IN_LINE, this.sink, OPTIONAL_ATTRS_IN_ARROWABLE);
    const label = this.readLabel(element);
    const arrow = this.readArrow(element, label);
    // Take the _computed_ coords, a line could lean through some transform
    const from = this.readPoint(element, 'x1', 'y1');
    const to = this.readPoint(element, 'x2', 'y2');
    if (!isAxisAligned(from, to)) {
      this.sink.record('content', '<line> is not horizontal nor vertical: #%s', element, element.id);
    }
    return { type: 'line', label, arrow, from, to };
  }

  private readCircle(element: Element): CircleShape {
    checkAttributes(element, MANDATORY_ATTRS_IN_CIRCLE, this.sink);
    const label = this.readLabel(element);
    const center = this.readPoint(element, 'cx', 'cy');
    const radius = this.readNumber(element, 'r') ?? 0;
    return { type: 'circle', label, center, radius };
  }

  private readCurves(element: Element): CurvesShape {
    checkAttributes(element, MANDATORY_ATTRS_IN_CURVES, this.sink, OPTIONAL_ATTRS_IN_ARROWABLE);
    const label = this.readLabel(element);
    const arrow = this.readArrow(element, label);
    const moves = element.getAttribute('d') ?? '';
    const id = element.id;

    let origin: Point = { x: 0, y: 0 };
    const path = moves ? decomposePath(moves) : null;
    if (moves && path === null) {
      this.sink.record('content', 'in #%s, path data is not readable', element, id);
    }
    if (path !== null) {
      origin = resolvePoint(element, this.svg, path.origin);
      for (const cmd of path.commands) {
        switch (cmd.code.toLowerCase()) {
          case 'l':
          case 'h':
          case 'v':
            this.sink.record('content', 'in #%s, curve contains a straight line (l, h or v): %s', element, id, cmd.code);
            break;
          case 'z':
            this.sink.record('content', 'in #%s, curve is closed', element, id);
            break;
          case 'm':
            this.sink.record('content', 'in #%s, curve is not continuous', element, id);
            break;
          case 'a':
            this.sink.record('content', 'in #%s, curve contains an arc', element, id);
            break;
        }
        // Closing has no coordinates, the parser gives 'Z' for both cases
        if (cmd.code !== 'Z' && !isRelativeCommand(cmd)) {
          this.sink.record('content', 'in #%s, curve contains absolute: %s', element, id, cmd.code);
        }
      }
      if (path.commands.length > this.options.maxPartsInCurve) {
        this.sink.record(
          'content',
          'in #%s, curve has too many parts: %d, max is %d',
          element,
          id,
          path.commands.length,
          this.options.maxPartsInCurve
        );
      }
    }

    return { type: 'curves', label, arrow, origin, moves };
  }

  private readNumberShape(element: Element): NumberShape {
    checkAttributes(element, MANDATORY_ATTRS_IN_NUMBER, this.sink);
    const glyph = (element.textContent ?? '').trim();
    if (!NUMBER_GLYPHS.includes(glyph)) {
      this.sink.record('content', 'number should be one of %s, not "%s"', element, NUMBER_GLYPHS, glyph);
    }
    const at = this.readPoint(element, 'x', 'y');
    return { type: 'number', label: glyph, at };
  }

  private readLabel(element: Element): string {
    return element.getAttribute(LABEL_PROP) ?? DEFAULT_LABEL;
  }

  /**
   * Build the arrow type from the markers
   */
  private readArrow(element: Element, label: string): ArrowType {
    let ret: ArrowType = 'none';
    const startMarker = element.getAttribute('marker-start');
    if (startMarker) {
      ret = 'start';
      this.checkMarker(element, label, startMarker);
    }
    const endMarker = element.getAttribute('marker-end');
    if (endMarker) {
      ret = ret === 'none' ? 'end' : 'both';
      this.checkMarker(element, label, endMarker);
    }
    return ret;
  }

  /**
   * The marker must exist and be the one drawn in the label color
   */
  private checkMarker(element: Element, label: string, marker: string): void {
    const ref = parseReference(marker);
    const markerDef = ref !== null ? this.ids.get(ref) : undefined;
    if (ref === null || markerDef === undefined) {
      this.sink.record('reference', "marker ref '%s' is invalid", element, marker);
      return;
    }
    if (markerDef.localName !== 'marker') {
      this.sink.record('reference', "'%s' is a <%s>, not a <marker>", element, ref, markerDef.localName);
      return;
    }
    const expected = label + MARKER_SUFFIX;
    if (ref !== expected) {
      this.sink.record('reference', "marker '%s' should be '%s', i.e. data-label + '%s'", element, ref, expected, MARKER_SUFFIX);
    }
  }

  // ===========================================================================
  // Segments
  // ===========================================================================

  /**
   * Read the segments, i.e. the <use> of a "<label>_segment" symbol
   */
  readSegments(index: ReadonlyMap<string, Element>): Segment[] {
    const ret: Segment[] = [];
    for (const element of index.values()) {
      if (element.localName === 'use') {
        ret.push(this.readSegment(element));
      }
    }
    return ret;
  }

  private readSegment(element: Element): Segment {
    checkAttributes(element, MANDATORY_ATTRS_IN_SEGMENT, this.sink, OPTIONAL_ATTRS_IN_SEGMENT);
    const id = element.id;
    const resolved = resolveUse(element, this.ids);

    let label = DEFAULT_LABEL;
    if (element.hasAttribute(XLINK_HREF)) {
      if (resolved.target === null) {
        this.sink.record('reference', 'segment #%s: reference %s cannot be resolved', element, id, element.getAttribute(XLINK_HREF));
      } else if (resolved.symbol === null) {
        this.sink.record('reference', 'segment #%s: %s is a <%s>, not a <symbol>', element, id, resolved.ref, resolved.target.localName);
      } else {
        if (resolved.expansion === null || resolved.expansion.localName !== 'g') {
          this.sink.record('reference', 'segment #%s: symbol %s should expand to a <g>', element, id, resolved.ref);
        }
        const symbolId = resolved.symbol.id;
        if (symbolId.endsWith(SEGMENT_SUFFIX) && symbolId.length > SEGMENT_SUFFIX.length) {
          label = symbolId.slice(0, -SEGMENT_SUFFIX.length);
        } else {
          this.sink.record('reference', "segment #%s: symbol %s does not end with '%s'", element, id, symbolId, SEGMENT_SUFFIX);
        }
      }
    }

    // Coords come from the markup, <use> resolution does not carry them
    const rect = this.readRectangle(element);
    const rotation = this.readRotation(element, rect);
    return { label, rect, rotation };
  }

  /**
   * At most one rotate(angle, cx, cy), around the rectangle center.
   * A zero angle needs no center.
   */
  private readRotation(element: Element, rect: Rectangle): number {
    const transform = element.getAttribute('transform');
    if (transform === null) return 0;
    const id = element.id;

    const ops = parseTransformList(transform);
    if (ops === null) {
      this.sink.record('content', 'in #%s, unreadable transform "%s"', element, id, transform);
      return 0;
    }
    for (const op of ops) {
      if (op.kind !== 'rotate') {
        this.sink.record('content', 'in #%s, transform %s is not allowed, only rotate', element, id, op.kind);
      }
    }
    const rotates = ops.filter((op) => op.kind === 'rotate');
    if (rotates.length === 0) return 0;
    if (rotates.length > 1) {
      this.sink.record('content', 'in #%s, only one rotate is allowed, found %d', element, id, rotates.length);
    }

    const values = rotates[0].values;
    const [angle, centerX, centerY] = values;
    if (angle === undefined) {
      this.sink.record('content', 'in #%s, rotate needs an angle and a center', element, id);
      return 0;
    }
    if (!this.options.segmentRotationAngles.includes(angle)) {
      this.sink.record(
        'content',
        'in #%s rotate, angle should be one of %s, not %s',
        element,
        id,
        this.options.segmentRotationAngles,
        angle
      );
    }
    if (angle !== 0) {
      const expected = rectangleCenter(rect);
      if (centerX === undefined || centerY === undefined || values.length !== 3) {
        this.sink.record('content', 'in #%s, rotate needs an angle and a center', element, id);
      } else if (expected.x !== centerX || expected.y !== centerY) {
        this.sink.record(
          'content',
          'in #%s rotate, center should be (%s, %s) not (%s, %s)',
          element,
          id,
          expected.x,
          expected.y,
          centerX,
          centerY
        );
      }
    }
    return angle;
  }

  // ===========================================================================
  // Zooms
  // ===========================================================================

  readZooms(zoomsGroup: Element): ZoomArea[] {
    const ret: ZoomArea[] = [];
    for (const child of nonBlankChildren(zoomsGroup)) {
      if (!isElement(child) || child.localName !== 'rect') {
        this.sink.record('structural', 'zoom areas should be <rect>', child);
        continue;
      }
      checkAttributes(child, MANDATORY_ATTRS_IN_ZOOM, this.sink);
      ret.push(this.readRectangle(child));
    }
    return ret;
  }

  // ===========================================================================
  // Attribute Values
  // ===========================================================================

  /**
   * Numeric attribute. Undefined if absent (reported by the attribute checks),
   * reported here if present but not a number.
   */
  private readNumber(element: Element, name: string): number | undefined {
    const raw = element.getAttribute(name);
    if (raw === null) return undefined;
    const value = parseNumeric(raw);
    if (value === undefined) {
      this.sink.record('attribute', '%s should be a number, not "%s"', element, name, raw);
    }
    return value;
  }

  private readPoint(element: Element, xName: string, yName: string): Point {
    const point = {
      x: this.readNumber(element, xName) ?? 0,
      y: this.readNumber(element, yName) ?? 0,
    };
    return resolvePoint(element, this.svg, point);
  }

  private readRectangle(element: Element): Rectangle {
    return {
      x: this.readNumber(element, 'x') ?? 0,
      y: this.readNumber(element, 'y') ?? 0,
      width: this.readNumber(element, 'width') ?? 0,
      height: this.readNumber(element, 'height') ?? 0,
    };
  }
}
