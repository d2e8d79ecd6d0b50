/**
 * CardReader
 *
 * Reads a taxonomic card from its HTML document and validates it on the way.
 * Problems never stop the read: they become diagnostics and the card is
 * filled with placeholders where a part could not be read.
 */

import { readFile } from 'node:fs/promises';
import type {
  AnnotatedSchema,
  Card,
  CommentedLink,
  Confusion,
  ConfusionSchema,
  DescriptiveSchema,
  IdentificationCriteria,
  OtherConfusionSide,
  ViewName,
} from '../types/card';
import { isLineShape, isNumberShape } from '../types/card';
import type { Diagnostic } from '../types/diagnostics';
import {
  createDiagnosticsStore,
  type DiagnosticsSink,
  type DiagnosticsStore,
} from '../stores/diagnosticsStore';
import {
  ARTICLE_EFFECT_TAGS,
  BODY_ATTRS,
  CONFUSION_OTHER_ATTRS,
  CONFUSION_OTHER_CLASS,
  CONFUSION_PAIR_CLASS,
  CONFUSION_SELF_CLASS,
  DESCRIPTIVE_SCHEMAS_CLASS,
  EXAMPLE_PROPS,
  FORBIDDEN_CHARS,
  LIST_ITEM_TAG,
  MORE_EXAMPLES_CLASS,
  MORPHO_CRITERIA_CLASS,
  OBJECT_ID_PROP,
  OPTIONAL_SECTIONS_ORDER,
  PHOTOS_AND_FIGURES_CLASS,
  PHOTO_LINK_ATTRS,
  POSSIBLE_CONFUSIONS_CLASS,
  TAXOID_PROP,
  TEMPLATES_CLASS,
  TOP_LEVEL_ARTICLE_TAGS,
  VIEW_NAME_PROP,
  VIEW_PROPS,
  type OptionalSectionClass,
} from '../constants/card';
import { classesOf, isElement, isText, parseCardMarkup, parseStrictInt, type MarkupTree } from '../utils/markup-tree';
import {
  checkExactAttributes,
  checkOnlyClassIs,
  checkSingleChild,
  childrenWithTags,
  nonBlankChildren,
} from '../utils/tree-utils';
import { CardSVGReader, type SchemaRegion } from './CardSVGReader';
import { resolveReaderOptions, type CardReaderOptions, type ResolvedReaderOptions } from './options';

// =============================================================================
// Types
// =============================================================================

export interface CardReadResult {
  /** Placeholders are used where errors were found */
  card: Card;
  /** Formatted messages, in traversal order */
  errors: string[];
  diagnostics: Diagnostic[];
}

/**
 * The card file itself could not be read
 */
export class CardFileError extends Error {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Cannot read card file ${path}`, { cause });
    this.name = 'CardFileError';
  }
}

function emptyRegion(): SchemaRegion {
  return { crop: null, image: new Uint8Array(0), shapes: [], segments: [], zooms: [] };
}

// Required slots of <body>, in order
const TEMPLATES_SLOT = 0;
const CRITERIA_SLOT = 1;
const SCHEMAS_SLOT = 2;
const REQUIRED_SLOTS = 3;

// =============================================================================
// CardReader Class
// =============================================================================

export class CardReader {
  private readonly store: DiagnosticsStore;
  private readonly sink: DiagnosticsSink;
  /** Document-level markers and symbols */
  private defs: Element | null = null;

  constructor(
    private readonly tree: MarkupTree,
    private readonly options: ResolvedReaderOptions
  ) {
    this.store = createDiagnosticsStore(tree.locate);
    this.sink = this.store.getState();
  }

  get diagnostics(): Diagnostic[] {
    return this.store.getState().diagnostics;
  }

  get errors(): string[] {
    return this.store.getState().getErrors();
  }

  async read(): Promise<Card> {
    const body = this.tree.body;
    const [taxoId, instrumentId] = this.readMeta(body);

    const children = nonBlankChildren(body);
    if (children.length < REQUIRED_SLOTS) {
      this.sink.record('structural', 'at least %d nodes are expected, found %d', body, REQUIRED_SLOTS, children.length);
    }

    const templates = this.requiredSlot(children[TEMPLATES_SLOT], 'svg', TEMPLATES_CLASS);
    this.defs = templates ? this.readTemplates(templates) : null;

    const article = this.requiredSlot(children[CRITERIA_SLOT], 'article', MORPHO_CRITERIA_CLASS);
    const identificationCriteria = article ? this.readIdentificationCriteria(article) : { text: '' };

    const schemasDiv = this.requiredSlot(children[SCHEMAS_SLOT], 'div', DESCRIPTIVE_SCHEMAS_CLASS);
    const descriptiveSchemas = schemasDiv
      ? await this.readDescriptiveSchemas(schemasDiv)
      : new Map<ViewName, DescriptiveSchema>();

    const sections = this.readOptionalSections(children.slice(REQUIRED_SLOTS));
    const moreExamples = sections.has(MORE_EXAMPLES_CLASS)
      ? await this.readMoreExamples(sections.get(MORE_EXAMPLES_CLASS))
      : [];
    const photosAndFigures = this.readPhotosAndFigures(sections.get(PHOTOS_AND_FIGURES_CLASS));
    const confusions = await this.readConfusions(sections.get(POSSIBLE_CONFUSIONS_CLASS));

    return {
      taxoId,
      instrumentId,
      identificationCriteria,
      descriptiveSchemas,
      moreExamples,
      photosAndFigures,
      confusions,
    };
  }

  // ===========================================================================
  // Document Structure
  // ===========================================================================

  private readMeta(body: Element): [number, string] {
    const values = checkExactAttributes(body, BODY_ATTRS, this.sink);
    if (values === null) {
      return [-1, '?'];
    }
    const [taxoIdStr, instrumentId] = values;
    return [this.readIntProp(body, TAXOID_PROP, taxoIdStr), instrumentId];
  }

  private readIntProp(element: Element, name: string, raw: string): number {
    const value = parseStrictInt(raw);
    if (value === null) {
      this.sink.record('attribute', '%s should be an int, not %s', element, name, raw);
      return -1;
    }
    return value;
  }

  /**
   * A required child of <body>. A class problem is reported but the content
   * is still read; a wrong tag leaves the slot empty.
   */
  private requiredSlot(node: ChildNode | undefined, tag: string, expectedClass: string): Element | null {
    if (node === undefined) return null;
    if (!isElement(node) || node.localName !== tag) {
      this.sink.record('structural', 'should be a <%s class="%s">', node, tag, expectedClass);
      return null;
    }
    checkOnlyClassIs(node, expectedClass, this.sink);
    return node;
  }

  private readTemplates(templates: Element): Element | null {
    const children = nonBlankChildren(templates);
    const defs = children[0];
    if (children.length !== 1 || defs === undefined || !isElement(defs) || defs.localName !== 'defs') {
      this.sink.record('structural', 'template <svg> should contain a single <defs>, found %d node(s)', templates, children.length);
      return null;
    }
    return defs;
  }

  /**
   * Pick the optional single-class <div> in their only valid order.
   * Out of order or unknown sections are reported and ignored.
   */
  private readOptionalSections(nodes: readonly ChildNode[]): Map<OptionalSectionClass, Element> {
    const ret = new Map<OptionalSectionClass, Element>();
    let remaining: readonly OptionalSectionClass[] = OPTIONAL_SECTIONS_ORDER;
    for (const node of nodes) {
      if (!isElement(node) || node.localName !== 'div') {
        this.sink.record('structural', 'only <div> sections are allowed here, one of %s', node, remaining);
        continue;
      }
      if (checkExactAttributes(node, ['class'], this.sink) === null) {
        continue;
      }
      const classes = classesOf(node);
      if (classes.length !== 1) {
        this.sink.record('attribute', 'there should be a single class, not %d', node, classes.length);
        continue;
      }
      const position = remaining.findIndex((c) => c === classes[0]);
      if (position < 0) {
        this.sink.record('structural', 'class %s is unexpected here, should be one of %s', node, classes[0], remaining);
        continue;
      }
      ret.set(remaining[position], node);
      remaining = remaining.slice(position + 1);
    }
    return ret;
  }

  // ===========================================================================
  // Identification Criteria
  // ===========================================================================

  private readIdentificationCriteria(article: Element): IdentificationCriteria {
    for (const child of childrenWithTags(article, TOP_LEVEL_ARTICLE_TAGS, this.sink)) {
      if (child.localName === 'p') {
        this.checkParagraph(child);
      } else {
        this.checkList(child);
      }
    }
    return { text: article.textContent ?? '' };
  }

  /**
   * Text with optional bold and italics, no pictographic characters
   */
  private checkParagraph(element: Element): void {
    for (const child of nonBlankChildren(element)) {
      if (isText(child)) {
        this.checkNoExoticChar(child);
      } else if (isElement(child)) {
        if (!ARTICLE_EFFECT_TAGS.some((t) => t === child.localName)) {
          this.sink.record('structural', 'unexpected content, not any of %s', child, ARTICLE_EFFECT_TAGS);
          continue;
        }
        this.checkParagraph(child);
      } else {
        this.sink.record('structural', 'unexpected content, not a tag or a string', child);
      }
    }
  }

  private checkList(list: Element): void {
    const items = childrenWithTags(list, [LIST_ITEM_TAG], this.sink);
    items.forEach((item) => this.checkParagraph(item));
    if (items.length === 0) {
      this.sink.record('structural', 'empty list', list);
    }
  }

  private checkNoExoticChar(text: Text): void {
    const badOnes = Array.from(text.data).filter((c) => FORBIDDEN_CHARS.test(c));
    if (badOnes.length > 0) {
      this.sink.record('content', 'forbidden chars: %s', text, badOnes);
    }
  }

  // ===========================================================================
  // Schemas
  // ===========================================================================

  private async readDescriptiveSchemas(around: Element): Promise<Map<ViewName, DescriptiveSchema>> {
    const ret = new Map<ViewName, DescriptiveSchema>();
    const viewNames = new Set<ViewName>();
    const divs = childrenWithTags(around, ['div'], this.sink);
    if (divs.length === 0) {
      this.sink.record('structural', 'at least one descriptive schema is expected', around);
    }
    for (const div of divs) {
      const values = checkExactAttributes(div, VIEW_PROPS, this.sink);
      if (values === null) continue;
      const [viewName, instance, objectIdStr] = values;
      const objectId = this.readIntProp(div, OBJECT_ID_PROP, objectIdStr);
      if (viewNames.has(viewName)) {
        this.sink.record('structural', "view name '%s' was already used", div, viewName);
      }
      viewNames.add(viewName);

      const region = await this.readRegion(div);
      // A repeated view replaces the previous one
      ret.set(viewName, {
        instance,
        objectId,
        image: region.image,
        crop: region.crop,
        shapes: region.shapes,
        segments: region.segments,
        zooms: region.zooms,
      });
    }
    return ret;
  }

  private async readMoreExamples(around: Element | undefined): Promise<AnnotatedSchema[]> {
    if (around === undefined) return [];
    const ret: AnnotatedSchema[] = [];
    for (const div of childrenWithTags(around, ['div'], this.sink)) {
      const schema = await this.readAnnotatedSchema(div);
      if (schema !== null) {
        ret.push(schema);
      }
    }
    return ret;
  }

  /**
   * A <div data-instance data-object-id> around a single schema <svg>.
   * Confusion sides may also name their view, as descriptive schemas do.
   */
  private async readAnnotatedSchema(
    div: Element,
    props: readonly string[] = EXAMPLE_PROPS
  ): Promise<AnnotatedSchema | null> {
    const values = checkExactAttributes(div, props, this.sink);
    if (values === null) return null;
    const [instance, objectIdStr] = values.slice(-EXAMPLE_PROPS.length);
    const objectId = this.readIntProp(div, OBJECT_ID_PROP, objectIdStr);
    const region = await this.readRegion(div);
    return {
      instance,
      objectId,
      image: region.image,
      crop: region.crop,
      shapes: region.shapes,
      segments: region.segments,
    };
  }

  private async readRegion(div: Element): Promise<SchemaRegion> {
    const svg = checkSingleChild(div, 'svg', this.sink);
    if (svg === null) {
      return emptyRegion();
    }
    return new CardSVGReader(svg, this.defs, this.sink, this.options).read();
  }

  // ===========================================================================
  // Photos and Figures
  // ===========================================================================

  private readPhotosAndFigures(around: Element | undefined): CommentedLink[] {
    if (around === undefined) return [];
    const ret: CommentedLink[] = [];
    for (const link of childrenWithTags(around, ['a'], this.sink)) {
      const values = checkExactAttributes(link, PHOTO_LINK_ATTRS, this.sink);
      if (values === null) continue;
      this.checkParagraph(link);
      ret.push({ url: values[0], comment: (link.textContent ?? '').trim() });
    }
    return ret;
  }

  // ===========================================================================
  // Confusions
  // ===========================================================================

  private async readConfusions(around: Element | undefined): Promise<Confusion[]> {
    if (around === undefined) return [];
    const ret: Confusion[] = [];
    for (const pair of childrenWithTags(around, ['div'], this.sink)) {
      const confusion = await this.readConfusionPair(pair);
      if (confusion !== null) {
        ret.push(confusion);
      }
    }
    return ret;
  }

  private async readConfusionPair(pair: Element): Promise<Confusion | null> {
    checkOnlyClassIs(pair, CONFUSION_PAIR_CLASS, this.sink);
    const children = nonBlankChildren(pair);
    if (children.length !== 2) {
      this.sink.record('structural', 'a confusion pair should hold 2 <div>, found %d node(s)', pair, children.length);
    }
    const [selfNode, otherNode] = children;

    let selfDiv: Element | null = null;
    if (selfNode !== undefined) {
      if (isElement(selfNode) && selfNode.localName === 'div') {
        checkOnlyClassIs(selfNode, CONFUSION_SELF_CLASS, this.sink);
        selfDiv = selfNode;
      } else {
        this.sink.record('structural', 'should be a <div class="%s">', selfNode, CONFUSION_SELF_CLASS);
      }
    }

    let other: Omit<OtherConfusionSide, 'schema'> | null = null;
    let otherDiv: Element | null = null;
    if (otherNode !== undefined) {
      if (isElement(otherNode) && otherNode.localName === 'div') {
        otherDiv = otherNode;
        other = this.readOtherIdentity(otherNode);
      } else {
        this.sink.record('structural', 'should be a <div class="%s">', otherNode, CONFUSION_OTHER_CLASS);
      }
    }

    if (selfDiv === null || otherDiv === null) {
      return null;
    }
    const selfSchema = await this.readConfusionSide(selfDiv);
    const otherSchema = await this.readConfusionSide(otherDiv);
    return {
      self: { schema: selfSchema },
      other: { taxoId: other?.taxoId ?? -1, instrumentId: other?.instrumentId ?? '?', schema: otherSchema },
    };
  }

  private readOtherIdentity(div: Element): Omit<OtherConfusionSide, 'schema'> | null {
    const values = checkExactAttributes(div, CONFUSION_OTHER_ATTRS, this.sink);
    if (values === null) return null;
    const [cls, taxoIdStr, instrumentId] = values;
    if (cls !== CONFUSION_OTHER_CLASS) {
      this.sink.record('attribute', 'class should be %s, not %s', div, CONFUSION_OTHER_CLASS, cls);
    }
    return { taxoId: this.readIntProp(div, TAXOID_PROP, taxoIdStr), instrumentId };
  }

  /**
   * A schema <div> then an <ol>, one <li> per arrow of the schema
   */
  private async readConfusionSide(side: Element): Promise<ConfusionSchema> {
    const children = nonBlankChildren(side);
    if (children.length !== 2) {
      this.sink.record('structural', 'should hold a schema <div> then an <ol>, found %d node(s)', side, children.length);
    }
    const [schemaNode, listNode] = children;

    let schema: AnnotatedSchema | null = null;
    if (schemaNode !== undefined) {
      if (isElement(schemaNode) && schemaNode.localName === 'div') {
        const props = schemaNode.hasAttribute(VIEW_NAME_PROP) ? VIEW_PROPS : EXAMPLE_PROPS;
        schema = await this.readAnnotatedSchema(schemaNode, props);
      } else {
        this.sink.record('structural', 'should be a schema <div>', schemaNode);
      }
    }

    let texts: string[] | null = null;
    if (listNode !== undefined) {
      if (isElement(listNode) && listNode.localName === 'ol') {
        texts = childrenWithTags(listNode, [LIST_ITEM_TAG], this.sink).map((item) => {
          this.checkParagraph(item);
          return (item.textContent ?? '').trim();
        });
      } else {
        this.sink.record('structural', 'should be an <ol>', listNode);
      }
    }

    const shapes = schema?.shapes ?? [];
    const whereConfusing = shapes.filter(isLineShape);
    if (schema !== null && texts !== null && whereConfusing.length !== texts.length) {
      this.sink.record(
        'consistency',
        '%d arrow(s) in schema but %d explanation(s)',
        side,
        whereConfusing.length,
        texts.length
      );
    }

    return {
      instance: schema?.instance ?? '',
      objectId: schema?.objectId ?? -1,
      image: schema?.image ?? new Uint8Array(0),
      crop: schema?.crop ?? null,
      whereConfusing,
      numbers: shapes.filter(isNumberShape),
      texts: texts ?? [],
    };
  }
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Read and validate a card held in memory
 */
export async function readCardMarkup(html: string, options: CardReaderOptions = {}): Promise<CardReadResult> {
  const resolved = resolveReaderOptions(options);
  const reader = new CardReader(parseCardMarkup(html), resolved);
  const card = await reader.read();
  if (resolved.verbose) {
    console.log(`[CardReader] Read card ${card.taxoId}/${card.instrumentId}: ${reader.diagnostics.length} diagnostic(s)`);
  }
  return { card, errors: reader.errors, diagnostics: reader.diagnostics };
}

/**
 * Read and validate a card file. Rejects with CardFileError only when the
 * file cannot be read.
 */
export async function readCard(path: string, options: CardReaderOptions = {}): Promise<CardReadResult> {
  let html: string;
  try {
    html = await readFile(path, 'utf-8');
  } catch (error) {
    throw new CardFileError(path, error);
  }
  if (options.verbose) {
    console.log(`[CardReader] Loaded ${path} (${html.length} chars)`);
  }
  return readCardMarkup(html, options);
}
