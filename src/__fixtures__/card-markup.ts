/**
 * Card documents for tests, built from small pieces so that each test
 * only spells out the part it breaks.
 */

import sharp from 'sharp';

export const IMAGE_WIDTH = 720;
export const IMAGE_HEIGHT = 360;
/** round(IMAGE_HEIGHT / 36) */
export const FONT_SIZE = 10;

/**
 * A plain white PNG, as a data: URI
 */
export async function makePngDataUri(width = IMAGE_WIDTH, height = IMAGE_HEIGHT): Promise<string> {
  const png = await sharp({
    create: { width, height, channels: 3, background: '#ffffff' },
  })
    .png()
    .toBuffer();
  return `data:image/png;base64,${png.toString('base64')}`;
}

// =============================================================================
// Schemas
// =============================================================================

export const DEFAULT_DEFS = `
  <marker id="antenna_triangle" viewBox="0 0 10 10" refX="5" refY="5" markerWidth="6" markerHeight="6" orient="auto">
    <path d="M 0 0 L 10 5 L 0 10 z"/>
  </marker>
  <symbol id="body_segment">
    <g><line x1="0" y1="0" x2="10" y2="0"/></g>
  </symbol>`;

export const DEFAULT_SHAPES = `
    <line id="l1" data-label="antenna" x1="10" y1="20" x2="110" y2="20" marker-end="url(#antenna_triangle)"/>
    <circle id="c1" data-label="eye" r="5" cx="50" cy="60"/>
    <path id="p1" data-label="leg" d="M 100 100 c 10 10 20 10 30 0 q 5 -5 10 0"/>
    <text id="n1" x="200" y="200">①</text>
    <use id="s1" x="300" y="100" width="40" height="20" xlink:href="#body_segment"/>`;

export const DEFAULT_ZOOMS = `<rect id="z1" x="0" y="0" width="100" height="50"/>`;

export interface SchemaParts {
  imageHref: string;
  viewBox?: string;
  fontSize?: string;
  /** Replaces the whole set of top <svg> attributes */
  svgAttrs?: string;
  /** Attributes of the background <svg> */
  backgroundAttrs?: string;
  /** Attributes of the <image>, besides xlink:href */
  imageAttrs?: string;
  /** Markup placed after the background <svg> in the shapes group */
  shapes?: string;
  /** Content of the zooms group, null for no group */
  zooms?: string | null;
}

export function schemaSvg(parts: SchemaParts): string {
  const viewBox = parts.viewBox ?? `0 0 ${IMAGE_WIDTH} ${IMAGE_HEIGHT}`;
  const fontSize = parts.fontSize ?? String(FONT_SIZE);
  const svgAttrs =
    parts.svgAttrs ??
    `xmlns="http://www.w3.org/2000/svg" viewBox="${viewBox}" font-size="${fontSize}" ` +
      `xmlns:xlink="http://www.w3.org/1999/xlink" version="1.1" baseProfile="full"`;
  const backgroundAttrs =
    parts.backgroundAttrs ?? `class="background" id="bg" width="${IMAGE_WIDTH}" height="${IMAGE_HEIGHT}"`;
  const imageAttrs = parts.imageAttrs ? ` ${parts.imageAttrs}` : '';
  const zooms = parts.zooms === undefined ? DEFAULT_ZOOMS : parts.zooms;
  const zoomsGroup = zooms === null ? '' : `\n  <g class="zooms">${zooms}</g>`;
  return `<svg ${svgAttrs}>
  <g class="shapes">
    <svg ${backgroundAttrs}><image xlink:href="${parts.imageHref}"${imageAttrs}/></svg>${parts.shapes ?? DEFAULT_SHAPES}
  </g>${zoomsGroup}
</svg>`;
}

// =============================================================================
// Documents
// =============================================================================

export interface CardParts {
  imageHref: string;
  bodyAttrs?: string;
  defs?: string;
  criteria?: string;
  /** Content of the descriptive-schemas div */
  descriptive?: string;
  /** Everything after the descriptive schemas, null for nothing */
  optional?: string | null;
}

export function viewDiv(viewName: string, objectId: number, svg: string): string {
  return `<div data-view-name="${viewName}" data-instance="test-instance" data-object-id="${objectId}">${svg}</div>`;
}

export function exampleDiv(objectId: number, svg: string): string {
  return `<div data-instance="test-instance" data-object-id="${objectId}">${svg}</div>`;
}

export function lines(count: number): string {
  let ret = '';
  for (let i = 0; i < count; i++) {
    const y = 20 + i * 10;
    ret += `\n    <line id="cl${i}" data-label="antenna" x1="10" y1="${y}" x2="110" y2="${y}"/>`;
  }
  return ret;
}

export function confusionPair(imageHref: string, selfLines: number, selfItems: string[]): string {
  const items = selfItems.map((t) => `<li>${t}</li>`).join('');
  return `<div class="confusion-pair">
    <div class="confusion-self">${exampleDiv(44, schemaSvg({ imageHref, shapes: lines(selfLines), zooms: null }))}<ol>${items}</ol></div>
    <div class="confusion-other" data-taxoid="678" data-instrumentid="Zooscan">${exampleDiv(45, schemaSvg({ imageHref, shapes: lines(1), zooms: null }))}<ol><li>Longer antennae</li></ol></div>
  </div>`;
}

export function defaultOptionalSections(imageHref: string): string {
  return `<div class="more-examples">${exampleDiv(43, schemaSvg({ imageHref, zooms: null }))}</div>
<div class="photos-and-figures"><a href="https://example.org/figure-1">Figure 1, lateral view</a></div>
<div class="possible-confusions">${confusionPair(imageHref, 2, ['Shorter antennae', 'No eyes'])}</div>`;
}

export const DEFAULT_CRITERIA =
  '<p>Long <em>antennae</em>, <strong>segmented</strong> body.</p><ul><li>Two eyes</li><li>Six legs</li></ul>';

/**
 * A complete card, valid unless some part is overridden
 */
export function cardHtml(parts: CardParts): string {
  const imageHref = parts.imageHref;
  const optional = parts.optional === undefined ? defaultOptionalSections(imageHref) : parts.optional;
  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Test card</title></head>
<body ${parts.bodyAttrs ?? 'data-taxoid="12345" data-instrumentid="Zooscan"'}>
<svg class="svg-templates"><defs>${parts.defs ?? DEFAULT_DEFS}</defs></svg>
<article class="morpho-criteria">${parts.criteria ?? DEFAULT_CRITERIA}</article>
<div class="descriptive-schemas">${parts.descriptive ?? viewDiv('frontal', 42, schemaSvg({ imageHref }))}</div>
${optional ?? ''}
</body>
</html>
`;
}

/**
 * First match of a selector, for fixtures that are known to contain it
 */
export function firstElement(root: ParentNode, selector: string): Element {
  const element = root.querySelector(selector);
  if (element === null) {
    throw new Error(`Fixture has no ${selector}`);
  }
  return element;
}

/**
 * Message without its "Tag <x> at (l, c), " or "Near "...", " prefix
 */
export function withoutLocation(message: string): string {
  return message.replace(/^(Tag <[^>]+> at \([^)]*\)|Near "[\s\S]*?"), /, '');
}

/**
 * A body holding the given markup, on a single line
 */
export function bodyHtml(markup: string): string {
  return `<!DOCTYPE html><html><body>${markup}</body></html>`;
}
