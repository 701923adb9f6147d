export { KeyOutlineGenerator, createKeyOutlineGenerator, resolveOutlineOptions } from './KeyOutlineGenerator.js';
export { isoOutline, isoRects, rectWithSize, ISO_CORNERS } from './IsoOutline.js';
export type { IsoCorner } from './IsoOutline.js';
