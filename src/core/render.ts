/**
 * @file render.ts
 * @description Textual dump of tracker state for debugging.
 *
 * Output is four parts, each terminated by a newline:
 *   1. `Metadata: {id: (start=s, length=l), ...}` in offset order
 *   2. one cell per offset: the last decimal digit of the owning id at a
 *      region's first cell, FILL_CHAR for its remaining cells, blank if free
 *   3. a ruler of repeating digits 0-9
 *   4. offset labels every LABEL_STEP cells, clipped at the capacity
 *
 * Lines 2-4 stop after MAX_LAYOUT_WIDTH cells; a clipped line ends with
 * TRUNCATION_MARK.  The listing is never clipped.
 *
 * The marker digit is cosmetic; it carries no meaning for allocation.
 */

import { regionEnd } from './types.js';
import type { RegionEntry, RegionId } from './types.js';
import { writeDec } from '../util/writer.js';
import type { Writer } from '../util/writer.js';

export const FILL_CHAR = '-';
export const LABEL_STEP = 10;
export const MAX_LAYOUT_WIDTH = 1000;
export const TRUNCATION_MARK = '...';

/** The parts of a tracker the printer reads */
export interface LayoutSource {
  readonly capacity: number;
  regions(): Iterable<RegionEntry>;
}

/** Marker character for a region's first cell */
export function idMarker(id: RegionId): string {
  return String(Math.abs(id) % 10);
}

export function printListing(src: LayoutSource, w: Writer): void {
  w.write('Metadata: {');
  let first = true;
  for (const entry of src.regions()) {
    if (!first) w.write(', ');
    first = false;
    writeDec(w, entry.id);
    w.write(': (start=');
    writeDec(w, entry.offset);
    w.write(', length=');
    writeDec(w, entry.length);
    w.write(')');
  }
  w.write('}\n');
}

/** Number of cells drawn for a given capacity */
export function layoutWidth(capacity: number): number {
  return Math.min(capacity, MAX_LAYOUT_WIDTH);
}

function writeCellLine(cells: string[], capacity: number, w: Writer): void {
  const mark = capacity > cells.length ? TRUNCATION_MARK : '';
  w.write(cells.join('') + mark + '\n');
}

export function printCells(src: LayoutSource, w: Writer): void {
  const width = layoutWidth(src.capacity);
  const cells: string[] = new Array<string>(width).fill(' ');
  for (const entry of src.regions()) {
    if (entry.offset >= width) break;
    cells[entry.offset] = idMarker(entry.id);
    const stop = Math.min(regionEnd(entry), width);
    for (let i = entry.offset + 1; i < stop; i++) {
      cells[i] = FILL_CHAR;
    }
  }
  writeCellLine(cells, src.capacity, w);
}

export function printRuler(capacity: number, w: Writer): void {
  const cells: string[] = [];
  for (let i = 0; i < layoutWidth(capacity); i++) {
    cells.push(String(i % 10));
  }
  writeCellLine(cells, capacity, w);
}

export function printOffsetLabels(capacity: number, w: Writer): void {
  const width = layoutWidth(capacity);
  const cells: string[] = new Array<string>(width).fill(' ');
  for (let i = 0; i < width; i += LABEL_STEP) {
    const label = String(i);
    for (let j = 0; j < label.length && i + j < width; j++) {
      cells[i + j] = label[j];
    }
  }
  writeCellLine(cells, capacity, w);
}

/** Write the full four-part dump */
export function printLayout(src: LayoutSource, w: Writer): void {
  printListing(src, w);
  printCells(src, w);
  printRuler(src.capacity, w);
  printOffsetLabels(src.capacity, w);
}
