/**
 * @file render.test.ts
 * @description Tests for the layout dump (src/core/render.ts).
 */

import { describe, it, expect } from 'vitest';
import { RegionTracker } from '../../src/core/tracker.js';
import { LogMode } from '../../src/core/options.js';
import {
  idMarker,
  printLayout,
  printOffsetLabels,
  printRuler,
  MAX_LAYOUT_WIDTH,
  TRUNCATION_MARK,
} from '../../src/core/render.js';
import { StringWriter } from '../../src/util/writer.js';

function quietTracker(capacity: number): RegionTracker {
  return new RegionTracker(capacity, { logMode: LogMode.disabled, writer: new StringWriter() });
}

describe('printLayout', () => {
  it('renders listing, cells and rulers in offset order', () => {
    const t = quietTracker(10);
    t.addMetadata(2, 5, 2);
    t.addMetadata(1, 0, 3);
    t.addMetadata(3, 3, 2);
    const w = new StringWriter();
    printLayout(t, w);
    expect(w.lines()).toEqual([
      'Metadata: {1: (start=0, length=3), 3: (start=3, length=2), 2: (start=5, length=2)}',
      '1--3-2-   ',
      '0123456789',
      '0         ',
    ]);
  });

  it('renders an empty tracker', () => {
    const w = new StringWriter();
    printLayout(quietTracker(4), w);
    expect(w.toString()).toBe('Metadata: {}\n    \n0123\n0   \n');
  });

  it('matches toString on the tracker', () => {
    const t = quietTracker(5);
    t.addMetadata(12, 1, 3);
    expect(t.toString()).toBe('Metadata: {12: (start=1, length=3)}\n 2-- \n01234\n0    \n');
  });
});

describe('printOffsetLabels', () => {
  it('places each label at its offset', () => {
    const w = new StringWriter();
    printOffsetLabels(25, w);
    expect(w.toString()).toBe('0' + ' '.repeat(9) + '10' + ' '.repeat(8) + '20' + ' '.repeat(3) + '\n');
  });

  it('clips a label at the capacity', () => {
    const w = new StringWriter();
    printOffsetLabels(11, w);
    expect(w.toString()).toBe('0' + ' '.repeat(9) + '1\n');
  });
});

describe('wide layouts', () => {
  it('draws the full width up to the limit', () => {
    const w = new StringWriter();
    printRuler(MAX_LAYOUT_WIDTH, w);
    expect(w.toString()).toBe('0123456789'.repeat(MAX_LAYOUT_WIDTH / 10) + '\n');
  });

  it('clips the ruler and labels past the limit', () => {
    const w = new StringWriter();
    printRuler(MAX_LAYOUT_WIDTH + 1, w);
    printOffsetLabels(MAX_LAYOUT_WIDTH + 1, w);
    const [ruler, labels] = w.lines();
    expect(ruler).toBe('0123456789'.repeat(MAX_LAYOUT_WIDTH / 10) + TRUNCATION_MARK);
    expect(labels.length).toBe(MAX_LAYOUT_WIDTH + TRUNCATION_MARK.length);
    expect(labels.slice(990, 993)).toBe('990');
    expect(labels.endsWith(' ' + TRUNCATION_MARK)).toBe(true);
  });

  it('leaves regions beyond the limit out of the cell line but in the listing', () => {
    const t = quietTracker(MAX_LAYOUT_WIDTH * 2);
    t.addMetadata(3, MAX_LAYOUT_WIDTH + 5, 4);
    const [listing, cells] = t.toString().split('\n');
    expect(listing).toBe(`Metadata: {3: (start=${MAX_LAYOUT_WIDTH + 5}, length=4)}`);
    expect(cells).toBe(' '.repeat(MAX_LAYOUT_WIDTH) + TRUNCATION_MARK);
  });
});

describe('idMarker', () => {
  it('uses the last decimal digit of the id', () => {
    expect(idMarker(7)).toBe('7');
    expect(idMarker(1234)).toBe('4');
    expect(idMarker(-13)).toBe('3');
    expect(idMarker(0)).toBe('0');
  });
});
