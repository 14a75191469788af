import { describe, expect, it } from 'vitest';
import { RecordingFrame } from '../test-helpers.js';
import { DIM, RESET } from './constants.js';
import { drawBox, fitText, innerRect, scrollOffsetFor } from './draw.js';

describe('draw', () => {
  describe('fitText', () => {
    it('should pad short text', () => {
      expect(fitText('abc', 5)).toBe('abc  ');
    });

    it('should cut long text with an ellipsis', () => {
      expect(fitText('abcdef', 4)).toBe('abc…');
      expect(fitText('abcdef', 1)).toBe('a');
      expect(fitText('abcdef', 0)).toBe('');
    });
  });

  describe('innerRect', () => {
    it('should shrink by one cell on each side', () => {
      expect(innerRect({ x: 3, y: 2, width: 10, height: 4 })).toEqual({ x: 4, y: 3, width: 8, height: 2 });
      expect(innerRect({ x: 1, y: 1, width: 1, height: 1 })).toEqual({ x: 2, y: 2, width: 0, height: 0 });
    });
  });

  describe('scrollOffsetFor', () => {
    it('should keep the selection inside the window', () => {
      expect(scrollOffsetFor(5, 3, 0)).toBe(3);
      expect(scrollOffsetFor(1, 3, 3)).toBe(1);
      expect(scrollOffsetFor(4, 3, 3)).toBe(3);
      expect(scrollOffsetFor(4, 0, 3)).toBe(0);
    });
  });

  describe('drawBox', () => {
    it('should draw a titled border', () => {
      const frame = new RecordingFrame();

      drawBox(frame, { x: 1, y: 1, width: 8, height: 3 }, DIM, 'Hi');

      expect(frame.writes).toEqual([
        { x: 1, y: 1, text: `${DIM}┌ Hi ──┐${RESET}` },
        { x: 1, y: 2, text: `${DIM}│${RESET}` },
        { x: 8, y: 2, text: `${DIM}│${RESET}` },
        { x: 1, y: 3, text: `${DIM}└──────┘${RESET}` },
      ]);
    });

    it('should draw nothing in a rect too small for a border', () => {
      const frame = new RecordingFrame();

      drawBox(frame, { x: 1, y: 1, width: 1, height: 3 }, DIM);

      expect(frame.writes).toEqual([]);
    });
  });
});
