/**
 * Frame Renderer Unit Tests
 * Tests in-place redraws, progress frames and cursor handling
 */

import { describe, it, expect } from 'vitest';
import { drawBox, drawProgressBar } from '../../src/cli/box';
import { FrameRenderer } from '../../src/cli/frame';
import { CaptureOutput } from '../mocks';

describe('FrameRenderer', () => {
  describe('renderFrame', () => {
    it('should write the boxed frame followed by a newline', () => {
      const output = new CaptureOutput(false, 80);
      const renderer = new FrameRenderer({ output });

      renderer.renderFrame('Title', ['line'], ['[X] Exit']);

      const expected = drawBox(['line'], { width: 60, title: 'Title', footer: ['[X] Exit'] });
      expect(output.writes).toEqual([expected.join('\n') + '\n']);
      expect(renderer.getLastFrame()).toEqual(expected);
    });

    it('should append frames when the output is not a terminal', () => {
      const output = new CaptureOutput(false, 80);
      const renderer = new FrameRenderer({ output });

      renderer.renderFrame('One', ['a']);
      renderer.renderFrame('Two', ['b']);

      expect(output.writes).toHaveLength(2);
      expect(output.writes[1]?.startsWith('╔')).toBe(true);
    });

    it('should redraw in place on a terminal', () => {
      const output = new CaptureOutput(true, 80);
      const renderer = new FrameRenderer({ output });

      renderer.renderFrame('One', ['a']);
      renderer.renderFrame('Two', ['b']);

      expect(output.writes[0]?.startsWith('╔')).toBe(true);
      expect(output.writes[1]?.startsWith('\x1b[3A\r\x1b[0J╔')).toBe(true);
    });

    it('should count the rows of the previous frame, not the next', () => {
      const output = new CaptureOutput(true, 80);
      const renderer = new FrameRenderer({ output });

      renderer.renderFrame('Tall', ['a', 'b', 'c'], ['f']);
      renderer.renderFrame('Short', []);

      // top + 3 body + separator + footer + bottom
      expect(output.writes[1]?.startsWith('\x1b[7A')).toBe(true);
    });

    it('should shrink to a narrow terminal', () => {
      const output = new CaptureOutput(true, 30);
      const renderer = new FrameRenderer({ output, width: 60 });

      renderer.renderFrame('Narrow', ['a line that is far too long for thirty columns']);

      for (const line of renderer.getLastFrame()) {
        expect(line.length).toBe(30);
      }
    });
  });

  describe('renderProgress', () => {
    it('should draw the phase title, bar and detail', () => {
      const output = new CaptureOutput(false, 80);
      const renderer = new FrameRenderer({ output });

      renderer.renderProgress('downloading', 0.5, '1.0 MB / 2.0 MB');

      const expected = drawBox(
        ['', 'Downloading...', '', drawProgressBar(0.5, 58), '1.0 MB / 2.0 MB', ''],
        { width: 60, title: 'Downloading', footer: ['Please wait, this may take a moment.'] }
      );
      expect(renderer.getLastFrame()).toEqual(expected);
    });

    it('should title the extracting phase', () => {
      const renderer = new FrameRenderer({ output: new CaptureOutput() });

      renderer.renderProgress('extracting', 1);

      const frame = renderer.getLastFrame();
      expect(frame[0]).toContain(' Extracting ');
      expect(frame[2]).toContain('Extracting...');
      expect(frame[4]).toContain('100%');
    });
  });

  describe('cursor', () => {
    it('should hide and show the cursor on a terminal', () => {
      const output = new CaptureOutput(true, 80);
      const renderer = new FrameRenderer({ output });

      renderer.hideCursor();
      renderer.hideCursor();
      renderer.showCursor();

      expect(output.writes).toEqual(['\x1b[?25l', '\x1b[?25h']);
    });

    it('should leave non-terminal output untouched', () => {
      const output = new CaptureOutput(false, 80);
      const renderer = new FrameRenderer({ output });

      renderer.hideCursor();
      renderer.showCursor();

      expect(output.writes).toEqual([]);
    });
  });
});
