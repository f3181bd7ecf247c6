/**
 * Renderer and Output Mocks
 * Capture frames and raw terminal writes
 */

import type { FrameOutput, Renderer } from '../../src/cli/frame';
import type { ProgressPhase } from '../../src/core/types';

// ---------------------------------------------------------------------------
// Raw Output
// ---------------------------------------------------------------------------

export class CaptureOutput implements FrameOutput {
  readonly writes: string[] = [];

  constructor(public isTTY = false, public columns = 80) {}

  write(chunk: string): boolean {
    this.writes.push(chunk);
    return true;
  }

  text(): string {
    return this.writes.join('');
  }
}

// ---------------------------------------------------------------------------
// Recording Renderer
// ---------------------------------------------------------------------------

export interface RecordedFrame {
  title: string;
  body: string[];
  footer: string[];
}

export interface RecordedProgress {
  phase: ProgressPhase;
  fraction: number;
  detail?: string;
}

export class RecordingRenderer implements Renderer {
  readonly frames: RecordedFrame[] = [];
  readonly progress: RecordedProgress[] = [];

  renderFrame(title: string, body: string[], footer: string[] = []): void {
    this.frames.push({ title, body: [...body], footer: [...footer] });
  }

  renderProgress(phase: ProgressPhase, fraction: number, detail?: string): void {
    this.progress.push({ phase, fraction, detail });
  }

  lastFrame(): RecordedFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  titles(): string[] {
    return this.frames.map((frame) => frame.title);
  }
}
