import { Inject, Injectable, Optional } from '@nestjs/common';
import type { ProgressUpdate } from '../../domain/ports/batch-reporter.interface';
import { PROGRESS_OUTPUT } from '../../domain/ports/provisioning.tokens';

/** The slice of a TTY stream the renderer draws on. */
export interface ProgressOutput {
  isTTY?: boolean;
  columns?: number;
  write(chunk: string): boolean;
}

const BAR_WIDTH = 30;

/**
 * Single-line terminal progress indicator, redrawn in place.
 *
 * Draws only on a TTY; piped or redirected output gets nothing, since the
 * status lines and the log already carry the same information.
 */
@Injectable()
export class ProgressRenderer {
  private readonly output: ProgressOutput;
  private visible = false;

  constructor(@Optional() @Inject(PROGRESS_OUTPUT) output?: ProgressOutput) {
    this.output = output ?? process.stdout;
  }

  get enabled(): boolean {
    return this.output.isTTY === true;
  }

  render(update: ProgressUpdate): void {
    if (!this.enabled) return;
    if (update.completed) {
      this.clear();
      return;
    }
    this.output.write(`\r${formatProgressLine(update, this.output.columns)}\x1b[K`);
    this.visible = true;
  }

  /** Erase the bar so a regular line can be written; the next render redraws it. */
  clear(): void {
    if (!this.visible) return;
    this.output.write('\r\x1b[K');
    this.visible = false;
  }
}

export function formatProgressLine(update: ProgressUpdate, columns?: number): string {
  const clamped = Math.min(100, Math.max(0, update.percent));
  const filled = Math.round((clamped / 100) * BAR_WIDTH);
  const bar = '#'.repeat(filled) + '.'.repeat(BAR_WIDTH - filled);
  const line = `${update.activity} [${bar}] ${clamped.toFixed(2).padStart(6)}% ${update.currentOperation}`;
  return columns && columns > 1 && line.length >= columns ? line.slice(0, columns - 1) : line;
}
