import type { CapturedOutput } from '../types.js';

export type CaptureStream = 'stdout' | 'stderr';

/** Where a context writes guest output. */
export interface OutputSink {
  write(stream: CaptureStream, text: string): void;
}

class BoundedBuffer {
  private readonly chunks: string[] = [];
  private length = 0;
  public truncated = false;

  constructor(private readonly limit: number) {}

  public write(text: string): void {
    if (text.length === 0) return;
    const room = this.limit - this.length;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    if (text.length > room) {
      this.chunks.push(text.slice(0, room));
      this.length = this.limit;
      this.truncated = true;
      return;
    }
    this.chunks.push(text);
    this.length += text.length;
  }

  public toString(): string {
    return this.chunks.join('');
  }
}

/**
 * Per-execution stdout/stderr sink. Each stream keeps at most `maxChars`
 * characters; once sealed, writes are dropped.
 */
export class OutputCapture implements OutputSink {
  private readonly buffers: Record<CaptureStream, BoundedBuffer>;
  private sealed = false;

  constructor(maxChars: number) {
    this.buffers = {
      stdout: new BoundedBuffer(maxChars),
      stderr: new BoundedBuffer(maxChars),
    };
  }

  public write(stream: CaptureStream, text: string): void {
    if (this.sealed) return;
    this.buffers[stream].write(text);
  }

  public seal(): void {
    this.sealed = true;
  }

  public get isSealed(): boolean {
    return this.sealed;
  }

  public snapshot(): CapturedOutput {
    return {
      stdout: this.buffers.stdout.toString(),
      stderr: this.buffers.stderr.toString(),
      truncated: this.buffers.stdout.truncated || this.buffers.stderr.truncated,
    };
  }
}
