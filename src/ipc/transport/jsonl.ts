/**
 * JSONL framing.
 *
 * niri reads one JSON request per line and answers with one JSON reply per
 * line on the same connection.
 */

import { MAX_JSONL_BUFFER_SIZE } from '@/constants.js';

/**
 * Error thrown when the JSONL buffer exceeds its maximum size.
 */
export class JSONLBufferOverflowError extends Error {
  constructor(bufferSize: number, maxSize: number) {
    super(
      `JSONL buffer overflow: ${bufferSize} characters exceeds maximum ${maxSize} characters without a newline`
    );
    this.name = 'JSONLBufferOverflowError';
  }
}

/**
 * JSONL buffer for accumulating partial frames.
 */
export class JSONLBuffer {
  private buffer = '';

  constructor(private readonly maxSize: number = MAX_JSONL_BUFFER_SIZE) {}

  /**
   * Process incoming chunk and extract complete JSONL frames.
   *
   * @param chunk - Incoming data chunk
   * @returns Complete non-blank lines, without their newline
   * @throws JSONLBufferOverflowError if the pending partial frame grows past the limit
   */
  process(chunk: string): string[] {
    this.buffer += chunk;

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    if (this.buffer.length > this.maxSize) {
      const size = this.buffer.length;
      this.buffer = '';
      throw new JSONLBufferOverflowError(size, this.maxSize);
    }

    return lines.filter((line) => line.trim());
  }

  clear(): void {
    this.buffer = '';
  }

  getBuffer(): string {
    return this.buffer;
  }
}

/**
 * Serialize a value to a JSONL frame (JSON + newline).
 */
export function toJSONLFrame(value: unknown): string {
  return JSON.stringify(value) + '\n';
}
