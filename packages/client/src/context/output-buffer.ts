/**
 * Circular byte buffer capturing what the catalog prints while commands run.
 * Only read back for failure reports.
 */

import { Writable } from 'node:stream';
import { DEFAULT_OUTPUT_BUFFER_SIZE } from '../constants.js';
import { InvalidArgumentError } from '../errors.js';

export class OutputBuffer extends Writable {
  readonly capacity: number;
  private readonly bytes: Buffer;
  private position = 0;
  private wrapped = false;

  constructor(capacity: number = DEFAULT_OUTPUT_BUFFER_SIZE) {
    super({ decodeStrings: true });
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new InvalidArgumentError(`Output buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.bytes = Buffer.alloc(capacity);
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.append(chunk);
    callback();
  }

  /**
   * Appends data, overwriting the oldest bytes once full.
   */
  append(data: string | Uint8Array): void {
    const chunk = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);

    if (chunk.length >= this.capacity) {
      chunk.copy(this.bytes, 0, chunk.length - this.capacity);
      this.position = 0;
      this.wrapped = true;
      return;
    }

    const head = Math.min(chunk.length, this.capacity - this.position);
    chunk.copy(this.bytes, this.position, 0, head);
    if (head < chunk.length) {
      chunk.copy(this.bytes, 0, head);
      this.position = chunk.length - head;
      this.wrapped = true;
    } else {
      this.position += head;
      if (this.position === this.capacity) {
        this.position = 0;
        this.wrapped = true;
      }
    }
  }

  /** Bytes currently held. */
  get size(): number {
    return this.wrapped ? this.capacity : this.position;
  }

  clear(): void {
    this.position = 0;
    this.wrapped = false;
  }

  override toString(): string {
    if (!this.wrapped) {
      return this.bytes.subarray(0, this.position).toString('utf8');
    }
    return Buffer.concat([
      this.bytes.subarray(this.position),
      this.bytes.subarray(0, this.position),
    ]).toString('utf8');
  }
}
