/**
 * Streaming JSON framer.
 *
 * Splits a byte stream into complete top-level JSON documents. Documents may
 * arrive split across any number of reads, several may share one read, and no
 * delimiter is required between them (whitespace and newlines are skipped).
 * Object and array documents are delimited by bracket depth and strings by
 * their closing quote. Any other token (a number, a literal, garbage) ends at
 * the first whitespace or structural character, or at the end of the data
 * received so far, so it always yields a frame instead of stalling the stream.
 */

import { StringDecoder } from 'node:string_decoder';

import { FrameTooLargeError } from './errors.js';

const WHITESPACE = new Set([' ', '\t', '\r', '\n']);
const STRUCTURAL = new Set(['{', '}', '[', ']', '"', ',', ':']);

/** How the frame being scanned ends. */
type FrameKind = 'container' | 'string' | 'token';

export class JsonFrameDecoder {
  private readonly decoder = new StringDecoder('utf8');
  private buffer = '';
  /** Index in `buffer` where scanning resumes. */
  private cursor = 0;
  /** Index in `buffer` where the current frame starts, or -1 between frames. */
  private start = -1;
  private kind: FrameKind = 'container';
  private depth = 0;
  private inString = false;
  private escaped = false;
  private pendingBytes = 0;
  private failure: FrameTooLargeError | null = null;

  /**
   * @param maxFrameBytes - Largest frame tolerated, finished or not
   */
  constructor(private readonly maxFrameBytes: number = Number.POSITIVE_INFINITY) {}

  /**
   * Feed one chunk and collect every frame it completes.
   *
   * When a frame outgrows the limit, the frames before it are still returned,
   * `overflow` is set and every later push returns nothing until `reset()`.
   *
   * @returns Raw frame texts, in stream order (possibly empty)
   */
  push(chunk: Buffer | string): string[] {
    if (this.failure) {
      return [];
    }

    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    this.buffer += text;
    this.pendingBytes += typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.length;

    const frames = this.scan();
    if (this.failure) {
      return frames;
    }

    if (this.start === -1) {
      this.pendingBytes = 0;
    } else if (frames.length > 0) {
      this.pendingBytes = Buffer.byteLength(this.buffer);
    }
    if (this.start !== -1 && this.pendingBytes > this.maxFrameBytes) {
      this.fail();
    }

    return frames;
  }

  /**
   * The limit violation that stopped the decoder, if any.
   */
  get overflow(): FrameTooLargeError | null {
    return this.failure;
  }

  /**
   * True while part of a frame is buffered.
   */
  hasPartialFrame(): boolean {
    return this.start !== -1;
  }

  /**
   * Drop any buffered partial frame and clear an overflow.
   */
  reset(): void {
    this.decoder.end();
    this.buffer = '';
    this.cursor = 0;
    this.start = -1;
    this.kind = 'container';
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    this.pendingBytes = 0;
    this.failure = null;
  }

  private fail(): void {
    this.reset();
    this.failure = new FrameTooLargeError(this.maxFrameBytes);
  }

  /**
   * Accept a finished frame unless it breaks the limit.
   */
  private accept(frames: string[], frame: string): boolean {
    if (Number.isFinite(this.maxFrameBytes) && Buffer.byteLength(frame) > this.maxFrameBytes) {
      this.fail();
      return false;
    }
    frames.push(frame);
    return true;
  }

  private scan(): string[] {
    const frames: string[] = [];
    const buffer = this.buffer;

    for (let i = this.cursor; i < buffer.length; i++) {
      const char = buffer.charAt(i);

      if (this.start === -1) {
        if (WHITESPACE.has(char)) {
          continue;
        }
        this.start = i;
        this.kind = char === '{' || char === '[' ? 'container' : char === '"' ? 'string' : 'token';
        this.depth = this.kind === 'container' ? 1 : 0;
        this.inString = this.kind === 'string';
        this.escaped = false;
        continue;
      }

      if (this.kind === 'token') {
        if (WHITESPACE.has(char) || STRUCTURAL.has(char)) {
          if (!this.accept(frames, buffer.slice(this.start, i))) {
            return frames;
          }
          this.start = -1;
          // The delimiter may open the next frame
          i--;
        }
        continue;
      }

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (char === '\\') {
          this.escaped = true;
        } else if (char === '"') {
          this.inString = false;
          if (this.kind === 'string') {
            if (!this.accept(frames, buffer.slice(this.start, i + 1))) {
              return frames;
            }
            this.start = -1;
          }
        }
        continue;
      }

      if (char === '"') {
        this.inString = true;
      } else if (char === '{' || char === '[') {
        this.depth++;
      } else if (char === '}' || char === ']') {
        this.depth--;
        if (this.depth === 0) {
          if (!this.accept(frames, buffer.slice(this.start, i + 1))) {
            return frames;
          }
          this.start = -1;
        }
      }
    }

    // A bare token has no closing character: end it with the data received so far
    if (this.start !== -1 && this.kind === 'token') {
      if (!this.accept(frames, buffer.slice(this.start))) {
        return frames;
      }
      this.start = -1;
    }

    // Keep only the unfinished frame, if any
    if (this.start === -1) {
      this.buffer = '';
      this.cursor = 0;
    } else {
      this.buffer = buffer.slice(this.start);
      this.cursor = this.buffer.length;
      this.start = 0;
    }

    return frames;
  }
}
