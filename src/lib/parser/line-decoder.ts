/**
 * Line decoder - Transform stream that turns raw bytes into text lines
 */

import { Transform, type TransformCallback } from "stream";
import { LogEncodingError } from "../../utils/errors.js";

/**
 * Strict UTF-8 decoding followed by splitting on \n (a trailing \r is dropped).
 * Emits one string per line; a final line without a newline is emitted on flush.
 */
export class LineDecoder extends Transform {
  private decoder = new TextDecoder("utf-8", { fatal: true });
  private remainder = "";
  private lineNumber = 0;

  constructor() {
    super({
      writableObjectMode: false, // Input is bytes
      readableObjectMode: true, // Output is one string per line
    });
  }

  _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    let text: string;
    try {
      text = this.decoder.decode(chunk, { stream: true });
    } catch (error) {
      callback(this.encodingError(error));
      return;
    }
    this.pushLines(text);
    callback();
  }

  _flush(callback: TransformCallback): void {
    let text: string;
    try {
      text = this.decoder.decode();
    } catch (error) {
      callback(this.encodingError(error));
      return;
    }
    this.pushLines(text);
    if (this.remainder.length > 0) {
      this.push(this.remainder);
      this.remainder = "";
    }
    callback();
  }

  private pushLines(text: string): void {
    const parts = (this.remainder + text).split("\n");
    this.remainder = parts.pop() ?? "";
    for (const part of parts) {
      this.lineNumber++;
      this.push(part.endsWith("\r") ? part.slice(0, -1) : part);
    }
  }

  private encodingError(cause: unknown): LogEncodingError {
    return new LogEncodingError(
      `Invalid UTF-8 data after line ${this.lineNumber}`,
      { line: this.lineNumber + 1 },
      { cause },
    );
  }
}

export function createLineDecoder(): LineDecoder {
  return new LineDecoder();
}
