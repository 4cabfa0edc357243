/**
 * Piece table primitives: original buffer + add buffer + piece descriptors.
 *
 * The piece table maintains two string buffers:
 * 1. Original buffer: content the buffer was created with. Never modified.
 * 2. Add buffer: append-only buffer for all inserted text.
 *
 * A piece descriptor references a span in one of these buffers. The ordered
 * pieces live in the rope's leaves; this class only owns the backing strings.
 */

export type BufferType = 'original' | 'add';

export interface PieceDescriptor {
  /** Which buffer this piece references. */
  bufferType: BufferType;
  /** Start offset within that buffer. */
  start: number;
  /** Length of the piece in storage units. */
  length: number;
  /** Number of line breaks (\n) in this piece. */
  lineBreakCount: number;
}

/**
 * Count the number of newline characters in a string range.
 */
export function countLineBreaks(text: string, start: number, length: number): number {
  let count = 0;
  const end = start + length;
  for (let i = start; i < end; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

export class PieceTable {
  /** The original content. Never modified after construction. */
  readonly originalBuffer: string;
  /** Append-only buffer for all insertions. */
  private _addBuffer: string;

  constructor(originalContent: string) {
    this.originalBuffer = originalContent;
    this._addBuffer = '';
  }

  /** Piece covering the whole original buffer, or null if it is empty. */
  initialPiece(): PieceDescriptor | null {
    if (this.originalBuffer.length === 0) return null;
    return {
      bufferType: 'original',
      start: 0,
      length: this.originalBuffer.length,
      lineBreakCount: countLineBreaks(this.originalBuffer, 0, this.originalBuffer.length),
    };
  }

  /** Append text to the add buffer and return its start offset in the add buffer. */
  appendToAddBuffer(text: string): number {
    const start = this._addBuffer.length;
    this._addBuffer += text;
    return start;
  }

  /** True if `piece` ends exactly where the add buffer currently ends. */
  isAddBufferTail(piece: PieceDescriptor): boolean {
    return piece.bufferType === 'add' && piece.start + piece.length === this._addBuffer.length;
  }

  bufferFor(piece: PieceDescriptor): string {
    return piece.bufferType === 'original' ? this.originalBuffer : this._addBuffer;
  }

  /** Sub-piece [from, from + length) of a piece, with its line breaks recounted. */
  slicePiece(piece: PieceDescriptor, from: number, length: number): PieceDescriptor {
    const start = piece.start + from;
    return {
      bufferType: piece.bufferType,
      start,
      length,
      lineBreakCount: countLineBreaks(this.bufferFor(piece), start, length),
    };
  }
}
