/**
 * Rope data structure with B-tree indexing over piece table pieces.
 *
 * Each node stores the storage length and line-break count of its subtree,
 * so offset→piece and line→offset lookups descend the tree in O(log n).
 * Inserts split only the leaf they land in; deletes trim only the leaves the
 * range touches.
 */

import { PieceDescriptor, PieceTable, countLineBreaks } from './piece-table';

const MAX_CHILDREN = 32;
const SPLIT_SIZE = MAX_CHILDREN / 2;

/** Upper bound on piece length, so scans inside a single piece stay short. */
export const CHUNK_SIZE = 1024;

interface LeafNode {
  kind: 'leaf';
  pieces: PieceDescriptor[];
  length: number;
  lineBreakCount: number;
}

interface InternalNode {
  kind: 'internal';
  children: RopeNode[];
  length: number;
  lineBreakCount: number;
}

type RopeNode = LeafNode | InternalNode;

interface PathEntry {
  node: InternalNode;
  childIndex: number;
}

/**
 * Result of locating a storage offset within the tree.
 */
interface PieceLocation {
  /** The leaf node containing the piece. */
  leaf: LeafNode;
  /** Index of the piece in the leaf's pieces array. */
  pieceIndex: number;
  /** Offset within the piece. */
  offsetInPiece: number;
  /** Path from root to leaf (for tree modifications). */
  path: PathEntry[];
}

function createLeaf(pieces: PieceDescriptor[]): LeafNode {
  const leaf: LeafNode = { kind: 'leaf', pieces, length: 0, lineBreakCount: 0 };
  updateNodeStats(leaf);
  return leaf;
}

function createInternal(children: RopeNode[]): InternalNode {
  const node: InternalNode = { kind: 'internal', children, length: 0, lineBreakCount: 0 };
  updateNodeStats(node);
  return node;
}

function updateNodeStats(node: RopeNode): void {
  let length = 0;
  let lineBreakCount = 0;
  const items: ReadonlyArray<{ length: number; lineBreakCount: number }> =
    node.kind === 'leaf' ? node.pieces : node.children;
  for (const item of items) {
    length += item.length;
    lineBreakCount += item.lineBreakCount;
  }
  node.length = length;
  node.lineBreakCount = lineBreakCount;
}

function childCount(node: RopeNode): number {
  return node.kind === 'leaf' ? node.pieces.length : node.children.length;
}

function splitNode(node: RopeNode): RopeNode[] {
  const result: RopeNode[] = [];
  if (node.kind === 'leaf') {
    for (let i = 0; i < node.pieces.length; i += SPLIT_SIZE) {
      result.push(createLeaf(node.pieces.slice(i, i + SPLIT_SIZE)));
    }
  } else {
    for (let i = 0; i < node.children.length; i += SPLIT_SIZE) {
      result.push(createInternal(node.children.slice(i, i + SPLIT_SIZE)));
    }
  }
  return result;
}

function isLowSurrogateAt(text: string, index: number): boolean {
  const code = text.charCodeAt(index);
  return code >= 0xDC00 && code <= 0xDFFF;
}

/**
 * Rope B-tree wrapping a PieceTable.
 */
export class Rope {
  private root: RopeNode;
  readonly pieceTable: PieceTable;

  constructor(pieceTable: PieceTable) {
    this.pieceTable = pieceTable;
    const initial = pieceTable.initialPiece();
    const pieces = initial ? this.chunk(initial) : [];
    this.root = this.buildTree(pieces);
  }

  get length(): number {
    return this.root.length;
  }

  get lineBreakCount(): number {
    return this.root.lineBreakCount;
  }

  /**
   * Find the storage offset of the start of a line (0-based).
   * Line N starts after the Nth newline.
   */
  findLineStart(lineNumber: number): number {
    if (lineNumber <= 0) return 0;
    if (lineNumber > this.root.lineBreakCount) return this.root.length;

    let remaining = lineNumber;
    let offset = 0;
    let node: RopeNode = this.root;

    while (node.kind === 'internal') {
      let next: RopeNode | null = null;
      for (const child of node.children) {
        if (child.lineBreakCount < remaining) {
          remaining -= child.lineBreakCount;
          offset += child.length;
        } else {
          next = child;
          break;
        }
      }
      if (!next) return offset;
      node = next;
    }

    for (const piece of node.pieces) {
      if (piece.lineBreakCount < remaining) {
        remaining -= piece.lineBreakCount;
        offset += piece.length;
        continue;
      }
      const buffer = this.pieceTable.bufferFor(piece);
      const end = piece.start + piece.length;
      for (let pos = piece.start; pos < end; pos++) {
        if (buffer.charCodeAt(pos) === 10 && --remaining === 0) {
          return offset + (pos - piece.start) + 1;
        }
      }
    }
    return offset;
  }

  /**
   * Find which line (0-based) contains a given storage offset.
   */
  findOffsetLine(offset: number): number {
    if (offset <= 0) return 0;
    if (offset >= this.root.length) return this.root.lineBreakCount;

    let remaining = offset;
    let line = 0;
    let node: RopeNode = this.root;

    while (node.kind === 'internal') {
      let next: RopeNode | null = null;
      for (const child of node.children) {
        if (remaining < child.length) {
          next = child;
          break;
        }
        remaining -= child.length;
        line += child.lineBreakCount;
      }
      if (!next) return line;
      node = next;
    }

    for (const piece of node.pieces) {
      if (remaining < piece.length) {
        return line + countLineBreaks(this.pieceTable.bufferFor(piece), piece.start, remaining);
      }
      remaining -= piece.length;
      line += piece.lineBreakCount;
    }
    return line;
  }

  /**
   * Insert text at the given storage offset.
   */
  insert(offset: number, text: string): void {
    if (text.length === 0) return;

    const loc = this.findByOffset(Math.max(0, Math.min(offset, this.root.length)));
    const { leaf, pieceIndex, offsetInPiece } = loc;
    const target: PieceDescriptor | undefined = leaf.pieces[pieceIndex];

    if (target &&
        offsetInPiece === target.length &&
        this.pieceTable.isAddBufferTail(target) &&
        target.length + text.length <= CHUNK_SIZE) {
      // Typing at the end of the most recent insert: grow that piece in place
      this.pieceTable.appendToAddBuffer(text);
      target.length += text.length;
      target.lineBreakCount += countLineBreaks(text, 0, text.length);
    } else {
      const addStart = this.pieceTable.appendToAddBuffer(text);
      const newPieces = this.chunk({
        bufferType: 'add',
        start: addStart,
        length: text.length,
        lineBreakCount: countLineBreaks(text, 0, text.length),
      });

      if (!target || offsetInPiece === 0) {
        leaf.pieces.splice(pieceIndex, 0, ...newPieces);
      } else if (offsetInPiece === target.length) {
        leaf.pieces.splice(pieceIndex + 1, 0, ...newPieces);
      } else {
        const left = this.pieceTable.slicePiece(target, 0, offsetInPiece);
        const right = this.pieceTable.slicePiece(target, offsetInPiece, target.length - offsetInPiece);
        leaf.pieces.splice(pieceIndex, 1, left, ...newPieces, right);
      }
    }

    updateNodeStats(leaf);
    for (let i = loc.path.length - 1; i >= 0; i--) {
      updateNodeStats(loc.path[i].node);
    }
    this.splitOverflow(leaf, loc.path);
  }

  /**
   * Delete the range [start, end) and return the removed text.
   */
  delete(start: number, end: number): string {
    const s = Math.max(0, start);
    const e = Math.min(end, this.root.length);
    if (s >= e) return '';

    const removed = this.getText(s, e);
    this.deleteInNode(this.root, s, e);

    while (this.root.kind === 'internal' && this.root.children.length === 1) {
      this.root = this.root.children[0];
    }
    if (this.root.kind === 'internal' && this.root.children.length === 0) {
      this.root = createLeaf([]);
    }
    return removed;
  }

  /**
   * Get text in a storage range [start, end).
   */
  getText(start: number, end: number): string {
    const s = Math.max(0, start);
    const e = Math.min(end, this.root.length);
    if (s >= e) return '';
    const parts: string[] = [];
    this.collectText(this.root, s, e, parts);
    return parts.join('');
  }

  getFullText(): string {
    return this.getText(0, this.root.length);
  }

  /**
   * Collect all pieces into a flat array, in document order.
   */
  collectAllPieces(): PieceDescriptor[] {
    const result: PieceDescriptor[] = [];
    const walk = (node: RopeNode): void => {
      if (node.kind === 'leaf') {
        result.push(...node.pieces);
      } else {
        for (const child of node.children) walk(child);
      }
    };
    walk(this.root);
    return result;
  }

  /** Tree height; 1 for a single leaf. */
  get depth(): number {
    let depth = 1;
    let node = this.root;
    while (node.kind === 'internal') {
      node = node.children[0];
      depth++;
    }
    return depth;
  }

  private findByOffset(offset: number): PieceLocation {
    const path: PathEntry[] = [];
    let node: RopeNode = this.root;
    let remaining = offset;

    while (node.kind === 'internal') {
      let childIndex = node.children.length - 1;
      for (let i = 0; i < node.children.length; i++) {
        if (remaining < node.children[i].length) {
          childIndex = i;
          break;
        }
        if (i < node.children.length - 1) remaining -= node.children[i].length;
      }
      path.push({ node, childIndex });
      node = node.children[childIndex];
    }

    for (let i = 0; i < node.pieces.length; i++) {
      const piece = node.pieces[i];
      if (remaining < piece.length) {
        return { leaf: node, pieceIndex: i, offsetInPiece: remaining, path };
      }
      if (i < node.pieces.length - 1) remaining -= piece.length;
    }
    if (node.pieces.length > 0) {
      const lastIdx = node.pieces.length - 1;
      return { leaf: node, pieceIndex: lastIdx, offsetInPiece: node.pieces[lastIdx].length, path };
    }
    return { leaf: node, pieceIndex: 0, offsetInPiece: 0, path };
  }

  private deleteInNode(node: RopeNode, start: number, end: number): void {
    if (node.kind === 'leaf') {
      const kept: PieceDescriptor[] = [];
      let base = 0;
      for (const piece of node.pieces) {
        const pieceStart = base;
        const pieceEnd = base + piece.length;
        base = pieceEnd;

        if (pieceEnd <= start || pieceStart >= end) {
          kept.push(piece);
          continue;
        }
        if (pieceStart < start) {
          kept.push(this.pieceTable.slicePiece(piece, 0, start - pieceStart));
        }
        if (pieceEnd > end) {
          const skip = end - pieceStart;
          kept.push(this.pieceTable.slicePiece(piece, skip, piece.length - skip));
        }
      }
      node.pieces = kept;
      updateNodeStats(node);
      return;
    }

    let base = 0;
    for (const child of node.children) {
      const childStart = base;
      const childLength = child.length;
      base += childLength;
      if (childStart + childLength <= start || childStart >= end) continue;
      this.deleteInNode(
        child,
        Math.max(start - childStart, 0),
        Math.min(end - childStart, childLength),
      );
    }
    node.children = node.children.filter(child => child.length > 0);
    updateNodeStats(node);
  }

  private collectText(node: RopeNode, start: number, end: number, parts: string[]): void {
    let base = 0;
    if (node.kind === 'leaf') {
      for (const piece of node.pieces) {
        const pieceStart = base;
        base += piece.length;
        if (base <= start) continue;
        if (pieceStart >= end) return;
        const readStart = Math.max(start - pieceStart, 0);
        const readEnd = Math.min(end - pieceStart, piece.length);
        const buffer = this.pieceTable.bufferFor(piece);
        parts.push(buffer.substring(piece.start + readStart, piece.start + readEnd));
      }
      return;
    }
    for (const child of node.children) {
      const childStart = base;
      base += child.length;
      if (base <= start) continue;
      if (childStart >= end) return;
      this.collectText(child, Math.max(start - childStart, 0), Math.min(end - childStart, child.length), parts);
    }
  }

  private splitOverflow(leaf: LeafNode, path: PathEntry[]): void {
    let current: RopeNode = leaf;
    for (let depth = path.length - 1; depth >= 0; depth--) {
      if (childCount(current) <= MAX_CHILDREN) return;
      const { node: parent, childIndex } = path[depth];
      parent.children.splice(childIndex, 1, ...splitNode(current));
      current = parent;
    }
    if (childCount(current) > MAX_CHILDREN) {
      this.root = this.buildFromNodes(splitNode(current));
    }
  }

  /** Cut a piece into CHUNK_SIZE pieces without splitting surrogate pairs. */
  private chunk(piece: PieceDescriptor): PieceDescriptor[] {
    if (piece.length <= CHUNK_SIZE) return [piece];
    const buffer = this.pieceTable.bufferFor(piece);
    const pieces: PieceDescriptor[] = [];
    let from = 0;
    while (from < piece.length) {
      let size = Math.min(CHUNK_SIZE, piece.length - from);
      if (from + size < piece.length && isLowSurrogateAt(buffer, piece.start + from + size)) {
        size--;
      }
      pieces.push(this.pieceTable.slicePiece(piece, from, size));
      from += size;
    }
    return pieces;
  }

  private buildTree(pieces: PieceDescriptor[]): RopeNode {
    if (pieces.length <= MAX_CHILDREN) {
      return createLeaf(pieces);
    }
    const leaves: RopeNode[] = [];
    for (let i = 0; i < pieces.length; i += MAX_CHILDREN) {
      leaves.push(createLeaf(pieces.slice(i, i + MAX_CHILDREN)));
    }
    return this.buildFromNodes(leaves);
  }

  private buildFromNodes(nodes: RopeNode[]): RopeNode {
    if (nodes.length === 1) return nodes[0];
    if (nodes.length <= MAX_CHILDREN) return createInternal(nodes);
    const parents: RopeNode[] = [];
    for (let i = 0; i < nodes.length; i += MAX_CHILDREN) {
      const group = nodes.slice(i, i + MAX_CHILDREN);
      parents.push(group.length === 1 ? group[0] : createInternal(group));
    }
    return this.buildFromNodes(parents);
  }
}
