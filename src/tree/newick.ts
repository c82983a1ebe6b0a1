/**
 * Newick reader and writer.
 *
 * Labels are kept verbatim (underscores are not turned into spaces), unary
 * internal nodes are kept, bracketed comments are skipped. Labels that
 * would not survive unquoted are written in single quotes with embedded
 * quotes doubled.
 */

import { TreeFormatError } from '../errors.js';
import type { TreeNode } from '../types/models.js';

const PUNCTUATION = new Set(['(', ')', ',', ':', ';', '[', ']', "'"]);
const NEEDS_QUOTES = /[\s()[\]':;,]/;

export function parseNewick(text: string): TreeNode {
  const parser = new NewickParser(text);
  return parser.parseTree();
}

export function toNewick(root: TreeNode): string {
  return `${writeNode(root)};`;
}

function writeNode(node: TreeNode): string {
  let out = '';
  if (node.children.length > 0) {
    out += `(${node.children.map(writeNode).join(',')})`;
  }
  if (node.label !== null) out += quoteLabel(node.label);
  if (node.branchLength !== null) out += `:${node.branchLength}`;
  return out;
}

export function quoteLabel(label: string): string {
  if (label === '' || NEEDS_QUOTES.test(label)) {
    return `'${label.replace(/'/g, "''")}'`;
  }
  return label;
}

class NewickParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseTree(): TreeNode {
    this.skipIgnorable();
    if (this.pos >= this.text.length) {
      throw new TreeFormatError('Empty Newick string', 0);
    }
    const root = this.parseSubtree();
    this.skipIgnorable();
    if (this.peek() !== ';') {
      throw new TreeFormatError(`Expected ';' at position ${this.pos}`, this.pos);
    }
    this.pos++;
    this.skipIgnorable();
    if (this.pos < this.text.length) {
      throw new TreeFormatError(`Unexpected text after ';' at position ${this.pos}`, this.pos);
    }
    return root;
  }

  private parseSubtree(): TreeNode {
    const children: TreeNode[] = [];
    this.skipIgnorable();

    if (this.peek() === '(') {
      this.pos++;
      children.push(this.parseSubtree());
      this.skipIgnorable();
      while (this.peek() === ',') {
        this.pos++;
        children.push(this.parseSubtree());
        this.skipIgnorable();
      }
      if (this.peek() !== ')') {
        throw new TreeFormatError(`Expected ')' at position ${this.pos}`, this.pos);
      }
      this.pos++;
    }

    this.skipIgnorable();
    const label = this.parseLabel();
    this.skipIgnorable();

    let branchLength: number | null = null;
    if (this.peek() === ':') {
      this.pos++;
      branchLength = this.parseLength();
    }

    return { label, branchLength, children };
  }

  private parseLabel(): string | null {
    if (this.peek() === "'") return this.parseQuoted();

    const start = this.pos;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (PUNCTUATION.has(ch) || /\s/.test(ch)) break;
      this.pos++;
    }
    return this.pos > start ? this.text.slice(start, this.pos) : null;
  }

  private parseQuoted(): string {
    const start = this.pos;
    this.pos++;
    let out = '';
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === "'") {
        if (this.text[this.pos + 1] === "'") {
          out += "'";
          this.pos += 2;
          continue;
        }
        this.pos++;
        return out;
      }
      out += ch;
      this.pos++;
    }
    throw new TreeFormatError(`Unterminated quoted label starting at position ${start}`, start);
  }

  private parseLength(): number {
    this.skipIgnorable();
    const match = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(this.text.slice(this.pos));
    if (!match) {
      throw new TreeFormatError(`Invalid branch length at position ${this.pos}`, this.pos);
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private skipIgnorable(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (/\s/.test(ch)) {
        this.pos++;
      } else if (ch === '[') {
        const end = this.text.indexOf(']', this.pos);
        if (end === -1) {
          throw new TreeFormatError(`Unterminated comment at position ${this.pos}`, this.pos);
        }
        this.pos = end + 1;
      } else {
        return;
      }
    }
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }
}
