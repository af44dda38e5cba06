/**
 * Comment extraction and annotation splitting
 */

import { ts, type Node } from 'ts-morph';

export interface CommentLines {
  docs: string[];
  annotations: string[];
}

/**
 * Text of the comment group directly attached above `node`.
 * Comments separated from the node (or from each other) by a blank line are
 * not part of the group.
 */
export function leadingComment(node: Node): string {
  const text = node.getSourceFile().getFullText();
  const ranges = ts.getLeadingCommentRanges(text, node.getPos()) ?? [];
  const attached: ts.CommentRange[] = [];

  let next = node.getStart();
  for (let i = ranges.length - 1; i >= 0; i--) {
    const range = ranges[i];
    if (!range || hasBlankLine(text.slice(range.end, next))) {
      break;
    }
    attached.unshift(range);
    next = range.pos;
  }

  return attached.map(range => commentText(text.slice(range.pos, range.end))).join('\n');
}

/**
 * Text of the comments on the same line after `node`. A single `,` or `;`
 * separator right after the node is skipped.
 */
export function trailingComment(node: Node): string {
  const text = node.getSourceFile().getFullText();
  let end = node.getEnd();
  const rest = /^[ \t]*[,;]/.exec(text.slice(end, end + 256));
  if (rest) {
    end += rest[0].length;
  }
  const ranges = ts.getTrailingCommentRanges(text, end) ?? [];
  return ranges.map(range => commentText(text.slice(range.pos, range.end))).join('\n');
}

/**
 * Strip comment markers: `//`, `/*`, `*\/` and JSDoc `*` gutters.
 * One space after a line comment marker is dropped.
 */
export function commentText(raw: string): string {
  if (raw.startsWith('//')) {
    return raw.slice(2).replace(/^ /, '').trimEnd();
  }

  let body = raw.replace(/^\/\*/, '').replace(/\*\/$/, '');
  if (body.startsWith('*')) {
    body = body.slice(1);
  }

  return body
    .split(/\r?\n/)
    .map(line => line.replace(/^\s*\*(?!\/) ?/, '').trimEnd())
    .join('\n');
}

/**
 * Split comment texts into documentation lines and annotation lines.
 * Each text is trimmed and split by line; a line whose trimmed text starts
 * with `prefix` becomes an annotation with the prefix removed. Relative order
 * is kept within each bucket. Without a prefix every line is documentation.
 */
export function splitComments(prefix: string, ...texts: string[]): CommentLines {
  const lines: string[] = [];
  for (const text of texts) {
    const trimmed = collapseBlankLines(text).trim();
    if (trimmed.length === 0) continue;
    lines.push(...trimmed.split('\n'));
  }

  if (prefix.length === 0) {
    return { docs: lines, annotations: [] };
  }

  const docs: string[] = [];
  const annotations: string[] = [];
  for (const line of lines) {
    const candidate = line.trim();
    if (candidate.startsWith(prefix)) {
      annotations.push(candidate.slice(prefix.length));
    } else {
      docs.push(line);
    }
  }
  return { docs, annotations };
}

/**
 * Comments of a node split into docs and annotations: the attached leading
 * group followed by the trailing same-line comments.
 */
export function nodeComments(prefix: string, node: Node): CommentLines {
  return splitComments(prefix, leadingComment(node), trailingComment(node));
}

function hasBlankLine(between: string): boolean {
  return /\n[ \t]*\r?\n/.test(between);
}

function collapseBlankLines(text: string): string {
  return text.replace(/\n([ \t]*\n)+/g, '\n\n');
}
