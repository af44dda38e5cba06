/**
 * Source patch engine - staged node replacements and import additions,
 * applied to files on disk in one pass per file
 */

import fs from 'node:fs';
import path from 'node:path';
import { ts, type FormatCodeSettings, type Node, type SourceFile } from 'ts-morph';
import { PatchError, errorMessage } from '../errors.js';
import { placeImports, renderImport, type ImportList } from '../source/imports.js';
import { findSyntaxErrors, parseSourceFile } from '../source/syntax.js';

export const FORMAT_SETTINGS: FormatCodeSettings = {
  indentSize: 2,
  tabSize: 2,
  convertTabsToSpaces: true,
};

export interface Replacement {
  start: number;
  end: number;
  /** Source text of the node when the replacement was staged */
  original: string;
  text: string;
}

interface Splice {
  start: number;
  end: number;
  text: string;
}

export class FileEdit {
  /** Import list whose added entries are written into the file's imports; null adds none */
  imports: ImportList | null = null;
  readonly replacements: Replacement[] = [];

  constructor(readonly path: string) {}

  /**
   * Stage `text` in place of `node`. The node's extent is recorded now;
   * a later replacement of the same node overrides the earlier one.
   */
  replace(node: Node, text: string): void {
    const start = node.getStart();
    const end = node.getEnd();
    const index = this.replacements.findIndex(r => r.start === start && r.end === end);
    const replacement = { start, end, original: node.getText(), text };

    if (index >= 0) {
      this.replacements[index] = replacement;
    } else {
      this.replacements.push(replacement);
    }
  }

  /**
   * Rewrite the file with every staged edit, or fail and leave it untouched.
   * Returns false when the result equals the current content and nothing was written.
   */
  async apply(): Promise<boolean> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.path, 'utf-8');
    } catch (error) {
      throw new PatchError(`Cannot read ${this.path}: ${errorMessage(error)}`, { filePath: this.path }, { cause: error });
    }

    const buffer = this.render(content);

    const sourceFile = parseSourceFile(this.path, buffer);
    const problems = findSyntaxErrors(sourceFile);
    const first = problems[0];
    if (first) {
      throw new PatchError(
        `Patched ${this.path} does not parse: ${first.message}`,
        { filePath: this.path, line: first.line },
        { buffer }
      );
    }

    let formatted: string;
    try {
      formatted = formatSource(sourceFile);
    } catch (error) {
      throw new PatchError(`Cannot format ${this.path}: ${errorMessage(error)}`, { filePath: this.path }, { cause: error, buffer });
    }

    if (formatted === content) {
      return false;
    }
    await writeAtomic(this.path, formatted);
    return true;
  }

  /**
   * Splice staged edits into `content` without formatting
   */
  render(content: string): string {
    const edits: Splice[] = this.replacements.map(r => {
      const current = content.slice(r.start, r.end);
      if (current !== r.original) {
        throw new PatchError(`${this.path} changed since the edit was staged`, {
          filePath: this.path,
          start: r.start,
          expected: r.original,
          found: current,
        });
      }
      return { start: r.start, end: r.end, text: r.text };
    });

    if (this.imports) {
      edits.push(...importEdits(this.path, content, this.imports));
    }

    edits.sort((a, b) => a.start - b.start || a.end - b.end);
    for (let i = 1; i < edits.length; i++) {
      const previous = edits[i - 1];
      const current = edits[i];
      if (previous && current && current.start < previous.end) {
        throw new PatchError(`Overlapping edits in ${this.path} at offset ${current.start}`, {
          filePath: this.path,
          start: current.start,
        });
      }
    }

    let output = content;
    for (let i = edits.length - 1; i >= 0; i--) {
      const edit = edits[i];
      if (edit) {
        output = output.slice(0, edit.start) + edit.text + output.slice(edit.end);
      }
    }
    return output;
  }
}

export class ModifySet {
  private edits = new Map<string, FileEdit>();

  /**
   * Edit of a file, created on first use
   */
  add(filePath: string): FileEdit {
    const absolutePath = path.resolve(filePath);
    let edit = this.edits.get(absolutePath);
    if (!edit) {
      edit = new FileEdit(absolutePath);
      this.edits.set(absolutePath, edit);
    }
    return edit;
  }

  get(filePath: string): FileEdit | undefined {
    return this.edits.get(path.resolve(filePath));
  }

  get size(): number {
    return this.edits.size;
  }

  /**
   * Apply every file edit in the order the files were added and return the
   * paths whose content changed. The first failure stops the session; files
   * already written stay written.
   */
  async apply(): Promise<string[]> {
    const written: string[] = [];
    for (const edit of this.edits.values()) {
      if (await edit.apply()) {
        written.push(edit.path);
      }
    }
    return written;
  }
}

/**
 * Insertions writing the imports added to `imports` where `placeImports`
 * puts them. Existing import declarations and whatever lies between them
 * are kept as they are. Without imports the block goes before the first
 * statement, after any leading comment header.
 */
function importEdits(filePath: string, content: string, imports: ImportList): Splice[] {
  const added = imports.added();
  if (added.length === 0) {
    return [];
  }

  const sourceFile = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true);
  const declarations = sourceFile.statements.filter(ts.isImportDeclaration);

  const last = declarations[declarations.length - 1];
  if (!last) {
    const block = placeImports([], moduleSpecifier, () => false, added).after.map(renderImport).join('\n');
    const statement = sourceFile.statements[0];
    if (!statement) {
      const separator = content.length === 0 || content.endsWith('\n') ? '' : '\n';
      return [{ start: content.length, end: content.length, text: `${separator}${block}\n` }];
    }
    const start = statement.getStart(sourceFile);
    return [{ start, end: start, text: `${block}\n\n` }];
  }

  const { before, after } = placeImports(declarations, moduleSpecifier, declaration => !declaration.importClause, added);

  const splices: Splice[] = [];
  for (const [anchor, entries] of before) {
    const start = insertionPoint(sourceFile, content, anchor);
    splices.push({ start, end: start, text: entries.map(entry => `${renderImport(entry)}\n`).join('') });
  }
  if (after.length > 0) {
    // after the rest of the line, keeping a trailing comment with its import
    const newline = content.indexOf('\n', last.getEnd());
    const end = newline < 0 ? content.length : newline;
    splices.push({ start: end, end, text: after.map(entry => `\n${renderImport(entry)}`).join('') });
  }
  return splices;
}

function moduleSpecifier(declaration: ts.ImportDeclaration): string {
  return ts.isStringLiteral(declaration.moduleSpecifier) ? declaration.moduleSpecifier.text : '';
}

/**
 * Start of an import declaration together with the comments above it; the
 * comment header of the file stays first
 */
function insertionPoint(sourceFile: ts.SourceFile, content: string, declaration: ts.ImportDeclaration): number {
  if (declaration === sourceFile.statements[0]) {
    return declaration.getStart(sourceFile);
  }
  const comments = ts.getLeadingCommentRanges(content, declaration.pos);
  return comments?.[0]?.pos ?? declaration.getStart(sourceFile);
}

function formatSource(sourceFile: SourceFile): string {
  sourceFile.formatText(FORMAT_SETTINGS);
  return sourceFile.getFullText();
}

async function writeAtomic(filePath: string, content: string): Promise<void> {
  const temp = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    await fs.promises.writeFile(temp, content, 'utf-8');
    await fs.promises.rename(temp, filePath);
  } catch (error) {
    await fs.promises.rm(temp, { force: true });
    throw new PatchError(`Cannot write ${filePath}: ${errorMessage(error)}`, { filePath }, { cause: error });
  }
}
