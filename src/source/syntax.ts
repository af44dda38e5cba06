/**
 * Parsing and syntax validation for TypeScript source text
 */

import crypto from 'node:crypto';
import { Project, ts, type SourceFile } from 'ts-morph';

export interface SyntaxProblem {
  message: string;
  line?: number;
  column?: number;
}

/**
 * Parse `content` as `fileName` into a SourceFile of its own in-memory project.
 * A later parse of the same path leaves earlier SourceFiles untouched.
 */
export function parseSourceFile(fileName: string, content: string): SourceFile {
  const project = new Project({
    useInMemoryFileSystem: true,
    skipAddingFilesFromTsConfig: true,
    compilerOptions: {
      allowJs: false,
      noLib: true,
      noResolve: true,
      skipLibCheck: true,
      noEmit: true,
    },
  });
  return project.createSourceFile(fileName, content, { overwrite: true });
}

/**
 * Report syntax errors of a parsed file. No type checking is done.
 */
export function findSyntaxErrors(sourceFile: SourceFile): SyntaxProblem[] {
  const diagnostics = sourceFile.getProject().getProgram().getSyntacticDiagnostics(sourceFile);

  const problems: SyntaxProblem[] = [];
  for (const diagnostic of diagnostics) {
    if (diagnostic.getCategory() !== ts.DiagnosticCategory.Error) continue;

    const message = ts.flattenDiagnosticMessageText(diagnostic.compilerObject.messageText, '\n');
    const start = diagnostic.getStart();
    if (start !== undefined) {
      const { line, column } = sourceFile.getLineAndColumnAtPos(start);
      problems.push({ message, line, column });
    } else {
      problems.push({ message });
    }
  }
  return problems;
}

/**
 * Content fingerprint used as cache version
 */
export function fingerprint(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}
