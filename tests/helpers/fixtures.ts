/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  readFile: (relativePath: string) => string;
  removeFile: (relativePath: string) => void;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = fs.realpathSync(
    fs.mkdtempSync(path.join(os.tmpdir(), 'annokit-project-'))
  );

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const readFile = (relativePath: string): string => {
    return fs.readFileSync(path.join(rootDir, relativePath), 'utf-8');
  };

  const removeFile = (relativePath: string): void => {
    const filePath = path.join(rootDir, relativePath);
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
    }
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, readFile, removeFile, getFilePath };
}

/**
 * package.json content declaring a module name
 */
export function packageJson(name: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ name, version: '1.0.0', ...extra }, null, 2);
}
