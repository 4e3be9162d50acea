import { readdir, stat } from 'fs/promises';
import { extname, join, normalize, relative } from 'path';

export interface PdfFileInfo {
  filePath: string;
  fileName: string;
  /** Path below the scanned directory; equals `fileName` for top-level files */
  relativePath: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface SkippedFile {
  /** Path below the scanned directory */
  fileName: string;
  reason: string;
}

export interface ScanResult {
  files: PdfFileInfo[];
  skipped: SkippedFile[];
  directoryPath: string;
}

export interface ScanOptions {
  /** Also list PDFs in subdirectories, at any depth (default: false) */
  recursive?: boolean;
}

export type DirectoryCheck = { valid: true } | { valid: false; error: string };

/**
 * List the statement PDFs inside a directory, and with `recursive` in its
 * subdirectories too. Office lock files (`~$…`), dot files and empty files
 * are reported as skipped. Files come back sorted by their path below the
 * directory so batches run in a stable order. Symbolic links are not
 * followed.
 */
export async function scanDirectoryForPdfs(directoryPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const root = normalize(directoryPath);
  const files: PdfFileInfo[] = [];
  const skipped: SkippedFile[] = [];

  const visit = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const entryPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (options.recursive === true) await visit(entryPath);
        continue;
      }
      if (!entry.isFile()) continue;

      const fileName = entry.name;
      if (extname(fileName).toLowerCase() !== '.pdf') continue;

      const relativePath = relative(root, entryPath);
      if (fileName.startsWith('~$') || fileName.startsWith('.')) {
        skipped.push({ fileName: relativePath, reason: 'Temporary or hidden file' });
        continue;
      }

      const info = await stat(entryPath);
      if (info.size === 0) {
        skipped.push({ fileName: relativePath, reason: 'Zero-byte file' });
        continue;
      }

      files.push({ filePath: entryPath, fileName, relativePath, sizeBytes: info.size, modifiedAt: info.mtime });
    }
  };

  await visit(root);

  files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return { files, skipped, directoryPath: root };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export async function validateDirectory(directoryPath: string): Promise<DirectoryCheck> {
  const root = normalize(directoryPath);
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${root}` };
    }
    return { valid: true };
  } catch (error) {
    switch (errorCode(error)) {
      case 'ENOENT':
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      case 'EACCES':
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      default:
        return { valid: false, error: `Cannot access directory: ${directoryPath}` };
    }
  }
}
