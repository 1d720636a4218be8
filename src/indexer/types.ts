/**
 * File Discovery Types
 *
 * Type definitions for the document scanner: which files are picked up,
 * how they are classified, and what the scan reports back.
 */

/**
 * Document formats docent can extract text from.
 */
export type DocumentType = 'markdown' | 'text' | 'html' | 'pdf';

/**
 * Extension (with dot, lowercase) → document type.
 */
export const EXTENSION_TYPES: Readonly<Record<string, DocumentType>> = Object.freeze({
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.mdx': 'markdown',
  '.txt': 'text',
  '.text': 'text',
  '.rst': 'text',
  '.html': 'html',
  '.htm': 'html',
  '.pdf': 'pdf',
});

/**
 * Classify a file extension. Returns undefined for unsupported types.
 */
export function getDocumentType(extension: string): DocumentType | undefined {
  return EXTENSION_TYPES[extension.toLowerCase()];
}

/**
 * Metadata about a discovered file.
 */
export interface FileInfo {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root directory */
  relativePath: string;

  /** Lowercase extension including the dot (e.g. '.md') */
  extension: string;

  type: DocumentType;

  /** File size in bytes */
  size: number;

  /** Last modified timestamp (ISO 8601) */
  modifiedAt: string;
}

/**
 * Options for configuring the file scanner.
 */
export interface ScanOptions {
  /**
   * Only include files with these extensions (with dot).
   * Extensions with no known DocumentType are ignored.
   * @default all keys of EXTENSION_TYPES
   */
  extensions?: string[];

  /**
   * Additional gitignore-style patterns (merged with .gitignore).
   * @example ['drafts/', '*.tmp']
   */
  additionalIgnorePatterns?: string[];

  /** Skip files larger than this many bytes */
  maxFileSize?: number;

  /** @default false */
  followSymlinks?: boolean;

  /** Called when a file is skipped because its metadata cannot be read */
  onError?: (path: string, error: Error) => void;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface ScanStats {
  totalFiles: number;
  totalSize: number;
  byType: Record<DocumentType, number>;
  scanDurationMs: number;
}

export interface ScanResult {
  /** Absolute path of the scanned root */
  rootPath: string;
  files: FileInfo[];
  /** Files matched by extension but left out (too large, unreadable) */
  skipped: SkippedFile[];
  stats: ScanStats;
}

/**
 * Directories and files never worth ingesting.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  '.git',
  '.svn',
  '.hg',
  'node_modules',
  'vendor',
  '.venv',
  'venv',
  '__pycache__',
  'dist',
  'build',
  'out',
  'target',
  '.next',
  '.cache',
  'coverage',
  '.idea',
  '.vscode',
  '.DS_Store',
  'Thumbs.db',
  'CHANGELOG.md',
];
