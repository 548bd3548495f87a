import { readFile, stat } from 'fs/promises';
import { isAbsolute, relative, resolve, sep } from 'path';
import fg from 'fast-glob';
import { AppError, Logger } from './logger.js';

const logger = new Logger({ context: 'corpus' });

export interface CorpusOptions {
  pattern?: string | string[];
  ignore?: string[];
}

/**
 * The directory tree of workflow JSON files. Source files stay the system
 * of record for full document content; the index only points back here.
 */
export class WorkflowCorpus {
  readonly rootPath: string;
  private readonly patterns: string[];
  private readonly ignore: string[];

  constructor(rootPath: string, options: CorpusOptions = {}) {
    this.rootPath = resolve(rootPath);
    const pattern = options.pattern ?? '**/*.json';
    this.patterns = Array.isArray(pattern) ? pattern : [pattern];
    this.ignore = options.ignore ?? ['**/node_modules/**'];
  }

  /**
   * Corpus-relative POSIX paths of every workflow file, sorted.
   */
  async listFiles(): Promise<string[]> {
    try {
      const rootStat = await stat(this.rootPath);
      if (!rootStat.isDirectory()) {
        throw new AppError(`Corpus path is not a directory: ${this.rootPath}`, 'INVALID_CORPUS_PATH', 400);
      }
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new AppError(`Corpus path not accessible: ${this.rootPath}`, 'INVALID_CORPUS_PATH', 400);
    }

    const files = await fg(this.patterns, {
      cwd: this.rootPath,
      onlyFiles: true,
      ignore: this.ignore,
      dot: false,
      followSymbolicLinks: false,
      unique: true,
      absolute: false,
    });

    return files.map(file => file.replace(/\\/g, '/')).sort();
  }

  /**
   * Absolute path for a corpus-relative path; refuses paths that escape the root.
   */
  resolvePath(relativePath: string): string {
    const absolutePath = resolve(this.rootPath, relativePath);
    const fromRoot = relative(this.rootPath, absolutePath);
    if (fromRoot === '' || fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      throw new AppError(`Path escapes the corpus root: ${relativePath}`, 'INVALID_CORPUS_PATH', 400);
    }
    return absolutePath;
  }

  /**
   * Raw text of a source file, or null when it is gone or unreadable.
   */
  async readText(relativePath: string): Promise<string | null> {
    try {
      return await readFile(this.resolvePath(relativePath), 'utf8');
    } catch (error) {
      logger.warn('Could not read workflow source', {
        path: relativePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Parsed source document, or null when it cannot be read or parsed.
   */
  async readDocument(relativePath: string): Promise<unknown> {
    const text = await this.readText(relativePath);
    if (text === null) return null;
    try {
      const parsed: unknown = JSON.parse(text.replace(/^\uFEFF/, ''));
      return parsed;
    } catch (error) {
      logger.warn('Workflow source is not valid JSON', {
        path: relativePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
