/**
 * SignatureProvider - parsed Python modules keyed by file path.
 *
 * Text comes from the editor when the file is open there, otherwise from
 * disk. Each entry is valid for one fingerprint: a content checksum for open
 * files, modification time and size for files on disk.
 */
import type Parser from 'tree-sitter';
import { FingerprintCache } from '../cache/fingerprint-cache.js';
import type { CacheStats } from '../cache/types.js';
import { computeChecksum } from '../../utils/checksum.js';
import { errorMessage } from '../../utils/errors.js';
import { getStats, readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { createPythonParser, parsePythonModule } from './python-parser.js';
import type { ParsedModule } from './types.js';

/** Returns the editor's text for a file path when the file is open. */
export type OpenTextLookup = (filePath: string) => string | undefined;

const log = logger.child('signatures');

export class SignatureProvider {
  private readonly cache = new FingerprintCache<string, ParsedModule>();
  private parser: Parser | null = null;

  constructor(private readonly openText: OpenTextLookup = () => undefined) {}

  /**
   * Parsed module for `filePath`, from cache when its fingerprint still
   * matches. A file that cannot be read comes back as a parse failure.
   */
  async load(filePath: string): Promise<ParsedModule> {
    const open = this.openText(filePath);
    let text: string;
    let fingerprint: string;

    if (open !== undefined) {
      text = open;
      fingerprint = `doc:${computeChecksum(open)}`;
      const cached = this.cache.get(filePath, fingerprint);
      if (cached) return cached;
    } else {
      try {
        const stats = await getStats(filePath);
        fingerprint = `fs:${stats.mtimeMs}:${stats.size}`;
        const cached = this.cache.get(filePath, fingerprint);
        if (cached) return cached;
        text = await readFile(filePath);
      } catch (error) {
        log.warn(`Cannot read ${filePath}: ${errorMessage(error)}`);
        return { status: 'parse-error', filePath, message: `Cannot read file: ${errorMessage(error)}`, range: null };
      }
    }

    let parsed: ParsedModule;
    try {
      parsed = parsePythonModule(this.getParser(), text, filePath);
    } catch (error) {
      log.warn(`Cannot parse ${filePath}: ${errorMessage(error)}`);
      return { status: 'parse-error', filePath, message: `Parser failed: ${errorMessage(error)}`, range: null };
    }
    if (parsed.status === 'parse-error') {
      log.debug(`${filePath}: ${parsed.message}`);
    }
    this.cache.set(filePath, fingerprint, parsed);
    return parsed;
  }

  /** Drops the entry for one file. */
  invalidate(filePath: string): void {
    this.cache.delete(filePath);
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): CacheStats {
    return this.cache.getStats();
  }

  private getParser(): Parser {
    this.parser ??= createPythonParser();
    return this.parser;
  }
}
