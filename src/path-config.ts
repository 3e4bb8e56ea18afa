import * as os from 'os';
import SemanticReleaseError from '@semantic-release/error';
import { FileSystem, nodeFileSystem } from './file-system.js';

/**
 * Diagnostics sink. Any `console`-shaped object fits, including a
 * `node:console` `Console` bound to custom streams.
 */
export interface Logger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface ScopedPathOptions {
  /**
   * Base directory for temporary paths. Default is `os.tmpdir()`.
   */
  directory?: string;

  /**
   * Name prefix for temporary paths. Default is `"scoped-"`. Must not
   * be empty or contain a path separator.
   */
  prefix?: string;

  /**
   * Receives a line for every removal and for every cleanup failure.
   * When omitted, cleanup is silent.
   */
  logger?: Logger;

  /**
   * Filesystem primitives used for removal. Default binds to `node:fs`.
   */
  fileSystem?: FileSystem;
}

const DEFAULT_PREFIX = 'scoped-';

/**
 * ScopedPathConfig wraps the raw options and exposes them with their
 * defaults applied, so every handle reads options the same way.
 */
export class ScopedPathConfig {
  private readonly opts: ScopedPathOptions;

  constructor(opts: ScopedPathOptions = {}) {
    this.opts = opts;
  }

  /**
   * The options as given, for handing on to a new handle.
   */
  getOptions(): ScopedPathOptions {
    return this.opts;
  }

  /**
   * Directory that temporary paths are created under.
   *
   * @returns Directory path.
   */
  getDirectory(): string {
    return this.opts.directory ?? os.tmpdir();
  }

  /**
   * Prefix for temporary path names.
   *
   * @returns The configured prefix or `"scoped-"`.
   * @throws SemanticReleaseError (`EINVALIDPREFIX`) when the prefix is
   * empty or contains a path separator.
   */
  getPrefix(): string {
    const prefix = this.opts.prefix ?? DEFAULT_PREFIX;
    if (prefix.length === 0 || /[\\/]/.test(prefix)) {
      throw new SemanticReleaseError(
        'Invalid temporary path prefix.',
        'EINVALIDPREFIX',
        `The prefix ${JSON.stringify(prefix)} must be non-empty and must not contain a path separator.`,
      );
    }
    return prefix;
  }

  getLogger(): Logger | undefined {
    return this.opts.logger;
  }

  getFileSystem(): FileSystem {
    return this.opts.fileSystem ?? nodeFileSystem;
  }
}
