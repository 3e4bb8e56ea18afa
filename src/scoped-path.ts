import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import SemanticReleaseError from '@semantic-release/error';
import { removePath, statEntry } from './file-system.js';
import { ScopedPathConfig, ScopedPathOptions } from './path-config.js';

/**
 * Anything a scoped path can be built from. A `URL` must use the
 * `file:` scheme.
 */
export type ScopedPathLike = string | URL | ScopedPath;

let tempCounter = 0;

/**
 * Converts a `file:` URL or plain string to a path string.
 *
 * @throws SemanticReleaseError (`EINVALIDPATH`) for any other URL scheme.
 */
function toPathString(target: string | URL): string {
  if (typeof target === 'string') {
    return target;
  }
  if (target.protocol !== 'file:') {
    throw new SemanticReleaseError(
      'Only file URLs can be scoped.',
      'EINVALIDPATH',
      `Cannot convert ${target.href} to a local path.`,
    );
  }
  return fileURLToPath(target);
}

/**
 * A path that removes whatever sits at it when its owner goes out of
 * scope. Bind it with `using` and the file, or the directory with all
 * of its contents, is gone once the block exits, however it exits:
 *
 * ```ts
 * {
 *   using tmp = ScopedPath.temp();
 *   fs.mkdirSync(tmp.path);
 *   fs.writeFileSync(tmp.join('data.json'), '{}');
 * } // tmp and data.json are removed here
 * ```
 *
 * Cleanup on scope exit is best effort. A failure is written to the
 * configured logger, if any, and never thrown. Call `delete()` instead
 * when the failure matters.
 *
 * Nothing touches the filesystem at construction; the entry need not
 * exist until removal, and a missing entry at removal is not an error.
 */
export class ScopedPath implements Disposable {
  private readonly target: string;
  private readonly config: ScopedPathConfig;
  private armed: boolean;

  /**
   * Wraps `target` and arms it for removal. Wrapping another
   * `ScopedPath` takes over its ownership instead: the source is
   * disarmed, the new handle is armed only if the source still was,
   * and the source's options carry over unless `options` are given.
   */
  constructor(target: ScopedPathLike, options?: ScopedPathOptions) {
    if (target instanceof ScopedPath) {
      this.config = options ? new ScopedPathConfig(options) : target.config;
      this.armed = target.armed;
      this.target = target.hold();
    } else {
      this.config = new ScopedPathConfig(options);
      this.armed = true;
      this.target = toPathString(target);
    }
  }

  /**
   * A fresh path in the configured temp directory. Names follow
   * `<prefix><pid>-<counter>` and are unique within the process;
   * nothing is created on disk.
   */
  static temp(options?: ScopedPathOptions): ScopedPath {
    const config = new ScopedPathConfig(options);
    tempCounter += 1;
    const name = `${config.getPrefix()}${process.pid}-${tempCounter}`;
    return new ScopedPath(
      path.join(config.getDirectory(), name),
      config.getOptions(),
    );
  }

  /**
   * Same as {@link ScopedPath.temp}, under `directory`.
   */
  static tempIn(directory: string, options?: ScopedPathOptions): ScopedPath {
    return ScopedPath.temp({ ...options, directory });
  }

  /**
   * Copies `source` into a fresh temp path. Handy for tests that
   * mutate a fixture and must leave the original alone.
   *
   * @param source File to copy.
   * @param options Options for the new temp path.
   * @returns Armed handle to the copy.
   * @throws SemanticReleaseError (`ECOPYFAILED`) when the copy fails.
   */
  static fromFile(source: string, options?: ScopedPathOptions): ScopedPath {
    const handle = ScopedPath.temp(options);
    try {
      fs.copyFileSync(source, handle.target);
    } catch (err: unknown) {
      handle.dispose();
      throw new SemanticReleaseError(
        `Failed to copy ${source}`,
        'ECOPYFAILED',
        err instanceof Error ? err.message : 'Unknown error',
      );
    }
    return handle;
  }

  /**
   * Writes `data` to a fresh temp path.
   */
  static withContents(
    data: string | Uint8Array,
    options?: ScopedPathOptions,
  ): ScopedPath {
    const handle = ScopedPath.temp(options);
    fs.writeFileSync(handle.target, data);
    return handle;
  }

  /** The wrapped path. */
  get path(): string {
    return this.target;
  }

  /** False once the handle was held, moved, deleted or disposed. */
  get isArmed(): boolean {
    return this.armed;
  }

  join(...segments: string[]): string {
    return path.join(this.target, ...segments);
  }

  resolve(...segments: string[]): string {
    return path.resolve(this.target, ...segments);
  }

  relative(to: string): string {
    return path.relative(this.target, to);
  }

  basename(suffix?: string): string {
    return path.basename(this.target, suffix);
  }

  dirname(): string {
    return path.dirname(this.target);
  }

  extname(): string {
    return path.extname(this.target);
  }

  parse(): path.ParsedPath {
    return path.parse(this.target);
  }

  isAbsolute(): boolean {
    return path.isAbsolute(this.target);
  }

  /**
   * Whether an entry is at the path. A dangling symlink counts; a path
   * under a regular file does not. Other stat failures, such as EACCES
   * on a parent, are thrown.
   */
  exists(): boolean {
    return statEntry(this.target, this.config.getFileSystem()) !== undefined;
  }

  /**
   * Disarms the handle for good and returns the plain path. The entry
   * stays on disk.
   */
  hold(): string {
    this.armed = false;
    return this.target;
  }

  /**
   * Hands ownership to a new handle. The new handle takes over this
   * one's armed state and this one is disarmed, so returning
   * `tmp.move()` out of a `using` block keeps the entry alive for the
   * caller. Moving a held handle yields a held handle.
   */
  move(): ScopedPath {
    return new ScopedPath(this);
  }

  /**
   * Removes the entry now and disarms the handle.
   *
   * @throws SemanticReleaseError (`EDELETEFAILED`) when removal fails.
   * A missing entry is not a failure.
   */
  delete(): void {
    this.armed = false;
    let removed: boolean;
    try {
      removed = removePath(this.target, this.config.getFileSystem());
    } catch (err: unknown) {
      throw new SemanticReleaseError(
        `Failed to delete ${this.target}`,
        'EDELETEFAILED',
        err instanceof Error ? err.message : 'Unknown error',
      );
    }
    if (removed) {
      this.report('log', `Removed ${this.target}`);
    }
  }

  /**
   * Removes the entry if the handle is still armed. Runs at most once;
   * never throws, not even when the logger does.
   */
  dispose(): void {
    if (!this.armed) {
      return;
    }
    this.armed = false;

    let removed = false;
    try {
      removed = removePath(this.target, this.config.getFileSystem());
    } catch (err: unknown) {
      this.report('error', `Failed to remove ${this.target}`);
      this.report('error', err instanceof Error ? err.message : String(err));
    }
    if (removed) {
      this.report('log', `Removed ${this.target}`);
    }
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  toString(): string {
    return this.target;
  }

  valueOf(): string {
    return this.target;
  }

  toJSON(): string {
    return this.target;
  }

  [Symbol.toPrimitive](): string {
    return this.target;
  }

  private report(channel: 'log' | 'error', line: string): void {
    const logger = this.config.getLogger();
    if (!logger) {
      return;
    }
    try {
      logger[channel](line);
    } catch {
      // A failing logger is not a removal failure.
    }
  }
}
