import { ScopedPathOptions } from './path-config.js';
import { ScopedPath, ScopedPathLike } from './scoped-path.js';

/**
 * Runs `fn` with `target` wrapped in a {@link ScopedPath} and removes
 * the entry once `fn` settles, whether it returns or throws. For code
 * that does not use `using` declarations.
 *
 * Usage with Jest:
 * ```ts
 * it('writes a report', () =>
 *   withScopedPath(ScopedPath.temp(), async (out) => {
 *     await writeReport(out.path);
 *     expect(fs.existsSync(out.path)).toBe(true);
 *   }));
 * ```
 *
 * @param target Path to own. A `ScopedPath` is moved in.
 * @param fn Body that receives the handle. Calling `hold()` on it keeps
 * the entry.
 * @param options Options for the handle. A moved-in `ScopedPath` keeps
 * its own when these are omitted.
 * @returns Whatever `fn` returns.
 */
export async function withScopedPath<T>(
  target: ScopedPathLike,
  fn: (handle: ScopedPath) => T | Promise<T>,
  options?: ScopedPathOptions,
): Promise<T> {
  const handle = new ScopedPath(target, options);
  try {
    return await fn(handle);
  } finally {
    handle.dispose();
  }
}
