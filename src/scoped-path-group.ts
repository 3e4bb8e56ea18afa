import { ScopedPathOptions } from './path-config.js';
import { ScopedPath, ScopedPathLike } from './scoped-path.js';

/**
 * Owns several scoped paths and removes them together, newest first,
 * when the group itself is disposed. A failing member does not stop
 * the rest: each one follows the best-effort policy of
 * {@link ScopedPath.dispose}.
 */
export class ScopedPathGroup implements Disposable {
  private readonly options: ScopedPathOptions | undefined;
  private members: ScopedPath[] = [];

  /**
   * @param options Applied to every path the group wraps or creates. A
   * `ScopedPath` handed to `add` keeps its own options.
   */
  constructor(options?: ScopedPathOptions) {
    this.options = options;
  }

  get size(): number {
    return this.members.length;
  }

  /**
   * Takes ownership of `target`. A `ScopedPath` is moved into the
   * group, so disposing the original no longer removes anything.
   *
   * @returns The handle the group now owns.
   */
  add(target: ScopedPathLike): ScopedPath {
    const owned =
      target instanceof ScopedPath
        ? target.move()
        : new ScopedPath(target, this.options);
    this.members.push(owned);
    return owned;
  }

  /**
   * Creates a temp path with the group's options and adds it.
   */
  temp(): ScopedPath {
    return this.add(ScopedPath.temp(this.options));
  }

  /**
   * Disarms every member and empties the group.
   *
   * @returns Member paths in the order they were added.
   */
  hold(): string[] {
    const held = this.members.map((member) => member.hold());
    this.members = [];
    return held;
  }

  dispose(): void {
    const members = this.members;
    this.members = [];
    for (let i = members.length - 1; i >= 0; i--) {
      members[i].dispose();
    }
  }

  [Symbol.dispose](): void {
    this.dispose();
  }
}
