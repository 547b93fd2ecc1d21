import { emitDiagnostic } from "./errors.js";
import type { SrcLoc } from "./srcloc.js";
import type { SVal } from "./values.js";

type Frame = {
  readonly name: string;
  /** `undefined` marks a deleted name. */
  readonly value: SVal | undefined;
};

/**
 * Persistent identifier scope. Every update returns a new environment that
 * shares its tail with the old one.
 */
export class Env {
  static readonly empty = new Env(undefined, undefined);

  private constructor(
    private readonly frame: Frame | undefined,
    private readonly parent: Env | undefined
  ) {}

  static fromEntries(
    at: SrcLoc,
    entries: Iterable<readonly [string, SVal]>
  ): Env {
    let env = Env.empty;
    for (const [name, value] of entries) {
      env = env.insert(at, name, value);
    }
    return env;
  }

  get(name: string): SVal | undefined {
    for (let env: Env | undefined = this; env; env = env.parent) {
      if (env.frame?.name === name) return env.frame.value;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  lookup(at: SrcLoc, name: string): SVal {
    const found = this.get(name);
    if (found === undefined) {
      return emitDiagnostic({
        at,
        code: "BD0001",
        params: { name, known: this.names() },
      });
    }
    return found;
  }

  /** Binds a fresh name. Rebinding anything already visible is an error. */
  insert(at: SrcLoc, name: string, value: SVal): Env {
    if (this.has(name)) {
      return emitDiagnostic({ at, code: "BD0002", params: { name } });
    }
    return this.push(name, value);
  }

  /** Replaces a binding in place of whatever was there, without the shadowing check. */
  set(name: string, value: SVal): Env {
    return this.push(name, value);
  }

  delete(name: string): Env {
    return this.has(name) ? this.push(name, undefined) : this;
  }

  /** Inserts every binding of `overlay`, in its order, under the insert-only rule. */
  merge(at: SrcLoc, overlay: Env): Env {
    let env: Env = this;
    for (const [name, value] of overlay.entries()) {
      env = env.insert(at, name, value);
    }
    return env;
  }

  /** Live bindings, oldest first. */
  entries(): [string, SVal][] {
    const seen = new Set<string>();
    const live: [string, SVal][] = [];
    for (let env: Env | undefined = this; env; env = env.parent) {
      const frame = env.frame;
      if (!frame || seen.has(frame.name)) continue;
      seen.add(frame.name);
      if (frame.value !== undefined) live.push([frame.name, frame.value]);
    }
    return live.reverse();
  }

  names(): string[] {
    return this.entries().map(([name]) => name);
  }

  get size(): number {
    return this.entries().length;
  }

  /** Bindings of this environment whose names are not bound in `base`. */
  difference(base: Env): Env {
    let env = Env.empty;
    for (const [name, value] of this.entries()) {
      if (!base.has(name)) env = env.push(name, value);
    }
    return env;
  }

  private push(name: string, value: SVal | undefined): Env {
    return new Env({ name, value }, this);
  }
}
