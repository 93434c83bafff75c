import { InternalCompilerError } from '../diagnostics/errors.js';
import type { SlateType } from '../frontend/ast.js';

/**
 * Static type of an expression; `error` marks a sub-expression that has already been reported.
 */
export type ExprType = SlateType | 'error';

export interface ParamSignature {
  name: string;
  type: SlateType;
}

/**
 * What a name is bound to in one frame.
 *
 * For functions `type` is the return type.
 */
export interface IdentifierRecord {
  kind: 'variable' | 'function';
  type: SlateType;
  params?: ParamSignature[];
  initialized: boolean;
}

interface Frame {
  parent?: number;
  returnType?: SlateType;
  bindings: Map<string, IdentifierRecord>;
}

/**
 * Nested lexical scopes, stored as an arena of frames addressed by index.
 *
 * Frame 0 is the global frame. Popped frames stay in the arena; only the current index moves.
 */
export class ScopeChain {
  private readonly frames: Frame[] = [{ bindings: new Map() }];
  private current = 0;

  private frame(index: number): Frame {
    const f = this.frames[index];
    if (!f) throw new InternalCompilerError(`Scope frame ${index} does not exist.`);
    return f;
  }

  /** Frames from the current one outward to the global frame. */
  private *chain(): Generator<Frame> {
    let index: number | undefined = this.current;
    while (index !== undefined) {
      const f = this.frame(index);
      yield f;
      index = f.parent;
    }
  }

  /** Enter a new frame; pass `returnType` when the frame is a function body. */
  push(returnType?: SlateType): void {
    this.frames.push({
      parent: this.current,
      ...(returnType ? { returnType } : {}),
      bindings: new Map(),
    });
    this.current = this.frames.length - 1;
  }

  pop(): void {
    const parent = this.frame(this.current).parent;
    if (parent === undefined) throw new InternalCompilerError('Cannot pop the global scope.');
    this.current = parent;
  }

  get atGlobal(): boolean {
    return this.current === 0;
  }

  /** Bind `name` in the current frame, replacing any record it already has there. */
  declare(name: string, record: IdentifierRecord): void {
    this.frame(this.current).bindings.set(name, record);
  }

  lookup(name: string): IdentifierRecord | undefined {
    for (const f of this.chain()) {
      const r = f.bindings.get(name);
      if (r) return r;
    }
    return undefined;
  }

  isDeclaredInScope(name: string): boolean {
    return this.frame(this.current).bindings.has(name);
  }

  isDeclared(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  isInitialized(name: string): boolean {
    return this.lookup(name)?.initialized ?? false;
  }

  isFunction(name: string): boolean {
    return this.lookup(name)?.kind === 'function';
  }

  typeOf(name: string): ExprType {
    return this.lookup(name)?.type ?? 'error';
  }

  paramsOf(name: string): ParamSignature[] | undefined {
    return this.lookup(name)?.params;
  }

  /** Mark the nearest binding of `name` initialized. */
  initialize(name: string): void {
    const r = this.lookup(name);
    if (r) r.initialized = true;
  }

  /** Return type of the nearest enclosing function frame. */
  returnType(): SlateType | undefined {
    for (const f of this.chain()) {
      if (f.returnType) return f.returnType;
    }
    return undefined;
  }

  /**
   * Names of `kind` visible from the current frame: innermost frame first, declaration order within
   * a frame, shadowed names listed once.
   */
  visibleNames(kind: IdentifierRecord['kind']): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const f of this.chain()) {
      for (const [name, r] of f.bindings) {
        if (seen.has(name)) continue;
        seen.add(name);
        if (r.kind === kind) out.push(name);
      }
    }
    return out;
  }
}
