/**
 * Static scope analysis shared by the binding rules.
 *
 * Every `let` binds in the frame it runs in: the top level, or the body
 * of the nearest enclosing lambda. Names are visible anywhere in their
 * frame, before or after the `let`, the same way forward references
 * resolve at run time.
 */

import { Expression, Span, specialFormOf } from '../../interpreter/src';

export interface Binding {
  name: string;
  kind: 'let' | 'parameter';
  line: number;
  column: number;
  used: boolean;
}

export interface Reference {
  name: string;
  line: number;
  column: number;
  /** Bindings the name resolves to, or null when nothing in the program binds it. */
  bindings: Binding[] | null;
}

export interface ScopeAnalysis {
  bindings: Binding[];
  references: Reference[];
}

class Scope {
  private names = new Map<string, Binding[]>();

  constructor(private parent: Scope | null) {}

  declare(binding: Binding): void {
    const existing = this.names.get(binding.name);
    if (existing) {
      existing.push(binding);
    } else {
      this.names.set(binding.name, [binding]);
    }
  }

  resolve(name: string): Binding[] | null {
    const own = this.names.get(name);
    if (own) return own;
    return this.parent !== null ? this.parent.resolve(name) : null;
  }
}

export function spanOf(node: Expression): Span {
  return node.span ?? { line: 1, column: 0 };
}

export function analyzeScopes(program: Expression[]): ScopeAnalysis {
  const analysis: ScopeAnalysis = { bindings: [], references: [] };
  const root = new Scope(null);

  const declare = (scope: Scope, node: Expression, kind: Binding['kind']): void => {
    if (node.kind !== 'identifier') return;
    const span = spanOf(node);
    const binding: Binding = { name: node.name, kind, line: span.line, column: span.column, used: false };
    scope.declare(binding);
    analysis.bindings.push(binding);
  };

  // Collect the lets of one frame, stopping at nested lambdas.
  const declareFrame = (nodes: readonly Expression[], scope: Scope): void => {
    for (const node of nodes) {
      if (node.kind !== 'list') continue;
      const form = specialFormOf(node);
      if (form === 'lambda') continue;
      if (form === 'let') {
        const [, name, ...rest] = node.elements;
        if (name !== undefined) declare(scope, name, 'let');
        declareFrame(rest, scope);
        continue;
      }
      declareFrame(node.elements, scope);
    }
  };

  const visit = (node: Expression, scope: Scope): void => {
    switch (node.kind) {
      case 'identifier': {
        const span = spanOf(node);
        const bindings = scope.resolve(node.name);
        if (bindings) {
          for (const b of bindings) b.used = true;
        }
        analysis.references.push({ name: node.name, line: span.line, column: span.column, bindings });
        return;
      }
      case 'list': {
        const form = specialFormOf(node);
        if (form === 'let') {
          node.elements.slice(2).forEach(e => visit(e, scope));
        } else if (form === 'lambda') {
          const [, params, ...body] = node.elements;
          const frame = new Scope(scope);
          if (params !== undefined && params.kind === 'list') {
            params.elements.forEach(p => declare(frame, p, 'parameter'));
          }
          declareFrame(body, frame);
          body.forEach(e => visit(e, frame));
        } else if (form === 'if') {
          node.elements.slice(1).forEach(e => visit(e, scope));
        } else {
          node.elements.forEach(e => visit(e, scope));
        }
        return;
      }
      default:
        return;
    }
  };

  declareFrame(program, root);
  program.forEach(node => visit(node, root));
  return analysis;
}
