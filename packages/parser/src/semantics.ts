import {
  NodeType,
  exprLocation,
  predicateLocation,
  type Decl,
  type Expr,
  type Identifier,
  type Location,
  type Predicate,
} from './types';

export interface SourceRange {
  start: Location;
  end: Location;
}

export type SymbolKind = 'declaration' | 'parameter' | 'let' | 'pattern';

/**
 * Symbol definition (declaration name or local binding)
 */
export interface SymbolDefinition {
  name: string;
  range: SourceRange;
  kind: SymbolKind;
  /** Index of the declaration the symbol belongs to */
  declarationIndex: number;
}

/**
 * Reference to a symbol
 */
export interface SymbolReference {
  name: string;
  range: SourceRange;
  /** Undefined for names nothing in the file binds (operators, constructors, builtins) */
  definition?: SymbolDefinition;
}

/**
 * Scope for tracking variable bindings
 */
interface Scope {
  bindings: Map<string, SymbolDefinition>;
  parent: Scope | null;
}

/**
 * Semantic analysis result
 */
export interface SemanticAnalysis {
  /** First equation of each declared name; references resolve here */
  declarations: Map<string, SymbolDefinition>;
  /** Every definition: all equations first, then local bindings */
  definitions: SymbolDefinition[];
  /** All symbol references */
  references: SymbolReference[];
}

/**
 * Resolve every symbol reference in a parsed file.
 * Declarations are visible everywhere; a name may be defined by several
 * equations, as in `len Nil = 0` followed by `len (Cons x xs) = ...`.
 */
export function analyze(decls: Decl[]): SemanticAnalysis {
  const declarations = new Map<string, SymbolDefinition>();
  const definitions: SymbolDefinition[] = [];
  const references: SymbolReference[] = [];

  decls.forEach((decl, index) => {
    const def: SymbolDefinition = {
      name: decl.id.name,
      range: identifierRange(decl.id),
      kind: 'declaration',
      declarationIndex: index,
    };
    definitions.push(def);
    if (!declarations.has(def.name)) {
      declarations.set(def.name, def);
    }
  });

  const fileScope: Scope = { bindings: declarations, parent: null };

  decls.forEach((decl, index) => {
    const context: AnalysisContext = { declarationIndex: index, definitions, references };
    const bindings = new Map<string, SymbolDefinition>();
    for (const predicate of decl.predicates) {
      bindPredicate(predicate, 'parameter', bindings, context);
    }
    analyzeExpression(decl.body, { bindings, parent: fileScope }, context);
  });

  return { declarations, definitions, references };
}

interface AnalysisContext {
  declarationIndex: number;
  definitions: SymbolDefinition[];
  references: SymbolReference[];
}

function bindPredicate(
  predicate: Predicate,
  kind: SymbolKind,
  bindings: Map<string, SymbolDefinition>,
  context: AnalysisContext
): void {
  switch (predicate.type) {
    case NodeType.Irrefutable:
      define(predicate.id, kind, bindings, context);
      break;
    case NodeType.CtorPredicate:
    case NodeType.TuplePredicate:
      for (const dim of predicate.dims) {
        bindPredicate(dim, kind, bindings, context);
      }
      break;
  }
}

function define(
  id: Identifier,
  kind: SymbolKind,
  bindings: Map<string, SymbolDefinition>,
  context: AnalysisContext
): void {
  const def: SymbolDefinition = {
    name: id.name,
    range: identifierRange(id),
    kind,
    declarationIndex: context.declarationIndex,
  };
  context.definitions.push(def);
  bindings.set(id.name, def);
}

/**
 * Analyze an expression for references
 */
function analyzeExpression(expr: Expr, scope: Scope, context: AnalysisContext): void {
  switch (expr.type) {
    case NodeType.Symbol:
      context.references.push({
        name: expr.id.name,
        range: identifierRange(expr.id),
        definition: lookupSymbol(scope, expr.id.name),
      });
      break;

    case NodeType.Let: {
      // Not recursive: the value cannot see its own binding
      analyzeExpression(expr.value, scope, context);
      const bindings = new Map<string, SymbolDefinition>();
      define(expr.binding, 'let', bindings, context);
      analyzeExpression(expr.body, { bindings, parent: scope }, context);
      break;
    }

    case NodeType.Match:
      analyzeExpression(expr.subject, scope, context);
      for (const arm of expr.patternExprs) {
        const bindings = new Map<string, SymbolDefinition>();
        bindPredicate(arm.predicate, 'pattern', bindings, context);
        analyzeExpression(arm.expr, { bindings, parent: scope }, context);
      }
      break;

    case NodeType.Lambda: {
      const bindings = new Map<string, SymbolDefinition>();
      for (const param of expr.paramNames) {
        define(param, 'parameter', bindings, context);
      }
      analyzeExpression(expr.body, { bindings, parent: scope }, context);
      break;
    }

    case NodeType.Callsite:
      analyzeExpression(expr.function, scope, context);
      for (const arg of expr.arguments) {
        analyzeExpression(arg, scope, context);
      }
      break;

    case NodeType.TupleCtor:
      for (const dim of expr.dims) {
        analyzeExpression(dim, scope, context);
      }
      break;

    case NodeType.LiteralInteger:
    case NodeType.LiteralFloat:
    case NodeType.LiteralString:
      break;
  }
}

/**
 * Look up a symbol in scope chain
 */
function lookupSymbol(scope: Scope | null, name: string): SymbolDefinition | undefined {
  while (scope) {
    const def = scope.bindings.get(name);
    if (def) return def;
    scope = scope.parent;
  }
  return undefined;
}

/**
 * Range covered by a name; names never span lines
 */
export function identifierRange(id: Identifier): SourceRange {
  const { location, name } = id;
  return {
    start: location,
    end: {
      ...location,
      column: location.column + Array.from(name).length,
      offset: location.offset + name.length,
    },
  };
}

/**
 * Find definition at a given position
 */
export function findDefinitionAt(
  decls: Decl[],
  line: number,
  column: number
): SymbolDefinition | undefined {
  return findTarget(analyze(decls), line, column);
}

function findTarget(
  analysis: SemanticAnalysis,
  line: number,
  column: number
): SymbolDefinition | undefined {
  // Check if position is on a reference
  for (const ref of analysis.references) {
    if (isPositionInRange(line, column, ref.range)) {
      return ref.definition;
    }
  }

  // Check if position is on a definition
  for (const def of analysis.definitions) {
    if (isPositionInRange(line, column, def.range)) {
      return def.kind === 'declaration' ? analysis.declarations.get(def.name) : def;
    }
  }

  return undefined;
}

/**
 * Find all references at a position (includes definitions and all uses)
 */
export function findReferencesAt(
  decls: Decl[],
  line: number,
  column: number
): SourceRange[] {
  const analysis = analyze(decls);
  const target = findTarget(analysis, line, column);
  if (!target) return [];

  const ranges: SourceRange[] = [];

  if (target.kind === 'declaration') {
    // Every equation of the declaration
    for (const def of analysis.definitions) {
      if (def.kind === 'declaration' && def.name === target.name) {
        ranges.push(def.range);
      }
    }
  } else {
    ranges.push(target.range);
  }

  for (const ref of analysis.references) {
    if (ref.definition === target) {
      ranges.push(ref.range);
    }
  }

  return ranges;
}

/**
 * Check if a position is within a range
 */
export function isPositionInRange(line: number, column: number, range: SourceRange): boolean {
  if (line < range.start.line || line > range.end.line) return false;
  if (line === range.start.line && column < range.start.column) return false;
  if (line === range.end.line && column >= range.end.column) return false;
  return true;
}

/**
 * Get completions at a position: every declaration, plus the local
 * bindings in scope there
 */
export function getCompletions(
  decls: Decl[],
  line: number,
  column: number
): SymbolDefinition[] {
  const { declarations } = analyze(decls);
  const completions: SymbolDefinition[] = [...declarations.values()];

  const enclosing = findEnclosingDeclaration(decls, line, column);
  if (enclosing === undefined) return completions;

  const decl = decls[enclosing];
  const context: AnalysisContext = { declarationIndex: enclosing, definitions: [], references: [] };
  const params = new Map<string, SymbolDefinition>();
  for (const predicate of decl.predicates) {
    bindPredicate(predicate, 'parameter', params, context);
  }
  const locals = new Map(
    [...params].filter(([, def]) => isBefore(def.range.end, line, column))
  );
  collectLocalsAt(decl.body, line, column, locals, context);
  completions.push(...locals.values());

  return completions;
}

/**
 * Add the bindings introduced between `expr` and the innermost node holding
 * the position. Nodes only record where they start, so a node is taken to
 * run until its next sibling starts.
 */
function collectLocalsAt(
  expr: Expr,
  line: number,
  column: number,
  locals: Map<string, SymbolDefinition>,
  context: AnalysisContext
): void {
  switch (expr.type) {
    case NodeType.Let:
      if (isBefore(exprLocation(expr.body), line, column)) {
        define(expr.binding, 'let', locals, context);
        collectLocalsAt(expr.body, line, column, locals, context);
      } else {
        collectLocalsAt(expr.value, line, column, locals, context);
      }
      break;

    case NodeType.Match: {
      const arm = lastStartingBefore(
        expr.patternExprs,
        (candidate) => predicateLocation(candidate.predicate),
        line,
        column
      );
      if (!arm) {
        collectLocalsAt(expr.subject, line, column, locals, context);
      } else if (isBefore(exprLocation(arm.expr), line, column)) {
        bindPredicate(arm.predicate, 'pattern', locals, context);
        collectLocalsAt(arm.expr, line, column, locals, context);
      }
      break;
    }

    case NodeType.Lambda:
      for (const param of expr.paramNames) {
        define(param, 'parameter', locals, context);
      }
      collectLocalsAt(expr.body, line, column, locals, context);
      break;

    case NodeType.Callsite:
    case NodeType.TupleCtor: {
      const children = expr.type === NodeType.Callsite ? [expr.function, ...expr.arguments] : expr.dims;
      const child = lastStartingBefore(children, exprLocation, line, column);
      if (child) {
        collectLocalsAt(child, line, column, locals, context);
      }
      break;
    }

    case NodeType.Symbol:
    case NodeType.LiteralInteger:
    case NodeType.LiteralFloat:
    case NodeType.LiteralString:
      break;
  }
}

function lastStartingBefore<T>(
  items: T[],
  start: (item: T) => Location,
  line: number,
  column: number
): T | undefined {
  let found: T | undefined;
  for (const item of items) {
    if (!isBefore(start(item), line, column)) break;
    found = item;
  }
  return found;
}

/**
 * The last declaration starting at or before the position
 */
function findEnclosingDeclaration(
  decls: Decl[],
  line: number,
  column: number
): number | undefined {
  let enclosing: number | undefined;
  decls.forEach((decl, index) => {
    if (isBefore(decl.id.location, line, column)) {
      enclosing = index;
    }
  });
  return enclosing;
}

function isBefore(location: Location, line: number, column: number): boolean {
  return location.line < line || (location.line === line && location.column <= column);
}

/**
 * Get hover information at a position
 */
export function getHoverInfo(
  decls: Decl[],
  line: number,
  column: number
): { name: string; kind: SymbolKind; range: SourceRange } | undefined {
  const def = findDefinitionAt(decls, line, column);
  if (!def) return undefined;
  return { name: def.name, kind: def.kind, range: def.range };
}
