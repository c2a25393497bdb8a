import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { MAX_NESTING, Parser, parse } from './parser';
import { ErrorLevel, ParseError } from './errors';
import {
  NodeType,
  declLocation,
  exprLocation,
  type Decl,
  type Expr,
  type Predicate,
} from './types';

/**
 * Compact rendering of the tree so tests can compare shapes without locations
 */
function showPredicate(predicate: Predicate): string {
  switch (predicate.type) {
    case NodeType.Irrefutable:
      return predicate.id.name;
    case NodeType.IntegerPredicate:
      return String(predicate.value);
    case NodeType.StringPredicate:
      return JSON.stringify(predicate.value);
    case NodeType.CtorPredicate:
      if (predicate.dims.length === 0) return predicate.ctorId.name;
      return `(${[predicate.ctorId.name, ...predicate.dims.map(showPredicate)].join(' ')})`;
    case NodeType.TuplePredicate:
      return `(${['tuple', ...predicate.dims.map(showPredicate)].join(' ')})`;
  }
}

function showExpr(expr: Expr): string {
  switch (expr.type) {
    case NodeType.Symbol:
      return expr.id.name;
    case NodeType.LiteralInteger:
    case NodeType.LiteralFloat:
      return String(expr.value);
    case NodeType.LiteralString:
      return JSON.stringify(expr.value);
    case NodeType.Callsite:
      return `(${['call', showExpr(expr.function), ...expr.arguments.map(showExpr)].join(' ')})`;
    case NodeType.Let:
      return `(let ${expr.binding.name} ${showExpr(expr.value)} ${showExpr(expr.body)})`;
    case NodeType.Match: {
      const arms = expr.patternExprs.map(
        (arm) => `[${showPredicate(arm.predicate)} ${showExpr(arm.expr)}]`
      );
      return `(${['match', showExpr(expr.subject), ...arms].join(' ')})`;
    }
    case NodeType.TupleCtor:
      return `(${['tuple', ...expr.dims.map(showExpr)].join(' ')})`;
    case NodeType.Lambda:
      return `(lambda (${expr.paramNames.map((id) => id.name).join(' ')}) ${showExpr(expr.body)})`;
  }
}

function showDecl(decl: Decl): string {
  return `${[decl.id.name, ...decl.predicates.map(showPredicate)].join(' ')} = ${showExpr(decl.body)}`;
}

function parseOk(source: string): Decl[] {
  const result = parse(source);
  if (!result.ok) {
    return assert.fail(result.error.toString());
  }
  return result.decls;
}

function shapes(source: string): string[] {
  return parseOk(source).map(showDecl);
}

function parseErr(source: string, filename?: string): ParseError {
  const result = parse(source, { filename });
  if (result.ok) {
    return assert.fail(`expected ${JSON.stringify(source)} to fail`);
  }
  return result.error;
}

describe('Parser', () => {
  describe('declarations', () => {
    it('parses a declaration with a parameter', () => {
      const decls = parseOk('f x = x');
      assert.strictEqual(decls.length, 1);
      const [decl] = decls;
      assert.strictEqual(decl.id.name, 'f');
      assert.strictEqual(decl.predicates.length, 1);
      assert.strictEqual(decl.predicates[0].type, NodeType.Irrefutable);
      assert.strictEqual(decl.body.type, NodeType.Symbol);
      assert.strictEqual(showDecl(decl), 'f x = x');
    });

    it('parses several declarations separated by newlines and semicolons', () => {
      assert.deepStrictEqual(shapes('a = 1\n\nb = 2; c = 3\n'), ['a = 1', 'b = 2', 'c = 3']);
    });

    it('parses an empty source', () => {
      assert.deepStrictEqual(shapes('\n\n;\n'), []);
    });

    it('locates a declaration at its name', () => {
      const result = parse('\n  main = g x', { filename: 'main.tarn' });
      assert.ok(result.ok);
      const [decl] = result.decls;
      assert.deepStrictEqual(declLocation(decl), {
        filename: 'main.tarn',
        line: 2,
        column: 2,
        offset: 3,
      });
      assert.strictEqual(exprLocation(decl.body).column, 9);
    });

    it('does not start a declaration with a keyword', () => {
      const error = parseErr('let = 1');
      assert.strictEqual(error.message, 'unexpected token (Identifier("let")) found. expected a declaration');
      assert.strictEqual(error.location.column, 0);
    });
  });

  describe('predicates', () => {
    it('parses literal predicates', () => {
      assert.deepStrictEqual(shapes('fib 0 = 0\nfib 1 = 1\ngreet "bob" = "hi bob"\nabs -1 = 1'), [
        'fib 0 = 0',
        'fib 1 = 1',
        'greet "bob" = "hi bob"',
        'abs -1 = 1',
      ]);
    });

    it('treats a single parenthesized predicate as the predicate itself', () => {
      const [decl] = parseOk('f (x) = x');
      assert.strictEqual(decl.predicates[0].type, NodeType.Irrefutable);
      assert.strictEqual(showDecl(decl), 'f x = x');
    });

    it('parses tuple predicates', () => {
      const [decl] = parseOk('swap (a, b) = (b, a)');
      assert.strictEqual(showDecl(decl), 'swap (tuple a b) = (tuple b a)');
      const [tuple] = decl.predicates;
      assert.strictEqual(tuple.type, NodeType.TuplePredicate);
      if (tuple.type === NodeType.TuplePredicate) {
        assert.strictEqual(tuple.location.column, 5);
      }
    });

    it('parses the empty tuple', () => {
      assert.deepStrictEqual(shapes('f () = ()'), ['f (tuple) = (tuple)']);
    });

    it('parses constructor predicates', () => {
      assert.deepStrictEqual(shapes('len Nil = 0\nlen (Cons x xs) = + 1 (len xs)'), [
        'len Nil = 0',
        'len (Cons x xs) = (call + 1 (call len xs))',
      ]);
    });

    it('lets a constructor take the predicates after it', () => {
      assert.deepStrictEqual(shapes('f Cons Nil xs = 0'), ['f (Cons (Nil xs)) = 0']);
    });

    it('rejects a parenthesized group without a comma between members', () => {
      const error = parseErr('f (a b) = 1');
      assert.strictEqual(error.message, 'unexpected token (Identifier("b")) found. expected RParen');
      assert.strictEqual(error.location.column, 5);
    });

    it('requires a predicate after a comma', () => {
      const error = parseErr('f (a,) = 1');
      assert.strictEqual(error.message, 'unexpected token (RParen) found. expected a predicate');
    });
  });

  describe('callsites', () => {
    it('parses application', () => {
      const [decl] = parseOk('main = f x y');
      assert.strictEqual(decl.body.type, NodeType.Callsite);
      assert.strictEqual(showExpr(decl.body), '(call f x y)');
    });

    it('keeps a lone term as it is', () => {
      const [decl] = parseOk('main = f');
      assert.strictEqual(decl.body.type, NodeType.Symbol);
    });

    it('treats operators as names', () => {
      assert.deepStrictEqual(shapes('compose f g = . f g'), ['compose f g = (call . f g)']);
    });

    it('parses literals', () => {
      const [decl] = parseOk('main = show 3.14 "text" 7');
      assert.strictEqual(showExpr(decl.body), '(call show 3.14 "text" 7)');
      assert.ok(decl.body.type === NodeType.Callsite);
      assert.strictEqual(decl.body.arguments[0].type, NodeType.LiteralFloat);
      assert.deepStrictEqual(decl.body.arguments[2], {
        type: NodeType.LiteralInteger,
        location: { filename: 'raw-text', line: 1, column: 24, offset: 24 },
        value: 7n,
      });
    });

    it('parses nested parentheses', () => {
      assert.deepStrictEqual(
        shapes('fib n = + (fib (- n 1)) (fib (- n 2))'),
        ['fib n = (call + (call fib (call - n 1)) (call fib (call - n 2)))']
      );
    });

    it('continues on following lines inside parentheses', () => {
      assert.deepStrictEqual(shapes('total = (+\n  1\n  2)'), ['total = (call + 1 2)']);
    });

    it('allows the body on the next line', () => {
      assert.deepStrictEqual(shapes('f =\n  g x'), ['f = (call g x)']);
    });

    it('parses tuple expressions', () => {
      const [decl] = parseOk('pair = (1, "a", x)');
      assert.strictEqual(showDecl(decl), 'pair = (tuple 1 "a" x)');
      assert.strictEqual(exprLocation(decl.body).column, 7);
    });

    it('treats a single parenthesized expression as the expression itself', () => {
      assert.deepStrictEqual(shapes('p = (x)'), ['p = x']);
    });
  });

  describe('let expressions', () => {
    it('parses let', () => {
      const [decl] = parseOk('g = let x = 1 in x');
      assert.strictEqual(showDecl(decl), 'g = (let x 1 x)');
      assert.ok(decl.body.type === NodeType.Let);
      assert.strictEqual(decl.body.binding.name, 'x');
      assert.strictEqual(decl.body.location.column, 4);
    });

    it('parses let across lines', () => {
      assert.deepStrictEqual(shapes('g = let x = 1\n  in x'), ['g = (let x 1 x)']);
    });

    it('parses nested lets', () => {
      assert.deepStrictEqual(shapes('h = let a = 1 in let b = a in b'), [
        'h = (let a 1 (let b a b))',
      ]);
    });

    it('requires an identifier after let', () => {
      const error = parseErr('f = let 1 = 2 in 3');
      assert.strictEqual(error.message, 'unexpected token (Signed(1)) found. expected an identifier');
      assert.strictEqual(error.location.column, 8);
    });

    it('requires in', () => {
      const error = parseErr('f = let x = 1 x');
      assert.strictEqual(error.message, "hit EOF but expected 'in'");
    });
  });

  describe('match expressions', () => {
    it('parses arms on separate lines', () => {
      const source = [
        'describe n = match n',
        '  0 => "zero"',
        '  1 => "one"',
        '  _ => "many"',
        'after = 2',
      ].join('\n');
      assert.deepStrictEqual(shapes(source), [
        'describe n = (match n [0 "zero"] [1 "one"] [_ "many"])',
        'after = 2',
      ]);
    });

    it('parses arms separated by semicolons inside parentheses', () => {
      const [decl] = parseOk('sign x = (match x; 0 => "zero"; n => "other")');
      assert.strictEqual(showDecl(decl), 'sign x = (match x [0 "zero"] [n "other"])');
      assert.ok(decl.body.type === NodeType.Match);
      assert.strictEqual(decl.body.location.column, 10);
    });

    it('parses constructor and tuple arms', () => {
      const source = 'len l = match l\n  Nil => 0\n  Cons x xs => + 1 (len xs)\nfst p = match p\n  (a, b) => a';
      assert.deepStrictEqual(shapes(source), [
        'len l = (match l [Nil 0] [(Cons x xs) (call + 1 (call len xs))])',
        'fst p = (match p [(tuple a b) a])',
      ]);
    });

    it('parses arm bodies on the next line', () => {
      assert.deepStrictEqual(shapes('f x = match x\n  0 =>\n    "zero"'), [
        'f x = (match x [0 "zero"])',
      ]);
    });

    it('needs semicolons between arms inside parentheses', () => {
      // Line feeds inside brackets are whitespace, so the arms run into the subject
      const error = parseErr('f x = (match x\n  0 => "zero"\n  n => "other")');
      assert.strictEqual(error.toString(), 'raw-text:1:7: error: match expression has no arms');
    });

    it('requires at least one arm', () => {
      const error = parseErr('f x = match x');
      assert.strictEqual(error.message, 'match expression has no arms');
      assert.strictEqual(error.location.column, 6);
    });
  });

  describe('errors', () => {
    it('renders location, level and message', () => {
      const error = parseErr('f x', 'main.tarn');
      assert.ok(error instanceof ParseError);
      assert.strictEqual(error.level, ErrorLevel.Error);
      assert.strictEqual(error.toString(), "main.tarn:1:3: error: hit EOF but expected '='");
    });

    it('reports a missing body', () => {
      const error = parseErr('f = ');
      assert.strictEqual(error.message, 'missing function callsite expression');
      assert.strictEqual(error.location.column, 4);
    });

    it('stops a callsite at a keyword it cannot start with', () => {
      const error = parseErr('f = if');
      assert.strictEqual(error.message, 'missing function callsite expression');
      assert.strictEqual(error.location.column, 4);
    });

    it('reports constructs the grammar does not cover', () => {
      const error = parseErr('f = [x]');
      assert.strictEqual(error.message, 'parsing this is not implemented');
      assert.strictEqual(error.location.column, 4);
    });

    it('accepts nesting up to the limit', () => {
      const depth = MAX_NESTING;
      assert.deepStrictEqual(shapes(`f = ${'('.repeat(depth)}x${')'.repeat(depth)}`), ['f = x']);
    });

    it('rejects parentheses nested past the limit', () => {
      const depth = MAX_NESTING + 1;
      const error = parseErr(`f = ${'('.repeat(depth)}x${')'.repeat(depth)}`);
      assert.strictEqual(error.message, 'nesting is deeper than 1000 levels');
      assert.strictEqual(error.location.column, 1004);
    });

    it('rejects constructor predicates nested past the limit', () => {
      const error = parseErr(`f ${'A '.repeat(MAX_NESTING + 1)}= 1`);
      assert.strictEqual(error.message, 'nesting is deeper than 1000 levels');
      assert.strictEqual(error.location.column, 2002);
    });

    it('reports an unclosed parenthesis', () => {
      assert.strictEqual(parseErr('f = (x').message, 'hit EOF but expected RParen');
    });

    it('reports what was found instead of a closing parenthesis', () => {
      const error = parseErr('f = (x y = 1)');
      assert.strictEqual(error.message, 'unexpected token (Operator("=")) found. expected RParen');
      assert.strictEqual(error.location.column, 9);
    });

    it('passes lexical errors through', () => {
      assert.strictEqual(parseErr('f = )').message, "unexpected ')' with no open bracket");
      assert.strictEqual(parseErr('f = a | b').toString(), "raw-text:1:6: error: unrecognized character '|'");
    });

    it('throws from the Parser class', () => {
      assert.strictEqual(new Parser('a = 1\nb = 2', { filename: 'x.tarn' }).parse().length, 2);
      assert.throws(() => new Parser('a').parse(), ParseError);
    });
  });
});
