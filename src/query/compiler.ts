import type { Predicate, PredicateArg, PredicateExpression, PredicateValue } from './types.js';

const PATH_PREFIXES = ['my.', 'document'] as const;

function isValueList(value: PredicateValue): value is readonly PredicateValue[] {
  return Array.isArray(value);
}

/**
 * Classifies a raw argument. Strings naming a document path (`my.*`,
 * `document*`) are references; every other string is a quoted literal.
 */
export function toArg(value: PredicateValue): PredicateArg {
  if (isValueList(value)) {
    return { kind: 'list', items: value.map(toArg) };
  }
  if (typeof value === 'string') {
    return PATH_PREFIXES.some((prefix) => value.startsWith(prefix))
      ? { kind: 'path', path: value }
      : { kind: 'string', value };
  }
  return { kind: 'literal', text: String(value) };
}

/**
 * Serializes one argument. No escaping is applied: string values must not
 * contain double quotes.
 */
export function serializeArg(arg: PredicateArg): string {
  switch (arg.kind) {
    case 'path':
      return arg.path;
    case 'string':
      return `"${arg.value}"`;
    case 'literal':
      return arg.text;
    case 'list':
      return `[${arg.items.map(serializeArg).join(', ')}]`;
  }
}

/** Compiles a single predicate into its `[:d = op(args)]` fragment. */
export function compilePredicate(predicate: Predicate): string {
  const [op, ...args] = predicate;
  return `[:d = ${op}(${args.map((a) => serializeArg(toArg(a))).join(', ')})]`;
}

// Only the first element is inspected, so a bare predicate whose operator
// position holds an array is read as a list.
function isPredicateList(expr: Predicate | readonly Predicate[]): expr is readonly Predicate[] {
  return expr.length === 0 || Array.isArray(expr[0]);
}

/**
 * Compiles a predicate expression into the service's query language.
 *
 * @example
 * compilePredicates([['at', 'document.type', 'blog-post']])
 * // => '[[:d = at(document.type, "blog-post")]]'
 */
export function compilePredicates(expr: PredicateExpression): string {
  if (typeof expr === 'string') return expr;
  const list: readonly Predicate[] = isPredicateList(expr) ? expr : [expr];
  return `[${list.map(compilePredicate).join('')}]`;
}
