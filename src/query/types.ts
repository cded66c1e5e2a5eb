/** A value accepted as a predicate argument. Arrays nest. */
export type PredicateValue = string | number | boolean | readonly PredicateValue[];

/** `[operator, ...arguments]`, e.g. `['at', 'document.type', 'blog-post']`. */
export type Predicate = readonly [string, ...PredicateValue[]];

/**
 * Either a pre-built query string, passed through untouched, or one or more
 * predicates that are AND-combined.
 */
export type PredicateExpression = string | Predicate | readonly Predicate[];

/** Normalised predicate argument consumed by the serializer. */
export type PredicateArg =
  | { kind: 'path';    path: string }
  | { kind: 'string';  value: string }
  | { kind: 'literal'; text: string }
  | { kind: 'list';    items: PredicateArg[] };
