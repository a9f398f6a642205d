/**
 * Error Chain
 *
 * Walks an error together with everything it wraps: the standard `cause`
 * property and the members of an `AggregateError` (joined errors).
 */

/**
 * Yield `err` and every error it wraps, depth-first, outermost first.
 * Each object is visited once, so cyclic cause chains terminate.
 */
export function* unwrapChain(err: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  const stack: unknown[] = [err];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || current === null || seen.has(current)) {
      continue;
    }
    seen.add(current);
    yield current;

    if (!(current instanceof Error)) {
      continue;
    }

    const children: unknown[] = [];
    if (current.cause !== undefined) {
      children.push(current.cause);
    }
    if (current instanceof AggregateError) {
      children.push(...current.errors);
    }

    // Reverse so the first child is popped first
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/**
 * First error in the chain accepted by `guard`
 */
export function findInChain<T>(err: unknown, guard: (candidate: unknown) => candidate is T): T | undefined {
  for (const candidate of unwrapChain(err)) {
    if (guard(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Message of an arbitrary thrown value
 */
export function messageOf(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
