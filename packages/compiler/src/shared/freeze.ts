/**
 * Recursively freeze an object graph. Shared references and cycles are
 * visited once. Returns the same value, typed as deeply readonly by its callers.
 */
export function deepFreeze<T>(value: T): T {
  const seen = new Set<object>();
  const stack: unknown[] = [value];
  while (stack.length > 0) {
    const current = stack.pop();
    if (typeof current !== "object" || current === null || seen.has(current)) continue;
    seen.add(current);
    for (const key of Reflect.ownKeys(current)) {
      stack.push(Reflect.get(current, key));
    }
    Object.freeze(current);
  }
  return value;
}
