/**
 * Parsing for the tenant and subscription pickers.
 *
 * Both take the operator's raw answer and the number of listed items, and
 * return 0-based indices or a message to show before asking again.
 */

export type SelectionResult<T> = { ok: true; value: T } | { ok: false; error: string };

const POSITIVE_INTEGER = /^\d+$/;

export function parseTenantChoice(input: string, count: number): SelectionResult<number> {
  const trimmed = input.trim();
  const expected = `Enter a number between 1 and ${count}`;
  if (!POSITIVE_INTEGER.test(trimmed)) {
    return { ok: false, error: expected };
  }
  const choice = Number(trimmed);
  if (choice < 1 || choice > count) {
    return { ok: false, error: expected };
  }
  return { ok: true, value: choice - 1 };
}

/**
 * `all` (any case), or a comma-separated list of 1-based indices. The result
 * keeps the order the operator typed.
 */
export function parseSubscriptionSelection(input: string, count: number): SelectionResult<number[]> {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === "all") {
    return { ok: true, value: Array.from({ length: count }, (_, i) => i) };
  }
  if (!trimmed) {
    return { ok: false, error: 'Enter "all" or a comma-separated list of numbers' };
  }

  const seen = new Set<number>();
  const indices: number[] = [];
  for (const raw of trimmed.split(",")) {
    const entry = raw.trim();
    if (!entry) {
      return { ok: false, error: "Selection contains an empty entry" };
    }
    if (!POSITIVE_INTEGER.test(entry)) {
      return { ok: false, error: `"${entry}" is not a number` };
    }
    const choice = Number(entry);
    if (choice < 1 || choice > count) {
      return { ok: false, error: `${choice} is out of range (1-${count})` };
    }
    if (seen.has(choice)) {
      return { ok: false, error: `${choice} is listed more than once` };
    }
    seen.add(choice);
    indices.push(choice - 1);
  }
  return { ok: true, value: indices };
}

/** Adapt a parser to the `Prompter` validator contract. */
export function toValidator<T>(parse: (input: string) => SelectionResult<T>): (input: string) => true | string {
  return (input) => {
    const result = parse(input);
    return result.ok ? true : result.error;
  };
}
