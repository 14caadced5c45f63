/**
 * Check-then-create for directory and authorization objects.
 */

export type EnsureStatus = "created" | "existing";

export type EnsureResult<T> = {
  status: EnsureStatus;
  value: T;
};

/**
 * Return what `find` yields, or `create` when it yields nothing. `create` is
 * never called for an object that already exists.
 */
export async function ensure<T>(ops: {
  find: () => Promise<T | undefined>;
  create: () => Promise<T>;
}): Promise<EnsureResult<T>> {
  const existing = await ops.find();
  if (existing !== undefined) {
    return { status: "existing", value: existing };
  }
  return { status: "created", value: await ops.create() };
}
