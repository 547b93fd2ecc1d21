import { Env } from "@rsh/elaborator";

const CIRCULAR_REFERENCE = "[Circular]";
// Closures and IR returns carry whole scopes; their contents are not part of the output.
const ENV_PLACEHOLDER = "[Env]";

const normalizeWithTraversalTracking = ({
  value,
  ancestors,
  normalize,
}: {
  value: object;
  ancestors: WeakSet<object>;
  normalize: () => unknown;
}): unknown => {
  if (ancestors.has(value)) {
    return CIRCULAR_REFERENCE;
  }

  ancestors.add(value);
  try {
    return normalize();
  } finally {
    ancestors.delete(value);
  }
};

const normalizeMapEntries = ({
  value,
  ancestors,
}: {
  value: ReadonlyMap<unknown, unknown>;
  ancestors: WeakSet<object>;
}): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(value.entries()).map(([key, entry]) => [
      String(key),
      normalizeOutput({ value: entry, ancestors }),
    ])
  );

/**
 * Converts a program into plain JSON data: bigints become decimal strings,
 * maps become objects, environments become a placeholder.
 */
export const normalizeOutput = ({
  value,
  ancestors = new WeakSet(),
}: {
  value: unknown;
  ancestors?: WeakSet<object>;
}): unknown => {
  if (typeof value === "bigint") {
    return value.toString();
  }

  if (value === null || typeof value !== "object") {
    return value;
  }

  if (value instanceof Env) {
    return ENV_PLACEHOLDER;
  }

  return normalizeWithTraversalTracking({
    value,
    ancestors,
    normalize: () => {
      if (value instanceof Map) {
        return normalizeMapEntries({ value, ancestors });
      }

      if (Array.isArray(value)) {
        return value.map((entry) => normalizeOutput({ value: entry, ancestors }));
      }

      return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [
          key,
          normalizeOutput({ value: entry, ancestors }),
        ])
      );
    },
  });
};

export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput({ value }), undefined, 2);

export const printJson = (value: unknown): void => {
  console.log(stringifyOutput(value));
};
