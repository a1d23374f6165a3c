export function deepFreeze<T>(value: T): Readonly<T> {
  const seen = new Set<unknown>();

  const freeze = (target: unknown): void => {
    if (target === null || typeof target !== "object") {
      return;
    }
    if (seen.has(target)) {
      return;
    }
    seen.add(target);

    // Typed arrays with elements cannot be frozen; callers hand out copies instead.
    if (ArrayBuffer.isView(target)) {
      return;
    }

    if (Array.isArray(target)) {
      for (const item of target) {
        freeze(item);
      }
    } else {
      for (const entry of Object.values(target)) {
        freeze(entry);
      }
    }

    Object.freeze(target);
  };

  freeze(value);
  return value;
}
