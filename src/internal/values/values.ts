import type { JsonObject, JsonValue } from "../json/types.js";

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}

// Plain assignment would hit the `__proto__` setter for that key.
function setOwn(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

export function jsonEqual(left: JsonValue, right: JsonValue): boolean {
  if (left === right) {
    return true;
  }

  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) {
      return false;
    }
    for (let index = 0; index < left.length; index += 1) {
      const a = left[index];
      const b = right[index];
      if (a === undefined || b === undefined || !jsonEqual(a, b)) {
        return false;
      }
    }
    return true;
  }

  if (!isJsonObject(left) || !isJsonObject(right)) {
    return false;
  }

  const keys = Object.keys(left);
  if (keys.length !== Object.keys(right).length) {
    return false;
  }

  for (const key of keys) {
    const a = left[key];
    const b = right[key];
    if (a === undefined || b === undefined || !Object.hasOwn(right, key) || !jsonEqual(a, b)) {
      return false;
    }
  }
  return true;
}

/**
 * Recursively merges `source` into `target` and returns `target`.
 *
 * Nested objects merge key by key. Arrays are extended with the source items
 * they do not already contain (compared structurally, including items added
 * earlier in the same merge). Any other value replaces the target's.
 */
export function mergeDeep(target: JsonObject, source: JsonObject): JsonObject {
  for (const [key, incoming] of Object.entries(source)) {
    const existing = Object.hasOwn(target, key) ? target[key] : undefined;

    if (isJsonObject(existing) && isJsonObject(incoming)) {
      mergeDeep(existing, incoming);
    } else if (Array.isArray(existing) && Array.isArray(incoming)) {
      for (const item of incoming) {
        if (!existing.some((present) => jsonEqual(present, item))) {
          existing.push(item);
        }
      }
    } else {
      setOwn(target, key, incoming);
    }
  }

  return target;
}

/**
 * Trims every string in a value. Strings left empty become `null`, and
 * `null` items are dropped from arrays; object keys are always kept.
 */
export function stripDeep(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => stripDeep(item)).filter((item) => item !== null);
  }

  if (isJsonObject(value)) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      setOwn(out, key, stripDeep(item));
    }
    return out;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }

  return value;
}

function toGlobalPattern(pattern: string | RegExp): RegExp {
  if (typeof pattern === "string") {
    return new RegExp(pattern, "g");
  }

  return pattern.flags.includes("g") ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

/**
 * Replaces every match of `pattern` in every string of a value. The
 * replacement uses `String.prototype.replace` syntax (`$1`, `$<name>`).
 */
export function replaceDeep(value: JsonValue, pattern: string | RegExp, replacement: string): JsonValue {
  const regex = toGlobalPattern(pattern);

  const visit = (current: JsonValue): JsonValue => {
    if (Array.isArray(current)) {
      return current.map((item) => visit(item));
    }

    if (isJsonObject(current)) {
      const out: JsonObject = {};
      for (const [key, item] of Object.entries(current)) {
        setOwn(out, key, visit(item));
      }
      return out;
    }

    return typeof current === "string" ? current.replace(regex, replacement) : current;
  };

  return visit(value);
}
