/**
 * Compact YAML rendering of tool inputs and other small structures
 */

import { stringify, YAMLSeq } from "yaml";

/**
 * Recursively converts arrays of primitives to flow style ([a, b, c])
 */
function convertSimpleArraysToFlowStyle(value: unknown): unknown {
  if (Array.isArray(value)) {
    const isSimpleArray = value.every(
      (item) =>
        typeof item === "string" ||
        typeof item === "number" ||
        typeof item === "boolean" ||
        item === null,
    );

    if (isSimpleArray) {
      const seq = new YAMLSeq();
      seq.flow = true;
      value.forEach((item) => seq.add(item));
      return seq;
    }
    return value.map(convertSimpleArraysToFlowStyle);
  } else if (value && typeof value === "object" && !(value instanceof YAMLSeq)) {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = convertSimpleArraysToFlowStyle(val);
    }
    return result;
  }

  return value;
}

/**
 * Serializes a value to YAML.
 *
 * @throws {Error} "Tag not resolved for Function value" when the value
 *   contains functions or symbols
 */
export function yamlDump(value: unknown): string {
  return stringify(convertSimpleArraysToFlowStyle(value), {
    indent: 2,
    // no automatic folding of long lines
    lineWidth: 0,
    minContentWidth: 20,
    // multi-line strings become block scalars, single-line ones stay unquoted
    defaultStringType: "PLAIN",
  });
}
