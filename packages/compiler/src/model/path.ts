/** A location inside the JSON document: object keys and array indices from the root. */
export type JsonPath = readonly (string | number)[];

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Render a path the way diagnostics show it: `types[3].fields[1].type`.
 * Keys that are not identifiers are quoted: `note["x-y"]`. The root renders as `$`.
 */
export function formatPath(path: JsonPath): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      out += out ? `.${segment}` : segment;
    } else {
      out += `[${JSON.stringify(segment)}]`;
    }
  }
  return out || "$";
}

export function childPath(path: JsonPath, ...segments: (string | number)[]): JsonPath {
  return [...path, ...segments];
}
