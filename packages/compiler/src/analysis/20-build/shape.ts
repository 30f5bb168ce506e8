/* =============================================================================
 * Shape checking for the build phase.
 *
 * `checkObject` runs one grammar object through its zod schema and reports
 * the issues against the JSON tree: an issue path is walked back to the node
 * it names, so every diagnostic carries the exact source span and the
 * catalog code for what went wrong. Repeated keys are invisible to the
 * schema (the parsed value keeps the last one) and are found on the tree.
 * ============================================================================= */

import type { z } from "zod/v4";
import {
  describeJsonKind,
  getMember,
  toJsonValue,
  type JsonMember,
  type JsonNode,
  type JsonObject,
  type JsonObjectNode,
} from "../../model/json.js";
import { childPath, formatPath, type JsonPath } from "../../model/path.js";
import type { DiagnosticEmitter } from "../../diagnostics/emitter.js";
import type { DiagnosticCodeForStage, diagnosticsCatalog } from "../../diagnostics/catalog/index.js";
import { findBestMatch, formatSuggestion } from "../../shared/suggestions.js";

export type BuildDiagnosticEmitter = DiagnosticEmitter<typeof diagnosticsCatalog, DiagnosticCodeForStage<"build">>;

export interface ObjectGrammar<T> {
  readonly schema: z.ZodType<T>;
  /** Keys of the grammar in effect, for suggestions. */
  readonly keys: readonly string[];
  /** Keys only the compat grammar accepts; reported with a hint when it is off. */
  readonly compatOnly?: readonly string[];
  /** Per-object wording of what a property must be, over the defaults below. */
  readonly expected?: Readonly<Record<string, string>>;
  /** String properties limited to a fixed set of values. */
  readonly choices?: Readonly<Record<string, readonly string[]>>;
}

/** What a property must be, as printed in `invalid-property` messages. */
const EXPECTED: Readonly<Record<string, string>> = {
  kind: "a string",
  name: "a string",
  note: "an object",
  bits: "an integer",
  base: "an integer",
  digits: "an integer",
  scale: "an integer",
  size: "an integer",
  capacity: "an integer",
  value: "an integer",
  bit: "an integer",
  unsigned: "a boolean",
  optional: "a boolean",
  model: "a string",
  encoding: "a string",
  types: "an array",
  fields: "an array",
  values: "an array",
  labels: "an array",
};

/** Same, for one item of an array-valued property. */
const EXPECTED_ITEM: Readonly<Record<string, string>> = {
  types: "an object",
  fields: "an object",
  values: "a name or an object",
  labels: "a string, number or boolean",
  size: "an integer",
};

const TYPE_POSITIONS: ReadonlySet<string> = new Set(["type", "discriminator"]);

/**
 * Check one grammar object. Returns the parsed value, or null after every
 * problem with the object's own keys has been reported.
 */
export function checkObject<T>(
  node: JsonObjectNode,
  path: JsonPath,
  grammar: ObjectGrammar<T>,
  emitter: BuildDiagnosticEmitter,
  compat: boolean,
): T | null {
  const duplicates = reportDuplicateKeys(node, path, emitter);
  const result = grammar.schema.safeParse(toJsonValue(node));
  if (result.success) return duplicates ? null : result.data;

  const reporter = new IssueReporter(node, path, grammar, emitter, compat);
  for (const issue of result.error.issues) {
    if (issue.code === "unrecognized_keys") reporter.unknownKeys(issue.keys);
    else reporter.invalid(issue.path.filter(isSegment), issue.message);
  }
  return null;
}

/** The `note` of a grammar object, preserved verbatim. Call after its schema passed. */
export function readNote(node: JsonObjectNode): JsonObject | undefined {
  const member = getMember(node, "note");
  if (member?.value.kind !== "object") return undefined;
  const value = toJsonValue(member.value);
  return typeof value === "object" && value !== null && !Array.isArray(value) ? value : undefined;
}

function reportDuplicateKeys(node: JsonObjectNode, path: JsonPath, emitter: BuildDiagnosticEmitter): boolean {
  const seen = new Map<string, JsonMember>();
  let found = false;
  for (const member of node.members) {
    const previous = seen.get(member.key);
    if (!previous) {
      seen.set(member.key, member);
      continue;
    }
    found = true;
    const memberPath = formatPath(childPath(path, member.key));
    emitter.emit("itl/duplicate-property", {
      message: `Property '${member.key}' appears more than once`,
      path: memberPath,
      span: member.keySpan,
      related: [{ message: "First occurrence", path: memberPath, span: previous.keySpan }],
      data: { property: member.key },
    });
  }
  return found;
}

function isSegment(segment: PropertyKey): segment is string | number {
  return typeof segment === "string" || typeof segment === "number";
}

class IssueReporter<T> {
  /** Paths already reported; a union can raise several issues for one value. */
  readonly #reported = new Set<string>();

  constructor(
    private readonly node: JsonObjectNode,
    private readonly path: JsonPath,
    private readonly grammar: ObjectGrammar<T>,
    private readonly emitter: BuildDiagnosticEmitter,
    private readonly compat: boolean,
  ) {}

  unknownKeys(keys: readonly string[]): void {
    for (const key of keys) {
      const member = this.node.members.find((m) => m.key === key);
      const path = formatPath(childPath(this.path, key));
      if (!member || !this.#once(path)) continue;

      if (!this.compat && (this.grammar.compatOnly ?? []).includes(key)) {
        this.emitter.emit("itl/unknown-property", {
          message: `Property '${key}' requires the compat grammar`,
          path,
          span: member.keySpan,
          data: { property: key },
        });
        continue;
      }
      const suggestion = findBestMatch(key, this.grammar.keys);
      this.emitter.emit("itl/unknown-property", {
        message: `Unknown property '${key}'.${formatSuggestion(suggestion)}`,
        path,
        span: member.keySpan,
        data: suggestion ? { property: key, suggestion } : { property: key },
      });
    }
  }

  invalid(segments: readonly (string | number)[], fallback: string): void {
    const [key, index] = segments;
    if (typeof key !== "string") {
      // Object-level issue without a property; the schemas raise none besides unknown keys.
      if (!this.#once(formatPath(this.path))) return;
      this.emitter.emit("itl/invalid-property", {
        message: fallback,
        path: formatPath(this.path),
        span: this.node.span,
        data: { property: "", expected: "an object of this grammar" },
      });
      return;
    }

    const member = getMember(this.node, key);
    if (!member) {
      if (!this.#once(formatPath(childPath(this.path, key)))) return;
      this.emitter.emit("itl/missing-property", {
        message: `Missing required property '${key}'`,
        path: formatPath(this.path),
        span: this.node.span,
        data: { property: key },
      });
      return;
    }

    let target: JsonNode = member.value;
    let targetPath = childPath(this.path, key);
    const item = typeof index === "number" && target.kind === "array" ? target.items[index] : undefined;
    if (item && typeof index === "number") {
      target = item;
      targetPath = childPath(targetPath, index);
    }
    const pathText = formatPath(targetPath);
    if (!this.#once(pathText)) return;

    const message = this.#specialMessage(key, target, item !== undefined);
    const expected = item
      ? (EXPECTED_ITEM[key] ?? "a valid item")
      : (this.grammar.expected?.[key] ?? EXPECTED[key] ?? "a valid value");
    this.emitter.emit("itl/invalid-property", {
      message: message?.text ?? `'${key}' must be ${expected}, got ${describeJsonKind(target.kind)}`,
      path: pathText,
      span: target.span,
      data: { property: key, expected: message?.expected ?? expected },
    });
  }

  /** Messages that depend on the value, not only on its JSON kind. */
  #specialMessage(key: string, target: JsonNode, isItem: boolean): { text: string; expected: string } | null {
    if (TYPE_POSITIONS.has(key) && !isItem) {
      return {
        text: `'${key}' must be a type name or a type definition, got ${describeJsonKind(target.kind)}`,
        expected: "a string or an object",
      };
    }
    if (target.kind !== "string") return null;
    if (key === "name" && target.value.length === 0) {
      return { text: "'name' must be a non-empty string", expected: "a non-empty string" };
    }
    if (key === "values" && isItem && target.value.length === 0) {
      return { text: "'values' must be a non-empty name, got an empty string", expected: "a non-empty name" };
    }
    const choices = this.grammar.choices?.[key];
    if (choices) {
      return {
        text: `'${key}' must be one of ${choices.join(", ")}, got '${target.value}'.${formatSuggestion(findBestMatch(target.value, choices))}`,
        expected: choices.join(" | "),
      };
    }
    return null;
  }

  #once(path: string): boolean {
    if (this.#reported.has(path)) return false;
    this.#reported.add(path);
    return true;
  }
}
