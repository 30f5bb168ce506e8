import { getMember, type JsonNode, type JsonObjectNode } from "../../model/json.js";
import { childPath, formatPath, type JsonPath } from "../../model/path.js";
import type { TypeId } from "../../model/types.js";
import { debug } from "../../shared/debug.js";
import type { TypeRegistry } from "./registry.js";
import type { BuildDiagnosticEmitter } from "./shape.js";

/** Id allocated for each named definition object, keyed by its JSON node. */
export type CollectedIds = ReadonlyMap<JsonObjectNode, TypeId>;

/**
 * Pass 1: allocate an id for every named definition in pre-order, so that
 * pass 2 can resolve forward, self and mutual references.
 *
 * Only type positions are walked: `types[i]`, `sequence.type`,
 * `record.fields[i].type`, `union.discriminator` and `union.fields[i].type`.
 * Malformed nodes are skipped here; pass 2 reports them.
 */
export function collectNames(
  types: readonly JsonNode[],
  registry: TypeRegistry,
  diagnostics: BuildDiagnosticEmitter,
): CollectedIds {
  const ids = new Map<JsonObjectNode, TypeId>();

  const visit = (node: JsonNode, path: JsonPath, topLevel: boolean): void => {
    if (node.kind !== "object") return;

    const nameNode = getMember(node, "name")?.value;
    if (nameNode?.kind === "string" && nameNode.value.length > 0) {
      const name = nameNode.value;
      const loc = { path: formatPath(path), span: node.span };
      const result = registry.declare(name, loc, nameNode.span, topLevel);
      if (result.ok) {
        ids.set(node, result.entry.id);
        debug.build("declare", { name, id: result.entry.id, path: loc.path });
      } else {
        diagnostics.emit("itl/duplicate-type-name", {
          message: `Type '${name}' is already defined at ${result.existing.loc.path}`,
          path: formatPath(childPath(path, "name")),
          span: nameNode.span,
          related: [
            { message: `'${name}' first defined here`, path: result.existing.loc.path, span: result.existing.nameSpan },
          ],
          data: { name },
        });
      }
    }

    const kind = getMember(node, "kind")?.value;
    if (kind?.kind !== "string") return;
    switch (kind.value) {
      case "sequence":
        visitMember(node, path, "type");
        break;
      case "record":
        visitFields(node, path);
        break;
      case "union":
        visitMember(node, path, "discriminator");
        visitFields(node, path);
        break;
      default:
        break;
    }
  };

  const visitMember = (node: JsonObjectNode, path: JsonPath, key: string): void => {
    const member = getMember(node, key);
    if (member) visit(member.value, childPath(path, key), false);
  };

  const visitFields = (node: JsonObjectNode, path: JsonPath): void => {
    const fields = getMember(node, "fields")?.value;
    if (fields?.kind !== "array") return;
    fields.items.forEach((field, i) => {
      if (field.kind === "object") visitMember(field, childPath(path, "fields", i), "type");
    });
  };

  types.forEach((node, i) => visit(node, ["types", i], true));
  return ids;
}
