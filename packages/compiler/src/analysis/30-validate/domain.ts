import type { EnumDef, Label, TypeDef } from "../../model/types.js";

/** The legal label values of a discriminator type. */
export interface LabelDomain {
  /** Human-readable set, used in `invalid-label` messages. */
  readonly description: string;
  /**
   * Canonical key of a legal label, or null when the label is outside the
   * domain. Labels that denote the same value share a key (an enum name and
   * its integer value, a character and its code point).
   */
  canonical(label: Label): string | null;
}

const MAX_CODE_POINT = 0x10ffffn;

/** Widths up to this many bits print their bounds in full. */
const MAX_PRINTED_BITS = 64;

/** Domain of a discriminator definition; null when the kind cannot discriminate. */
export function domainOf(def: TypeDef): LabelDomain | null {
  switch (def.kind) {
    case "int":
      return intDomain(def.bits, def.unsigned);
    case "byte":
      return rangeDomain(0n, 255n, "an integer in [0, 255]");
    case "bool":
      return {
        description: "true or false",
        canonical: (label) => (typeof label.value === "boolean" ? `bool:${label.value}` : null),
      };
    case "enum":
      return enumDomain(def);
    case "string":
      return stringDomain(def.size ?? def.capacity);
    case "rune":
      return {
        description: "a single character or a code point in [0, 0x10FFFF]",
        canonical: (label) => {
          if (typeof label.value === "string") {
            const chars = [...label.value];
            const cp = chars.length === 1 ? chars[0]?.codePointAt(0) : undefined;
            return cp === undefined ? null : intKey(BigInt(cp));
          }
          const n = label.integer;
          return n !== null && n >= 0n && n <= MAX_CODE_POINT ? intKey(n) : null;
        },
      };
    default:
      return null;
  }
}

function intDomain(bits: number | undefined, unsigned: boolean): LabelDomain {
  // Non-positive widths are reported by the numeric rule; fall back to the unbounded domain.
  if (bits === undefined || bits <= 0) {
    return unsigned
      ? rangeDomain(0n, null, "a non-negative integer")
      : rangeDomain(null, null, "an integer");
  }
  if (bits > MAX_PRINTED_BITS) return wideIntDomain(bits, unsigned);
  const width = BigInt(bits);
  if (unsigned) {
    const max = (1n << width) - 1n;
    return rangeDomain(0n, max, `an integer in [0, ${max}]`);
  }
  const min = -(1n << (width - 1n));
  const max = (1n << (width - 1n)) - 1n;
  return rangeDomain(min, max, `an integer in [${min}, ${max}]`);
}

/** Bounds checked by bit length; 2^bits is never built. */
function wideIntDomain(bits: number, unsigned: boolean): LabelDomain {
  const magnitudeBits = unsigned ? bits : bits - 1;
  return {
    description: unsigned
      ? `an integer in [0, 2^${bits} - 1]`
      : `an integer in [-2^${magnitudeBits}, 2^${magnitudeBits} - 1]`,
    canonical: (label) => {
      const n = label.integer;
      if (n === null || (unsigned && n < 0n)) return null;
      // -2^k has the same bit length as 2^k - 1 once shifted by one.
      const magnitude = n < 0n ? -n - 1n : n;
      return bitLength(magnitude) <= magnitudeBits ? intKey(n) : null;
    },
  };
}

function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

function stringDomain(limit: number | undefined): LabelDomain {
  const max = limit !== undefined && limit >= 0 ? limit : null;
  return {
    description: max === null ? "a string" : `a string of at most ${max} characters`,
    canonical: (label) => {
      if (typeof label.value !== "string") return null;
      if (max !== null && [...label.value].length > max) return null;
      return `str:${label.value}`;
    },
  };
}

function rangeDomain(min: bigint | null, max: bigint | null, description: string): LabelDomain {
  return {
    description,
    canonical: (label) => {
      const n = label.integer;
      if (n === null) return null;
      if (min !== null && n < min) return null;
      if (max !== null && n > max) return null;
      return intKey(n);
    },
  };
}

function enumDomain(def: EnumDef): LabelDomain {
  const byName = new Map<string, bigint>();
  const values = new Set<bigint>();
  for (const v of def.values) {
    if (!byName.has(v.name)) byName.set(v.name, v.value);
    values.add(v.value);
  }
  const owner = def.name === undefined ? "the enum" : `enum '${def.name}'`;
  return {
    description: `a value name or declared value of ${owner}`,
    canonical: (label) => {
      if (typeof label.value === "string") {
        const value = byName.get(label.value);
        return value === undefined ? null : intKey(value);
      }
      const n = label.integer;
      return n !== null && values.has(n) ? intKey(n) : null;
    },
  };
}

function intKey(n: bigint): string {
  return `int:${n}`;
}

/** Label as written, for messages: exact integers, quoted strings. */
export function labelText(label: Label): string {
  return label.integer !== null ? label.integer.toString() : JSON.stringify(label.value);
}
