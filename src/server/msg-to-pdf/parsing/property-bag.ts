import { type PropertySource, toBytes } from "../container/index.js";
import type { PropertyKind, PropertyTag, PropertyValueMap } from "./properties.js";

type Decoders = { [P in PropertyKind]: (value: unknown) => PropertyValueMap[P] | undefined };

const decoders: Decoders = {
  string: (value) => (typeof value === "string" ? value.replace(/\0+$/, "") : undefined),
  binary: (value) => toBytes(value),
  integer: (value) => {
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "bigint") return Number(value);
    return undefined;
  },
  boolean: (value) => (typeof value === "boolean" ? value : undefined),
  time: (value) => (value instanceof Date && !Number.isNaN(value.getTime()) ? value : undefined),
};

/**
 * Typed view over the properties of one message, recipient or attachment.
 * Every accessor returns undefined for an absent property or one stored with
 * another type than the tag expects.
 */
export class PropertyBag {
  constructor(private readonly source: PropertySource) {}

  get<K extends PropertyKind>(tag: PropertyTag<K>): PropertyValueMap[K] | undefined {
    const decode: (value: unknown) => PropertyValueMap[K] | undefined = decoders[tag.kind];
    return decode(this.read(tag));
  }

  private read(tag: PropertyTag): unknown {
    try {
      return this.source.getProperty(tag.id);
    } catch {
      // msg-parser throws for named properties the file never mapped, which
      // happens in attached messages; such a property is absent
      return undefined;
    }
  }
}
