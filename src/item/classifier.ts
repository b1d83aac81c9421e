import {
  ARCHETYPE_FIELDS,
  Archetype,
  EQUIPMENT_BUCKETS,
  ItemAttributes,
  ItemRecord,
  MISC_BUCKET,
  WEAPON_BUCKETS,
} from "./types";

/**
 * Tokens whose presence anywhere in the Type text marks an item as a weapon.
 * Substring containment is lossy ("Bowl" would match "bow"), and any single match is enough.
 */
export const WEAPON_TYPE_TOKENS = [
  "1h",
  "2h",
  "bow",
  "throwing",
  "piercing",
  "blunt",
  "slashing",
] as const;

/** Thrown when a record would be built without a name */
export class ItemNameError extends Error {
  constructor(url?: string) {
    super(url ? `Could not derive an item name from ${url}` : "Item name is empty");
    this.name = "ItemNameError";
  }
}

/**
 * Look up an attribute by label: exact match first, then case-insensitive.
 */
export function getAttribute(
  attributes: ItemAttributes,
  label: string
): string | undefined {
  if (Object.prototype.hasOwnProperty.call(attributes, label)) {
    return attributes[label];
  }
  const wanted = label.toLowerCase();
  const key = Object.keys(attributes).find((k) => k.toLowerCase() === wanted);
  return key === undefined ? undefined : attributes[key];
}

/**
 * Decide weapon vs. equipment from the Type attribute.
 * Missing Type defaults to equipment.
 */
export function determineArchetype(attributes: ItemAttributes): Archetype {
  const type = getAttribute(attributes, "Type");
  if (type === undefined) return "equipment";
  const folded = type.toLowerCase();
  return WEAPON_TYPE_TOKENS.some((token) => folded.includes(token))
    ? "weapon"
    : "equipment";
}

/**
 * Build a record of a known archetype. The record and a copy of its attributes are frozen.
 */
export function createItemRecord(
  archetype: Archetype,
  name: string,
  attributes: ItemAttributes,
  url?: string
): ItemRecord {
  const trimmed = name.trim();
  if (!trimmed) throw new ItemNameError(url);

  const frozen: ItemAttributes = Object.freeze({ ...attributes });
  const base = url === undefined ? { name: trimmed } : { name: trimmed, url };

  return archetype === "weapon"
    ? Object.freeze({ ...base, archetype: "weapon", attributes: frozen })
    : Object.freeze({ ...base, archetype: "equipment", attributes: frozen });
}

/**
 * Build the typed record for an item page, choosing the archetype from its Type.
 */
export function classifyItem(
  name: string,
  attributes: ItemAttributes,
  url?: string
): ItemRecord {
  return createItemRecord(determineArchetype(attributes), name, attributes, url);
}

/**
 * Project a record onto its archetype's column order.
 * Labels resolve the same way classification reads them; missing ones render as "".
 */
export function toRow(item: ItemRecord): string[] {
  const [, ...fields] = ARCHETYPE_FIELDS[item.archetype];
  return [item.name, ...fields.map((field) => getAttribute(item.attributes, field) ?? "")];
}

/**
 * Sub-category file an item belongs to within its archetype.
 * Weapons: first weapon bucket token contained in Type. Equipment: exact Slot lookup.
 */
export function resolveBucket(item: ItemRecord): string {
  if (item.archetype === "weapon") {
    const type = (getAttribute(item.attributes, "Type") ?? "").toLowerCase();
    const match = WEAPON_BUCKETS.find(([token]) => type.includes(token));
    return match ? match[1] : MISC_BUCKET;
  }

  const slot = (getAttribute(item.attributes, "Slot") ?? "").trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(EQUIPMENT_BUCKETS, slot)
    ? EQUIPMENT_BUCKETS[slot]
    : MISC_BUCKET;
}
