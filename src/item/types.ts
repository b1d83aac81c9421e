/** The two fixed output schemas an item is classified into */
export type Archetype = "weapon" | "equipment";

/** Infobox label → trimmed cell text */
export type ItemAttributes = Readonly<Record<string, string>>;

interface ItemRecordBase {
  readonly name: string;
  /** Detail page the record was scraped from, when known */
  readonly url?: string;
  readonly attributes: ItemAttributes;
}

export interface WeaponRecord extends ItemRecordBase {
  readonly archetype: "weapon";
}

export interface EquipmentRecord extends ItemRecordBase {
  readonly archetype: "equipment";
}

export type ItemRecord = WeaponRecord | EquipmentRecord;

/**
 * Column order for each archetype's CSV files. "Name" always comes first;
 * the remaining entries are infobox labels looked up verbatim.
 */
export const ARCHETYPE_FIELDS: Readonly<Record<Archetype, readonly string[]>> = {
  weapon: [
    "Name",
    "Type",
    "Damage",
    "Delay",
    "Stats",
    "Classes",
    "Races",
    "Effect",
    "WT",
    "Size",
    "Slot",
    "Magic Item",
    "Lore Item",
    "No Drop",
    "30d Avg",
    "90d Avg",
    "All Time Avg",
  ],
  equipment: [
    "Name",
    "Type",
    "Slot",
    "AC",
    "Stats",
    "Classes",
    "Races",
    "Effect",
    "WT",
    "Size",
    "Magic Item",
    "Lore Item",
    "No Drop",
    "30d Avg",
    "90d Avg",
    "All Time Avg",
  ],
};

/** Bucket for any Type/Slot token without a table entry */
export const MISC_BUCKET = "misc";

/**
 * Weapon Type token → bucket. Scanned in order, first contained token wins,
 * so damage types take precedence over handedness ("1H Slashing" → Slashing).
 */
export const WEAPON_BUCKETS: ReadonlyArray<readonly [token: string, bucket: string]> = [
  ["piercing", "Piercing"],
  ["blunt", "Blunt"],
  ["slashing", "Slashing"],
  ["bow", "Bows"],
  ["throwing", "Throwing"],
  ["1h", "1H_Weapons"],
  ["2h", "2H_Weapons"],
];

/** Equipment Slot (case-folded) → bucket */
export const EQUIPMENT_BUCKETS: Readonly<Record<string, string>> = {
  arms: "Arms",
  back: "Back",
  chest: "Chest",
  ear: "Ears",
  face: "Face",
  feet: "Feet",
  fingers: "Fingers",
  hands: "Hands",
  head: "Head",
  legs: "Legs",
  neck: "Neck",
  shield: "Shields",
  shoulders: "Shoulders",
  waist: "Waist",
  wrist: "Wrist",
};

export type ItemCrawlResult =
  | { outcome: "success"; item: ItemRecord }
  | { outcome: "skipped"; url: string; reason: string }
  | { outcome: "failed"; url: string; status_code: number | null; error: string };
