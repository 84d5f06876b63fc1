import { z } from "zod";
import { BRANCHES, STEMS } from "../../../bazi/elementCycle.js";
import { loadCanonTable } from "../../lib/loadCanonTable.js";

const SymbolSchema = z.union([z.enum(STEMS), z.enum(BRANCHES)]);

export const SpiritKeySchema = z.enum(["day_stem", "day_branch", "year_branch", "month_branch"]);

export const SpiritRuleSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  nature: z.enum(["auspicious", "inauspicious", "mixed"]),
  keyed_on: z.array(SpiritKeySchema).min(1),
  /** Which chart symbols are checked against the targets */
  match: z.enum(["branch", "stem", "any"]),
  table: z.record(SymbolSchema, z.array(SymbolSchema).min(1)),
});

export const SpiritTableSchema = z
  .object({
    version: z.string(),
    spirits: z.array(SpiritRuleSchema).min(1),
  })
  .refine((t) => new Set(t.spirits.map((s) => s.id)).size === t.spirits.length, {
    message: "spirit ids must be unique",
  });

export type SpiritKey = z.infer<typeof SpiritKeySchema>;
export type SpiritRule = z.infer<typeof SpiritRuleSchema>;
export type SpiritTable = z.infer<typeof SpiritTableSchema>;

let cachedTable: SpiritTable | null = null;

export function loadSpiritTable(): SpiritTable {
  if (cachedTable) return cachedTable;
  cachedTable = loadCanonTable("spirits.v1.json", SpiritTableSchema);
  return cachedTable;
}
