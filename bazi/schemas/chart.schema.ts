import { z } from "zod";
import { BRANCHES, STEMS, type Branch, type Stem } from "../elementCycle.js";
import { isSexagenaryPair } from "../sexagenary.js";

/**
 * Zod schema for a resolved Four-Pillar chart.
 *
 * The calendar conversion that produces the pillars lives outside this repo;
 * this schema only guards the symbols it hands over.
 */

export const PILLAR_ROLES = ["year", "month", "day", "hour"] as const;

export const GenderSchema = z.enum(["male", "female"]);

export const PillarInputSchema = z
  .object({
    stem: z.enum(STEMS),
    branch: z.enum(BRANCHES),
  })
  .refine((pillar) => isSexagenaryPair(pillar.stem, pillar.branch), {
    message: "stem and branch do not form a sexagenary pair",
  });

export const ChartInputSchema = z.object({
  year: PillarInputSchema,
  month: PillarInputSchema,
  day: PillarInputSchema,
  hour: PillarInputSchema,
  gender: GenderSchema,
});

export type PillarRole = (typeof PILLAR_ROLES)[number];
export type Gender = z.infer<typeof GenderSchema>;
export type ChartInput = z.infer<typeof ChartInputSchema>;

export interface Pillar {
  readonly role: PillarRole;
  readonly stem: Stem;
  readonly branch: Branch;
}

export interface Chart {
  readonly year: Pillar;
  readonly month: Pillar;
  readonly day: Pillar;
  readonly hour: Pillar;
  readonly gender: Gender;
}
