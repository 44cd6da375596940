import { z } from "zod";

/** Symbols reserved by the tile grid: wall and empty floor. */
export const RESERVED_TILE_SYMBOLS = ["w", "r"] as const;

const ResourceSymbolSchema = z
  .string()
  .length(1, { error: "Resource symbol must be a single character" })
  .refine(
    (symbol) => !RESERVED_TILE_SYMBOLS.some((reserved) => reserved === symbol),
    { error: "Resource symbol cannot be a wall or floor symbol" },
  )
  .refine((symbol) => symbol.trim().length === 1, {
    error: "Resource symbol cannot be whitespace",
  });

export const ResourceSpecSchema = z.object({
  symbol: ResourceSymbolSchema,
  count: z
    .number()
    .int({ error: "Resource count must be an integer" })
    .min(0, { error: "Resource count cannot be negative" }),
});

export const ResourcePlanSchema = z
  .object({
    spawn: ResourceSpecSchema,
    medkit: ResourceSpecSchema,
    ammo: ResourceSpecSchema,
  })
  .superRefine((plan, ctx) => {
    const seen = new Map<string, string>();
    for (const kind of ["spawn", "medkit", "ammo"] as const) {
      const symbol = plan[kind].symbol;
      const owner = seen.get(symbol);
      if (owner !== undefined) {
        ctx.addIssue({
          code: "custom",
          message: `Symbol "${symbol}" is used by both ${owner} and ${kind}`,
          path: [kind, "symbol"],
        });
      }
      seen.set(symbol, kind);
    }
  });

export type ResourceSpec = z.infer<typeof ResourceSpecSchema>;
export type ResourcePlan = z.infer<typeof ResourcePlanSchema>;
export type ResourceKind = keyof ResourcePlan;

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "spawn",
  "medkit",
  "ammo",
];

/**
 * Resource plan used when the caller does not override a kind.
 */
export const DEFAULT_RESOURCE_PLAN: ResourcePlan = {
  spawn: { symbol: "s", count: 5 },
  medkit: { symbol: "h", count: 4 },
  ammo: { symbol: "a", count: 4 },
};
