import { z } from "zod";

/**
 * Rows of a tile map: at least one row, every row the same non-zero length.
 */
export const TileRowsSchema = z
  .array(z.string().min(1, { error: "Map rows cannot be empty" }))
  .min(1, { error: "Map must contain at least one row" })
  .superRefine((rows, ctx) => {
    const expected = rows[0]?.length ?? 0;
    rows.forEach((row, index) => {
      if (row.length !== expected) {
        ctx.addIssue({
          code: "custom",
          message: `Row ${index} has length ${row.length}, expected ${expected}`,
          path: [index],
        });
      }
    });
  });

export type TileRows = z.infer<typeof TileRowsSchema>;
