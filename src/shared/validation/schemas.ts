import { z } from 'zod';

// Coordinate validation. Any integer is accepted so that an off-board
// destination reaches the rules engine and is reported there as
// OUT_OF_BOUNDS; non-integers and missing fields are payload errors.
export const CoordinateSchema = z.object({
  file: z.number().int(),
  rank: z.number().int(),
});

// Move validation
// NOTE: This is the structured move produced by whatever collaborator turns
// user input (notation, clicks, network frames) into a move. The engine never
// sees notation.
export const MoveSchema = z.object({
  from: CoordinateSchema,
  to: CoordinateSchema,
});

export const MoveListSchema = z.array(MoveSchema);
