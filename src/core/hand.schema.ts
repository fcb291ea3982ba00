/**
 * Hand-load payload, produced by an external loader and validated here before it
 * reaches the reducer.
 */

import { z } from "zod";
import { ACTION_KINDS, STREETS } from "./model";

const card = z.string().regex(/^[2-9TJQKA][SHDC]$/, "card must look like AS, TD, 9C");
const seatIndex = z.number().int().min(0).max(9);
const chips = z.number().int().min(0);

const seatSchema = z.object({
  seat: seatIndex,
  playerUid: z.string().min(1),
  name: z.string().min(1),
  stack: chips,
  chipsInFront: chips.default(0),
  folded: z.boolean().default(false),
  allIn: z.boolean().default(false),
  cards: z.array(card).max(2).default([]),
  position: z.number().int().min(0),
});

const loggedActionSchema = z.object({
  seat: seatIndex,
  kind: z.enum(ACTION_KINDS),
  amount: chips.default(0),
  street: z.enum(STREETS),
});

export const handSchema = z
  .object({
    handId: z.string().min(1),
    seats: z.array(seatSchema).min(1).max(10),
    board: z.array(card).max(5).default([]),
    runout: z.array(card).max(5).default([]),
    pot: chips.default(0),
    toActSeat: seatIndex.nullable().default(null),
    legalActions: z.array(z.enum(ACTION_KINDS)).default([]),
    dealerSeat: seatIndex.optional(),
    bigBlind: z.number().int().positive().default(2),
    actions: z.array(loggedActionSchema).default([]),
    winners: z.array(z.object({ seat: seatIndex, amount: chips })).default([]),
  })
  .superRefine((hand, ctx) => {
    const seen = new Set<number>();
    for (const s of hand.seats) {
      if (seen.has(s.seat)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["seats"], message: `duplicate seat ${s.seat}` });
      }
      seen.add(s.seat);
    }
    if (hand.toActSeat !== null && !seen.has(hand.toActSeat)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["toActSeat"], message: "toActSeat is not seated" });
    }
    if (![0, 3, 4, 5].includes(hand.board.length)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["board"], message: "board must hold 0, 3, 4 or 5 cards" });
    }
    if (hand.board.length + hand.runout.length > 5) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["runout"], message: "board and runout exceed 5 cards" });
    }
    for (const [i, a] of hand.actions.entries()) {
      if (!seen.has(a.seat)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["actions", i, "seat"], message: "action seat is not seated" });
      }
    }
  });

export type HandData = z.infer<typeof handSchema>;
export type HandInput = z.input<typeof handSchema>;

export type HandIssues = {
  formErrors: string[];
  fieldErrors: Partial<Record<string, string[]>>;
};

export type HandParseResult = { ok: true; hand: HandData } | { ok: false; error: HandIssues };

export function parseHand(raw: unknown): HandParseResult {
  const parsed = handSchema.safeParse(raw);
  if (parsed.success) return { ok: true, hand: parsed.data };
  return { ok: false, error: parsed.error.flatten() };
}
