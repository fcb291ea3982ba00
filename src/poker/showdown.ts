import type { Card } from "../core/model";
import { toEvalCard } from "./cards";
import type { HandRuntime } from "./types";

/** Scores a 5-7 card hand; higher is better. */
export type HandEvaluator = (cards: readonly Card[]) => Promise<number>;

type EvaluatorModule = { evalHand: (cards: string[]) => unknown };

function isEvaluatorModule(value: unknown): value is EvaluatorModule {
  return typeof value === "object" && value !== null && "evalHand" in value && typeof value.evalHand === "function";
}

function readValue(result: unknown): number {
  // `poker-evaluator` returns an object containing `value`.
  if (typeof result === "object" && result !== null && "value" in result && typeof result.value === "number") {
    return result.value;
  }
  return 0;
}

let evaluatorModule: Promise<EvaluatorModule> | null = null;

// poker-evaluator ships no typings and loads a large lookup table, so it is
// resolved on the first showdown only.
async function loadPokerEvaluator(): Promise<EvaluatorModule> {
  const specifier = "poker-evaluator";
  const mod: unknown = await import(specifier);
  if (isEvaluatorModule(mod)) return mod;
  if (typeof mod === "object" && mod !== null && "default" in mod && isEvaluatorModule(mod.default)) {
    return mod.default;
  }
  throw new Error("poker-evaluator does not expose evalHand");
}

export const pokerEvaluator: HandEvaluator = async (cards) => {
  let pending = evaluatorModule;
  if (!pending) {
    pending = loadPokerEvaluator();
    evaluatorModule = pending;
    // A failed load is retried on the next showdown.
    void pending.catch(() => {
      evaluatorModule = null;
    });
  }
  const mod = await pending;
  return readValue(mod.evalHand(cards.map(toEvalCard)));
};

export type ShowdownReveal = {
  seatNo: number;
  cards: Card[];
  value: number;
};

export type ShowdownWinner = {
  seatNo: number;
  payout: number;
  value: number;
};

export async function resolveShowdown(
  rt: HandRuntime,
  evaluate: HandEvaluator
): Promise<{ reveal: ShowdownReveal[]; winners: ShowdownWinner[] }> {
  const active = Object.values(rt.players)
    .filter((p) => !p.hasFolded)
    .sort((a, b) => a.seatNo - b.seatNo);

  if (active.length === 0) {
    return { reveal: [], winners: [] };
  }

  const reveal: ShowdownReveal[] = [];
  const valueBySeat = new Map<number, number>();

  for (const p of active) {
    // Unknown hole cards cannot win against a shown hand.
    const value = p.holeCards.length === 2 ? await evaluate([...p.holeCards, ...rt.board]) : -1;
    reveal.push({ seatNo: p.seatNo, cards: p.holeCards, value });
    valueBySeat.set(p.seatNo, value);
  }

  // --- Side pots (N side pots) ---
  // Build pots from each player's total committed amount.
  const all = Object.values(rt.players).sort((a, b) => a.seatNo - b.seatNo);
  const contribBySeat = new Map<number, number>();
  for (const p of all) contribBySeat.set(p.seatNo, Math.max(0, Math.floor(p.committed)));

  const levels = Array.from(new Set(Array.from(contribBySeat.values()).filter((v) => v > 0))).sort((a, b) => a - b);
  let prev = 0;
  const pots: Array<{ amount: number; eligibleSeats: number[] }> = [];

  for (const lvl of levels) {
    const participants = all.filter((p) => (contribBySeat.get(p.seatNo) ?? 0) >= lvl);
    const amount = (lvl - prev) * participants.length;
    const eligibleSeats = participants.filter((p) => !p.hasFolded).map((p) => p.seatNo);
    if (amount > 0) pots.push({ amount, eligibleSeats });
    prev = lvl;
  }

  // Chips already in the pot when the hand was loaded belong to the main pot.
  const tracked = pots.reduce((sum, pot) => sum + pot.amount, 0);
  const carried = rt.pot.total - tracked;
  if (carried > 0) {
    const activeSeats = active.map((p) => p.seatNo);
    if (pots.length > 0) pots[0] = { amount: pots[0].amount + carried, eligibleSeats: activeSeats };
    else pots.push({ amount: carried, eligibleSeats: activeSeats });
  }

  // Distribute each pot to the best hand among eligible players for that pot.
  const payouts = new Map<number, number>();

  // Odd chip rule: when a pot cannot be split evenly, the odd chip(s) go to the
  // winner(s) closest to the left of the dealer button.
  function sortByLeftOfDealer(seats: number[]): number[] {
    const dealerSeat = rt.dealerSeat;
    return seats.slice().sort((a, b) => {
      const distA = a > dealerSeat ? a - dealerSeat : a + 100 - dealerSeat;
      const distB = b > dealerSeat ? b - dealerSeat : b + 100 - dealerSeat;
      return distA - distB;
    });
  }

  for (const pot of pots) {
    const elig = pot.eligibleSeats.filter((s) => valueBySeat.has(s));
    if (elig.length === 0) continue;

    let best = -Infinity;
    for (const s of elig) {
      const v = valueBySeat.get(s) ?? -Infinity;
      if (v > best) best = v;
    }

    const winnersSeats = sortByLeftOfDealer(elig.filter((s) => valueBySeat.get(s) === best));
    const base = Math.floor(pot.amount / winnersSeats.length);
    let rem = pot.amount - base * winnersSeats.length;

    for (const s of winnersSeats) {
      const extra = rem > 0 ? 1 : 0;
      if (rem > 0) rem -= 1;
      payouts.set(s, (payouts.get(s) ?? 0) + base + extra);
    }
  }

  // Normalize winners output (only those who receive chips).
  const winners: ShowdownWinner[] = Array.from(payouts.entries())
    .filter(([, payout]) => payout > 0)
    .map(([seatNo, payout]) => ({ seatNo, payout, value: valueBySeat.get(seatNo) ?? 0 }))
    .sort((a, b) => b.payout - a.payout || a.seatNo - b.seatNo);

  return { reveal, winners };
}
