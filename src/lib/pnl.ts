/**
 * PnL and margin arithmetic for positions sized in lots.
 * `unitValue` is the account-currency value of a one-unit price move per lot.
 */

import type { Side, SymbolSpec } from "./types";

export function grossPnl(
  side: Side,
  entryPrice: number,
  exitPrice: number,
  volume: number,
  unitValue: number
): number {
  const move = side === "buy" ? exitPrice - entryPrice : entryPrice - exitPrice;
  return move * volume * unitValue;
}

export function commissionCost(volume: number, perLot: number): number {
  return volume * perLot;
}

/** Net of a round-trip commission charged per lot. */
export function realizedPnl(
  side: Side,
  entryPrice: number,
  exitPrice: number,
  volume: number,
  spec: Pick<SymbolSpec, "unitValue">,
  commissionPerLot: number = 0
): number {
  return (
    grossPnl(side, entryPrice, exitPrice, volume, spec.unitValue) -
    commissionCost(volume, commissionPerLot)
  );
}

export function requiredMargin(volume: number, spec: Pick<SymbolSpec, "marginPerLot">): number {
  return volume * spec.marginPerLot;
}
