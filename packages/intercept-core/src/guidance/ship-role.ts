import type { GuidanceHost, ShipKind } from "../types.ts";
import { FighterGuidance } from "./fighter-guidance.ts";
import type { GuidanceOptions, GuidanceReport } from "./guidance-report.ts";
import { MissileGuidance } from "./missile-guidance.ts";

export type ShipRole =
  | { kind: "fighter"; fighter: FighterGuidance }
  | { kind: "missile"; missile: MissileGuidance };

export function createShipRole(kind: ShipKind, options: GuidanceOptions): ShipRole {
  switch (kind) {
    case "fighter":
      return { kind, fighter: new FighterGuidance(options) };
    case "missile":
      return { kind, missile: new MissileGuidance(options) };
  }
}

/** Runs one guidance tick for whichever role the ship carries. */
export function tickShip(role: ShipRole, host: GuidanceHost): GuidanceReport {
  switch (role.kind) {
    case "fighter":
      return role.fighter.tick(host);
    case "missile":
      return role.missile.tick(host);
  }
}
