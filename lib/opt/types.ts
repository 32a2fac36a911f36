export type Slot =
  | "PG"
  | "SG"
  | "SF"
  | "PF"
  | "C"
  | "G"
  | "F"
  | "UTIL";

// Per-game counting line a lineup slot contributes for one day
export type DailyLine = {
  PTS: number;
  AST: number;
  BLK: number;
  REB: number;
  STL: number;
  "3PM": number;
  FTM: number;
  FTA: number;
  DD: number; // expected double-doubles per game
};

export type SlotAssignment =
  | { slot: Slot; playerId: string; line: DailyLine }
  | { slot: Slot; playerId: null; line: null }; // empty slot

export type DailyLineup = {
  day: number;
  eligible: number; // players scheduled and healthy that day
  slots: SlotAssignment[]; // length === config.slots.length, empty when no one was eligible
};
