export { aggregate, aggregateRaces, DEFAULT_EXCLUDED_NAMES } from "./aggregate";
export type { AggregateOptions, RaceInput, RaceOutcome } from "./aggregate";
export { turnoutRatio, raceTurnout } from "./turnout";
export {
    biggestShifts,
    classifyLean,
    closestRaces,
    officeSortKey,
    partyCode,
    partyControl,
    partyMargin,
    raceLabel,
    sortRaces,
} from "./analysis";
export type { CloseRace, Lean, MarginShift, PartyCode, PartyMargin, SeatCount } from "./analysis";
