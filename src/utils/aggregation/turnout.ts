import type { RaceTally, RaceTurnout, VoterRegistration } from "../../types";

function assertCount(label: string, value: number) {
    if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
    }
}

/** votesCast / ballotsCast, or undefined when no ballots were cast. */
export function turnoutRatio(votesCast: number, ballotsCast: number): number | undefined {
    assertCount("votesCast", votesCast);
    assertCount("ballotsCast", ballotsCast);
    if (ballotsCast === 0) return undefined;
    return votesCast / ballotsCast;
}

/**
 * Turnout for one race: votes cast in the race against ballots cast in the
 * towns that make up its district. In a multi-member race each ballot may
 * carry several votes, so the ratio can exceed 1.
 */
export function raceTurnout(tally: RaceTally, registrations: VoterRegistration[], municipalities: string[]): RaceTurnout {
    const towns = new Set(municipalities);
    const ballotsCast = registrations
        .filter((r) => r.electionId === tally.race.electionId && towns.has(r.municipality))
        .reduce((sum, r) => sum + r.ballotsCast, 0);
    const turnout = turnoutRatio(tally.totalVotes, ballotsCast);
    return {
        votesCast: tally.totalVotes,
        ballotsCast,
        turnout,
        turnoutPct: turnout === undefined ? undefined : Math.round(turnout * 1000) / 10,
    };
}
