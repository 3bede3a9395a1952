import type { Candidate, Election, Race, RaceTally, RaceTurnout, WinnerStatus } from "../types";
import { aggregate, aggregateRaces, DEFAULT_EXCLUDED_NAMES, officeSortKey, raceLabel, raceTurnout } from "./aggregation";
import type { RaceInput, RaceOutcome } from "./aggregation";
import type { ResultStore } from "./db";
import { NotFoundError } from "./errors";

export interface TallyOptions {
    assumeMissingAreZero?: boolean;
    excludedNames?: string[];
}

export async function loadRaceTally(store: ResultStore, raceId: string, opts: TallyOptions = {}): Promise<RaceTally> {
    const race = await store.getRace(raceId);
    if (!race) throw new NotFoundError("Race", raceId);
    const [candidates, results, composition] = await Promise.all([
        store.listCandidates(raceId),
        store.listResults(raceId),
        store.getComposition(raceId),
    ]);
    return aggregate(race, candidates, results, { ...opts, municipalities: composition?.municipalities });
}

/** Every race of an election, each aggregated on its own. */
export async function loadElectionTallies(
    store: ResultStore,
    electionId: string,
    opts: TallyOptions = {}
): Promise<RaceOutcome[]> {
    const election = await store.getElection(electionId);
    if (!election) throw new NotFoundError("Election", electionId);
    const races = await store.listRaces(electionId);
    const inputs = await Promise.all(
        races.map(async (race) => {
            const [candidates, results, composition] = await Promise.all([
                store.listCandidates(race.id),
                store.listResults(race.id),
                store.getComposition(race.id),
            ]);
            return { race, candidates, results, options: { municipalities: composition?.municipalities } };
        })
    );
    return aggregateRaces(inputs, opts);
}

/**
 * Turnout for a race. Ballots are summed over the district's towns, or over
 * the towns that have reported when no composition was declared.
 */
export async function loadRaceTurnout(store: ResultStore, tally: RaceTally): Promise<RaceTurnout> {
    const [composition, registrations] = await Promise.all([
        store.getComposition(tally.race.id),
        store.listBallotsCast(tally.race.electionId),
    ]);
    let towns = composition?.municipalities;
    if (!towns) {
        const results = await store.listResults(tally.race.id);
        towns = [...new Set(results.map((r) => r.municipality))];
    }
    return raceTurnout(tally, registrations, towns);
}

export function successfulTallies(outcomes: RaceOutcome[]): RaceTally[] {
    const tallies: RaceTally[] = [];
    for (const o of outcomes) if (o.ok) tallies.push(o.tally);
    return tallies;
}

export interface CandidateRecord {
    election: Election;
    race: Race;
    candidate: Candidate;
    total: number;
    rank: number;
    status: WinnerStatus;
    margin: number | null;
}

export interface CandidateHistory {
    records: CandidateRecord[];
    // races the candidate ran in whose results could not be aggregated
    skipped: number;
}

/**
 * General-election races run by candidates whose name contains `query`,
 * newest year first. Tally lines such as write-ins never match.
 */
export async function candidateHistory(store: ResultStore, query: string, opts: TallyOptions = {}): Promise<CandidateHistory> {
    const excluded = new Set((opts.excludedNames ?? DEFAULT_EXCLUDED_NAMES).map((n) => n.toLowerCase()));
    const matches = (await store.searchCandidates(query)).filter((c) => !excluded.has(c.name.toLowerCase()));

    const raceIds = [...new Set(matches.map((c) => c.raceId))];
    const loaded = await Promise.all(
        raceIds.map(async (raceId) => {
            const race = await store.getRace(raceId);
            const election = race ? await store.getElection(race.electionId) : null;
            if (!race || !election || election.type !== "general") return null;
            const [candidates, results, composition] = await Promise.all([
                store.listCandidates(raceId),
                store.listResults(raceId),
                store.getComposition(raceId),
            ]);
            return { election, input: { race, candidates, results, options: { municipalities: composition?.municipalities } } };
        })
    );

    const elections = new Map<string, Election>();
    const inputs: RaceInput[] = [];
    for (const l of loaded) {
        if (!l) continue;
        elections.set(l.election.id, l.election);
        inputs.push(l.input);
    }

    const records: CandidateRecord[] = [];
    let skipped = 0;
    for (const outcome of aggregateRaces(inputs, opts)) {
        if (!outcome.ok) {
            skipped++;
            continue;
        }
        const { tally } = outcome;
        const election = elections.get(tally.race.electionId);
        if (!election) continue;
        for (const o of tally.outcomes) {
            if (!matches.some((c) => c.id === o.candidate.id)) continue;
            records.push({
                election,
                race: tally.race,
                candidate: o.candidate,
                total: o.total,
                rank: o.rank,
                status: o.status,
                margin: o.margin,
            });
        }
    }
    records.sort(
        (a, b) =>
            b.election.year - a.election.year ||
            officeSortKey(a.race.office) - officeSortKey(b.race.office) ||
            raceLabel(a.race).localeCompare(raceLabel(b.race), "en", { numeric: true }) ||
            a.candidate.name.localeCompare(b.candidate.name)
    );
    return { records, skipped };
}
