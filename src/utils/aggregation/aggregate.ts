import type { Candidate, CandidateOutcome, Race, RaceTally, ResultRow, WinnerStatus } from "../../types";
import { IncompleteDataError, InvalidResultError } from "../errors";

// Tally lines reported alongside candidates that never compete for a seat.
export const DEFAULT_EXCLUDED_NAMES = ["Undervotes", "Overvotes", "Write-Ins"];

export interface AggregateOptions {
    // Towns making up the district. Rows from any other town are rejected and
    // towns without a row for every candidate are reported as pending.
    municipalities?: string[];
    // Explicit completeness signal: missing rows count as zero votes.
    assumeMissingAreZero?: boolean;
    excludedNames?: string[];
}

function compareText(a: string, b: string) {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sum municipal results per candidate, rank them and decide who fills the
 * race's seats.
 *
 * The top `race.seats` candidates win unless the candidate holding the last
 * seat is tied with the first candidate outside it. Then every candidate on
 * that total is undetermined and the contested seats stay open.
 *
 * Margins are measured at the seat boundary: winners against the highest
 * losing total, losers against the lowest winning total.
 */
export function aggregate(
    race: Race,
    candidates: Candidate[],
    results: ResultRow[],
    options: AggregateOptions = {}
): RaceTally {
    if (!Number.isInteger(race.seats) || race.seats < 1) {
        throw new InvalidResultError(race.id, `seat count must be a positive integer, got ${race.seats}`);
    }

    const byId = new Map<string, Candidate>();
    for (const c of candidates) {
        if (c.raceId !== race.id) throw new InvalidResultError(race.id, `candidate ${c.name} belongs to race ${c.raceId}`);
        byId.set(c.id, c);
    }

    const district = options.municipalities ? new Set(options.municipalities) : null;
    const totals = new Map<string, number>();
    const reported = new Map<string, Set<string>>();

    for (const row of results) {
        if (row.raceId !== race.id) throw new InvalidResultError(race.id, `result row belongs to race ${row.raceId}`);
        const candidate = byId.get(row.candidateId);
        if (!candidate) throw new InvalidResultError(race.id, `result for unknown candidate ${row.candidateId}`);
        if (!Number.isInteger(row.votes) || row.votes < 0) {
            throw new InvalidResultError(
                race.id,
                `${candidate.name} in ${row.municipality}: votes must be a non-negative integer, got ${row.votes}`
            );
        }
        if (district && !district.has(row.municipality)) {
            throw new InvalidResultError(race.id, `${row.municipality} is not part of district ${race.district}`);
        }
        const seen = reported.get(candidate.id) ?? new Set<string>();
        if (seen.has(row.municipality)) {
            throw new InvalidResultError(race.id, `duplicate result for ${candidate.name} in ${row.municipality}`);
        }
        seen.add(row.municipality);
        reported.set(candidate.id, seen);
        totals.set(candidate.id, (totals.get(candidate.id) ?? 0) + row.votes);
    }

    const excluded = new Set((options.excludedNames ?? DEFAULT_EXCLUDED_NAMES).map((n) => n.toLowerCase()));
    const contenders = candidates.filter((c) => !excluded.has(c.name.toLowerCase()));
    const assumeZero = options.assumeMissingAreZero === true;

    if (!assumeZero) {
        const missing = contenders
            .filter((c) => !reported.has(c.id))
            .map((c) => ({ candidateId: c.id, candidateName: c.name }));
        if (missing.length) throw new IncompleteDataError(race.id, missing);
    }

    const pending: string[] = [];
    if (district && !assumeZero) {
        for (const town of district) {
            if (contenders.some((c) => !reported.get(c.id)?.has(town))) pending.push(town);
        }
    }

    const ranked = contenders
        .map((candidate) => ({ candidate, total: totals.get(candidate.id) ?? 0 }))
        .sort(
            (a, b) =>
                b.total - a.total ||
                compareText(a.candidate.name, b.candidate.name) ||
                compareText(a.candidate.id, b.candidate.id)
        );
    const totalVotes = ranked.reduce((sum, r) => sum + r.total, 0);

    const seats = race.seats;
    const uncontested = ranked.length <= seats;
    const lastWinningTotal = uncontested ? null : ranked[seats - 1].total;
    const firstLosingTotal = uncontested ? null : ranked[seats].total;
    const tieAtCutoff = lastWinningTotal !== null && lastWinningTotal === firstLosingTotal;

    let undeterminedSeats = 0;
    if (tieAtCutoff) {
        const clearWinners = ranked.filter((r) => r.total > (lastWinningTotal ?? 0)).length;
        undeterminedSeats = seats - clearWinners;
    }

    const outcomes: CandidateOutcome[] = [];
    ranked.forEach((r, i) => {
        const prev = outcomes[i - 1];
        const rank = prev && prev.total === r.total ? prev.rank : i + 1;

        let status: WinnerStatus;
        if (uncontested) status = "winner";
        else if (tieAtCutoff) status = r.total > (lastWinningTotal ?? 0) ? "winner" : r.total === lastWinningTotal ? "undetermined" : "loser";
        else status = i < seats ? "winner" : "loser";

        let margin: number | null = null;
        if (lastWinningTotal !== null && firstLosingTotal !== null) {
            if (status === "winner") margin = r.total - firstLosingTotal;
            else if (status === "loser") margin = r.total - lastWinningTotal;
            else margin = 0;
        }

        outcomes.push({
            candidate: r.candidate,
            total: r.total,
            rank,
            status,
            margin,
            share: totalVotes === 0 ? 0 : r.total / totalVotes,
        });
    });

    return {
        race,
        status: pending.length ? "partial" : "complete",
        totalVotes,
        outcomes,
        uncontested,
        tieAtCutoff,
        undeterminedSeats,
        lastWinningTotal,
        firstLosingTotal,
        cutoffMargin: lastWinningTotal !== null && firstLosingTotal !== null ? lastWinningTotal - firstLosingTotal : null,
        pendingMunicipalities: pending,
    };
}

export interface RaceInput {
    race: Race;
    candidates: Candidate[];
    results: ResultRow[];
    options?: AggregateOptions;
}

export type RaceOutcome =
    | { raceId: string; ok: true; tally: RaceTally }
    | { raceId: string; ok: false; error: IncompleteDataError | InvalidResultError };

/** Aggregate several races; bad data in one race never stops the others. */
export function aggregateRaces(inputs: RaceInput[], defaults: AggregateOptions = {}): RaceOutcome[] {
    return inputs.map((input): RaceOutcome => {
        try {
            const tally = aggregate(input.race, input.candidates, input.results, { ...defaults, ...input.options });
            return { raceId: input.race.id, ok: true, tally };
        } catch (err) {
            if (err instanceof IncompleteDataError || err instanceof InvalidResultError) {
                return { raceId: input.race.id, ok: false, error: err };
            }
            throw err;
        }
    });
}
