import type { Race, RaceTally } from "../../types";

export type PartyCode = "R" | "D" | "Other";

export type Lean = "Safe R" | "Likely R" | "Lean R" | "Toss-up" | "Lean D" | "Likely D" | "Safe D";

// Lower sorts first; unknown offices go last.
const OFFICE_ORDER: Record<string, number> = {
    "President of the United States": 1,
    Governor: 2,
    "United States Senator": 3,
    "United States Representative": 4,
    "Representative in Congress": 4,
    "Executive Councilor": 5,
    "State Senator": 6,
    "State Representative": 7,
};

export function officeSortKey(office: string) {
    return OFFICE_ORDER[office] ?? 99;
}

export function sortRaces<T extends { race: Race }>(items: T[]): T[] {
    return items
        .slice()
        .sort(
            (a, b) =>
                officeSortKey(a.race.office) - officeSortKey(b.race.office) ||
                a.race.district.localeCompare(b.race.district, "en", { numeric: true })
        );
}

export function partyCode(party: string): PartyCode {
    const p = party.trim().toLowerCase();
    if (p === "r" || p === "rep" || p === "republican") return "R";
    if (p === "d" || p === "dem" || p === "democrat" || p === "democratic") return "D";
    return "Other";
}

function round1(n: number) {
    return Math.round(n * 10) / 10;
}

export interface PartyMargin {
    rVotes: number;
    dVotes: number;
    margin: number;
    // (R - D) / (R + D) * 100, so races with uneven slates stay comparable
    marginPct: number;
    winnerParty: "R" | "D" | "Tie" | null;
}

export function partyMargin(tally: RaceTally): PartyMargin {
    let rVotes = 0;
    let dVotes = 0;
    for (const o of tally.outcomes) {
        const code = partyCode(o.candidate.party);
        if (code === "R") rVotes += o.total;
        else if (code === "D") dVotes += o.total;
    }
    const rd = rVotes + dVotes;
    if (rd === 0) return { rVotes, dVotes, margin: 0, marginPct: 0, winnerParty: null };
    return {
        rVotes,
        dVotes,
        margin: rVotes - dVotes,
        marginPct: round1(((rVotes - dVotes) / rd) * 100),
        winnerParty: rVotes > dVotes ? "R" : dVotes > rVotes ? "D" : "Tie",
    };
}

export function classifyLean(marginPct: number): Lean {
    if (marginPct > 15) return "Safe R";
    if (marginPct > 8) return "Likely R";
    if (marginPct > 3) return "Lean R";
    if (marginPct > -3) return "Toss-up";
    if (marginPct > -8) return "Lean D";
    if (marginPct > -15) return "Likely D";
    return "Safe D";
}

export function raceLabel(race: Race) {
    return race.county ? `${race.county} ${race.district}` : `District ${race.district}`;
}

export interface CloseRace extends PartyMargin {
    race: Race;
    label: string;
}

/** Two-party contested races ordered by the size of their normalized margin. */
export function closestRaces(tallies: RaceTally[], limit = 10): CloseRace[] {
    return tallies
        .map((t) => ({ race: t.race, label: raceLabel(t.race), ...partyMargin(t) }))
        .filter((r) => r.rVotes > 0 && r.dVotes > 0)
        .sort((a, b) => Math.abs(a.marginPct) - Math.abs(b.marginPct) || a.label.localeCompare(b.label))
        .slice(0, limit);
}

export interface MarginShift {
    race: Race;
    label: string;
    earlierPct: number;
    laterPct: number;
    // positive toward R, negative toward D
    shift: number;
    direction: "R" | "D" | null;
}

function raceKey(race: Race) {
    return [race.office, race.district, race.county ?? ""].join("\u0000");
}

function twoPartyPct(t: RaceTally) {
    const m = partyMargin(t);
    if (m.rVotes === 0 || m.dVotes === 0) return null;
    return ((m.rVotes - m.dVotes) / (m.rVotes + m.dVotes)) * 100;
}

/**
 * Races held in both elections (same office, district and county) ordered by
 * how far their two-party margin moved. Races either side left uncontested by
 * a major party are skipped.
 */
export function biggestShifts(earlier: RaceTally[], later: RaceTally[], limit = 10): MarginShift[] {
    const before = new Map<string, number>();
    for (const t of earlier) {
        const pct = twoPartyPct(t);
        if (pct !== null) before.set(raceKey(t.race), pct);
    }
    const shifts: MarginShift[] = [];
    for (const t of later) {
        const pct = twoPartyPct(t);
        const prev = before.get(raceKey(t.race));
        if (pct === null || prev === undefined) continue;
        const shift = round1(pct - prev);
        shifts.push({
            race: t.race,
            label: raceLabel(t.race),
            earlierPct: round1(prev),
            laterPct: round1(pct),
            shift,
            direction: shift > 0 ? "R" : shift < 0 ? "D" : null,
        });
    }
    return shifts
        .sort(
            (a, b) =>
                Math.abs(b.shift) - Math.abs(a.shift) ||
                officeSortKey(a.race.office) - officeSortKey(b.race.office) ||
                a.label.localeCompare(b.label)
        )
        .slice(0, limit);
}

export interface SeatCount {
    R: number;
    D: number;
    Other: number;
    undetermined: number;
}

/** Seats won per office. Seats tied at the cutoff are counted apart. */
export function partyControl(tallies: RaceTally[]): Record<string, SeatCount> {
    const control: Record<string, SeatCount> = {};
    for (const t of tallies) {
        const seats = (control[t.race.office] ??= { R: 0, D: 0, Other: 0, undetermined: 0 });
        for (const o of t.outcomes) {
            if (o.status === "winner") seats[partyCode(o.candidate.party)] += 1;
        }
        seats.undetermined += t.undeterminedSeats;
    }
    return control;
}
