import { EmbedBuilder } from "discord.js";
import type { CandidateOutcome, Election, RaceTally, RaceTurnout, WinnerStatus } from "../types";
import { classifyLean, officeSortKey, partyMargin, raceLabel } from "./aggregation";
import type { CloseRace, MarginShift, SeatCount } from "./aggregation";
import type { CandidateHistory } from "./results";

const STATUS_MARK: Record<WinnerStatus, string> = {
    winner: "✅",
    loser: "▫️",
    undetermined: "⚖️",
};

export function electionLabel(election: Election) {
    const kind = election.type === "primary" && election.party ? `${election.party} primary` : election.type;
    return `${election.year} ${kind}`;
}

export function formatMargin(margin: number | null) {
    if (margin === null) return "—";
    if (margin > 0) return `+${margin.toLocaleString("en-US")}`;
    return margin.toLocaleString("en-US");
}

// Discord rejects embeds past these lengths
const FIELD_LIMIT = 1024;
const DESCRIPTION_BUDGET = 3000;
const LABEL_LIMIT = 24;
const PENDING_SHOWN = 10;

/**
 * Join as many lines as fit in `max` characters. Lines that do not fit are
 * counted in a closing "…and N more" line.
 */
export function fitLines(lines: string[], max: number) {
    let text = "";
    for (let i = 0; i < lines.length; i++) {
        const next = text ? `${text}\n${lines[i]}` : lines[i];
        const left = lines.length - i - 1;
        const suffix = left ? `\n…and ${left} more` : "";
        if (next.length + suffix.length > max) {
            const more = `…and ${lines.length - i} more`;
            return text ? `${text}\n${more}` : more;
        }
        text = next;
    }
    return text;
}

export interface BarRow {
    label: string;
    value: number;
}

export function makeBar(rows: BarRow[], total: number, max = FIELD_LIMIT) {
    const labels = rows.map((r) => (r.label.length > LABEL_LIMIT ? `${r.label.slice(0, LABEL_LIMIT - 1)}…` : r.label));
    const maxLabel = Math.max(...labels.map((k) => k.length), 4);
    const bars = rows.map(({ value: v }, i) => {
        const pct = total === 0 ? 0 : v / total;
        const barLen = Math.round(pct * 20);
        const bar = "█".repeat(barLen) + "░".repeat(20 - barLen);
        const pctStr = `${Math.round(pct * 100)}%`.padStart(4, " ");
        return `\`${labels[i].padEnd(maxLabel)}\` ${bar} ${v} (${pctStr})`;
    });
    return fitLines(bars, max);
}

export function outcomeLine(o: CandidateOutcome) {
    const party = o.candidate.party ? ` (${o.candidate.party})` : "";
    return `${STATUS_MARK[o.status]} ${o.rank}. **${o.candidate.name}**${party}: ${o.total.toLocaleString("en-US")} · margin ${formatMargin(o.margin)}`;
}

/** Text summary shared by the results embed and its refresh button. */
export function raceSummary(tally: RaceTally) {
    const lines: string[] = [];
    const seatWord = tally.race.seats === 1 ? "seat" : "seats";
    lines.push(`${tally.race.seats} ${seatWord} · Total votes: **${tally.totalVotes.toLocaleString("en-US")}**`);
    if (tally.status === "partial") {
        const pending = tally.pendingMunicipalities;
        const shown = pending.slice(0, PENDING_SHOWN).join(", ");
        const rest = pending.length - PENDING_SHOWN;
        lines.push(`⏳ Partial: waiting on ${rest > 0 ? `${shown} and ${rest} more` : shown}`);
    }
    if (tally.tieAtCutoff) {
        const plural = tally.undeterminedSeats === 1 ? "seat is" : "seats are";
        lines.push(`⚖️ Tie at the cutoff: ${tally.undeterminedSeats} ${plural} undetermined pending resolution`);
    } else if (tally.uncontested) {
        lines.push("Uncontested");
    } else {
        lines.push(`Cutoff margin: **${formatMargin(tally.cutoffMargin)}**`);
    }
    lines.push("");
    const header = lines.join("\n");
    return `${header}\n${fitLines(tally.outcomes.map(outcomeLine), DESCRIPTION_BUDGET - header.length - 1)}`;
}

export function resultEmbed(tally: RaceTally, turnout?: RaceTurnout) {
    const { race } = tally;
    const bars = tally.outcomes.map((o) => ({ label: o.candidate.name, value: o.total }));

    const e = new EmbedBuilder()
        .setTitle(`${race.office}: ${raceLabel(race)}`.slice(0, 256))
        .setDescription(raceSummary(tally))
        .addFields({ name: "Race ID", value: race.id })
        .setColor(tally.tieAtCutoff ? 0xffaa00 : tally.status === "partial" ? 0x999999 : 0x00ff99)
        .setTimestamp();
    if (tally.outcomes.length) e.addFields({ name: "Results (visual)", value: makeBar(bars, tally.totalVotes) });

    const margin = partyMargin(tally);
    if (margin.winnerParty) {
        e.addFields({ name: "Party margin", value: `${leanText(margin.marginPct)} (${classifyLean(margin.marginPct)})`, inline: true });
    }
    if (turnout) e.addFields({ name: "Turnout", value: turnoutText(turnout), inline: true });
    return e;
}

export function turnoutText(t: RaceTurnout) {
    if (t.turnoutPct === undefined) return `${t.votesCast.toLocaleString("en-US")} votes; no ballots-cast figures entered`;
    return `${t.turnoutPct}% (${t.votesCast.toLocaleString("en-US")} votes / ${t.ballotsCast.toLocaleString("en-US")} ballots)`;
}

function leanText(pct: number) {
    const sign = pct > 0 ? "R+" : pct < 0 ? "D+" : "";
    return `${sign}${Math.abs(pct)}`;
}

export function closestRacesEmbed(election: Election, races: CloseRace[]) {
    const lines = races.map((r, i) => `${i + 1}. ${r.race.office}, ${r.label}: **${leanText(r.marginPct)}**`);
    return new EmbedBuilder()
        .setTitle(`Closest races: ${electionLabel(election)}`)
        .setDescription(lines.join("\n") || "No two-party races with results yet.")
        .setColor(0x0099ff)
        .setTimestamp();
}

export function biggestShiftsEmbed(earlier: Election, later: Election, shifts: MarginShift[]) {
    const lines = shifts.map((s, i) => {
        const toward = s.direction ? ` toward ${s.direction}` : "";
        return `${i + 1}. ${s.race.office}, ${s.label}: ${leanText(s.earlierPct)} → ${leanText(s.laterPct)} (**${Math.abs(s.shift)}**${toward})`;
    });
    return new EmbedBuilder()
        .setTitle(`Biggest shifts: ${electionLabel(earlier)} → ${electionLabel(later)}`)
        .setDescription(fitLines(lines, DESCRIPTION_BUDGET) || "No two-party races held in both elections.")
        .setColor(0x0099ff)
        .setTimestamp();
}

export function candidateHistoryEmbed(query: string, history: CandidateHistory) {
    const lines = history.records.map((r) => {
        const party = r.candidate.party ? ` (${r.candidate.party})` : "";
        return `${STATUS_MARK[r.status]} ${r.election.year} ${r.race.office}, ${raceLabel(r.race)}: **${r.candidate.name}**${party} ${r.total.toLocaleString("en-US")} · rank ${r.rank} · margin ${formatMargin(r.margin)}`;
    });
    const e = new EmbedBuilder()
        .setTitle(`Candidate history: ${query}`.slice(0, 256))
        .setDescription(fitLines(lines, DESCRIPTION_BUDGET) || "No general-election races found.")
        .setColor(0x0099ff)
        .setTimestamp();
    if (history.skipped) e.setFooter({ text: `${history.skipped} race(s) skipped: results incomplete or invalid` });
    return e;
}

export function partyControlEmbed(election: Election, control: Record<string, SeatCount>, failed: number) {
    const e = new EmbedBuilder().setTitle(`Party control: ${electionLabel(election)}`).setColor(0x0099ff).setTimestamp();
    const offices = Object.entries(control).sort(([a], [b]) => officeSortKey(a) - officeSortKey(b));
    for (const [office, seats] of offices) {
        const parts = [`R **${seats.R}**`, `D **${seats.D}**`];
        if (seats.Other) parts.push(`Other **${seats.Other}**`);
        if (seats.undetermined) parts.push(`Undetermined **${seats.undetermined}**`);
        e.addFields({ name: office, value: parts.join(" · ") });
    }
    if (!Object.keys(control).length) e.setDescription("No races with results yet.");
    if (failed) e.setFooter({ text: `${failed} race(s) skipped: results incomplete or invalid` });
    return e;
}
