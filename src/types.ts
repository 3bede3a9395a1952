export type ElectionType = "general" | "primary";

export interface Election {
    id: string;
    year: number;
    type: ElectionType;
    party?: string; // primaries only
    createdAt: number;
}

export interface Race {
    id: string;
    electionId: string;
    office: string;
    district: string;
    county?: string;
    seats: number; // > 1 for multi-member districts
    createdAt: number;
}

export interface Candidate {
    id: string;
    raceId: string;
    name: string;
    party: string;
}

export interface ResultRow {
    raceId: string;
    candidateId: string;
    municipality: string;
    votes: number;
}

export interface VoterRegistration {
    electionId: string;
    municipality: string;
    ballotsCast: number;
}

export interface DistrictComposition {
    raceId: string;
    municipalities: string[];
}

export type AuditAction = "create" | "update";

export interface ResultAudit {
    id: string;
    userId: string;
    raceId: string;
    municipality: string;
    candidateId: string;
    action: AuditAction;
    oldValues: { votes: number } | null;
    newValues: { votes: number };
    createdAt: number;
}

export type WinnerStatus = "winner" | "loser" | "undetermined";

export interface CandidateOutcome {
    candidate: Candidate;
    total: number;
    rank: number;
    status: WinnerStatus;
    // null when the race is uncontested (no seat boundary to measure against)
    margin: number | null;
    share: number;
}

export interface RaceTally {
    race: Race;
    status: "complete" | "partial";
    totalVotes: number;
    outcomes: CandidateOutcome[];
    uncontested: boolean;
    tieAtCutoff: boolean;
    undeterminedSeats: number;
    lastWinningTotal: number | null;
    firstLosingTotal: number | null;
    cutoffMargin: number | null;
    pendingMunicipalities: string[];
}

export interface RaceTurnout {
    votesCast: number;
    ballotsCast: number;
    turnout?: number;
    turnoutPct?: number;
}
