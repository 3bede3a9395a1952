import fs from "fs";
import path from "path";
import { z } from "zod";
import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { BotConfig } from "../config";
import type {
    Candidate,
    DistrictComposition,
    Election,
    Race,
    ResultAudit,
    ResultRow,
    VoterRegistration,
} from "../types";
import { ConfirmationRequiredError, InvalidResultError, NotFoundError } from "./errors";
import { shortId } from "./id";

export interface VoteEntry {
    candidateId: string;
    votes: number;
}

export interface BallotsEntry {
    municipality: string;
    ballotsCast: number;
}

export interface RaceSnapshot {
    race: Race;
    candidates: Candidate[];
    results: ResultRow[];
    composition: DistrictComposition | null;
    audit: ResultAudit[];
}

/**
 * Persistence for elections, races, candidates and municipal results.
 * Writes that change results return how many rows actually changed.
 */
export interface ResultStore {
    saveElection(election: Election): Promise<void>;
    getElection(id: string): Promise<Election | null>;
    listElections(): Promise<Election[]>;

    saveRace(race: Race): Promise<void>;
    getRace(id: string): Promise<Race | null>;
    listRaces(electionId: string): Promise<Race[]>;

    saveCandidate(candidate: Candidate): Promise<void>;
    listCandidates(raceId: string): Promise<Candidate[]>;
    /** Candidates in any race whose name contains `query`, ignoring case. */
    searchCandidates(query: string): Promise<Candidate[]>;

    saveResults(raceId: string, municipality: string, entries: VoteEntry[], userId: string): Promise<number>;
    listResults(raceId: string): Promise<ResultRow[]>;
    listAudit(raceId: string): Promise<ResultAudit[]>;

    saveBallotsCast(electionId: string, entries: BallotsEntry[]): Promise<number>;
    listBallotsCast(electionId: string): Promise<VoterRegistration[]>;

    setComposition(raceId: string, municipalities: string[]): Promise<void>;
    getComposition(raceId: string): Promise<DistrictComposition | null>;

    /** Deletes a race with everything entered for it. `confirm` must repeat the race id. */
    deleteRace(raceId: string, opts: { confirm?: string }): Promise<string>;
}

/* ---------- Schemas ---------- */

const ElectionSchema = z.object({
    id: z.string(),
    year: z.number().int(),
    type: z.enum(["general", "primary"]),
    party: z.string().optional(),
    createdAt: z.number(),
});

const RaceSchema = z.object({
    id: z.string(),
    electionId: z.string(),
    office: z.string(),
    district: z.string(),
    county: z.string().optional(),
    seats: z.number().int().min(1),
    createdAt: z.number(),
});

const CandidateSchema = z.object({
    id: z.string(),
    raceId: z.string(),
    name: z.string(),
    party: z.string(),
});

const ResultRowSchema = z.object({
    raceId: z.string(),
    candidateId: z.string(),
    municipality: z.string(),
    votes: z.number().int().min(0),
});

const VoterRegistrationSchema = z.object({
    electionId: z.string(),
    municipality: z.string(),
    ballotsCast: z.number().int().min(0),
});

const VotesValueSchema = z.object({ votes: z.number() });

const AuditSchema = z.object({
    id: z.string(),
    userId: z.string(),
    raceId: z.string(),
    municipality: z.string(),
    candidateId: z.string(),
    action: z.enum(["create", "update"]),
    oldValues: VotesValueSchema.nullable(),
    newValues: VotesValueSchema,
    createdAt: z.number(),
});

const FileDataSchema = z.object({
    elections: z.record(ElectionSchema).default({}),
    races: z.record(RaceSchema).default({}),
    candidates: z.record(CandidateSchema).default({}),
    results: z.array(ResultRowSchema).default([]),
    voterRegistration: z.array(VoterRegistrationSchema).default([]),
    compositions: z.record(z.array(z.string())).default({}),
    audit: z.array(AuditSchema).default([]),
});

type FileData = z.infer<typeof FileDataSchema>;

/* ---------- Shared checks ---------- */

function checkEntries(
    race: Race,
    candidates: Candidate[],
    composition: string[] | null,
    municipality: string,
    entries: VoteEntry[]
) {
    if (composition && !composition.includes(municipality)) {
        throw new InvalidResultError(race.id, `${municipality} is not part of district ${race.district}`);
    }
    const ids = new Set(candidates.map((c) => c.id));
    for (const e of entries) {
        if (!ids.has(e.candidateId)) throw new NotFoundError("Candidate", e.candidateId);
        if (!Number.isInteger(e.votes) || e.votes < 0) {
            throw new InvalidResultError(race.id, `votes must be a non-negative integer, got ${e.votes}`);
        }
    }
}

function checkBallots(electionId: string, entries: BallotsEntry[]) {
    for (const e of entries) {
        if (!e.municipality.trim()) throw new InvalidResultError(electionId, "municipality is required");
        if (!Number.isInteger(e.ballotsCast) || e.ballotsCast < 0) {
            throw new InvalidResultError(electionId, `ballots cast must be a non-negative integer, got ${e.ballotsCast}`);
        }
    }
}

function auditEntry(
    userId: string,
    raceId: string,
    municipality: string,
    candidateId: string,
    oldVotes: number | null,
    newVotes: number
): ResultAudit {
    return {
        id: shortId(12),
        userId,
        raceId,
        municipality,
        candidateId,
        action: oldVotes === null ? "create" : "update",
        oldValues: oldVotes === null ? null : { votes: oldVotes },
        newValues: { votes: newVotes },
        createdAt: Date.now(),
    };
}

/** Write everything about a race to a timestamped JSON file before it is deleted. */
export function writeRaceBackup(dir: string, snapshot: RaceSnapshot) {
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, `race-${snapshot.race.id}-${Date.now()}.json`);
    fs.writeFileSync(file, JSON.stringify(snapshot, null, 2), "utf8");
    return file;
}

/* ---------- File store (local dev) ---------- */

export class FileStore implements ResultStore {
    constructor(private readonly dbPath: string, private readonly backupDir: string) {}

    private ensureFileStorage() {
        const dir = path.dirname(this.dbPath);
        if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        if (!fs.existsSync(this.dbPath)) {
            fs.writeFileSync(this.dbPath, JSON.stringify(FileDataSchema.parse({}), null, 2), "utf8");
        }
    }

    private readAll(): FileData {
        this.ensureFileStorage();
        return FileDataSchema.parse(JSON.parse(fs.readFileSync(this.dbPath, "utf8")));
    }

    private writeAll(data: FileData) {
        this.ensureFileStorage();
        fs.writeFileSync(this.dbPath, JSON.stringify(data, null, 2), "utf8");
    }

    async saveElection(election: Election) {
        const db = this.readAll();
        db.elections[election.id] = election;
        this.writeAll(db);
    }

    async getElection(id: string) {
        return this.readAll().elections[id] ?? null;
    }

    async listElections() {
        return Object.values(this.readAll().elections).sort((a, b) => b.year - a.year || a.createdAt - b.createdAt);
    }

    async saveRace(race: Race) {
        const db = this.readAll();
        if (!db.elections[race.electionId]) throw new NotFoundError("Election", race.electionId);
        db.races[race.id] = race;
        this.writeAll(db);
    }

    async getRace(id: string) {
        return this.readAll().races[id] ?? null;
    }

    async listRaces(electionId: string) {
        return Object.values(this.readAll().races).filter((r) => r.electionId === electionId);
    }

    async saveCandidate(candidate: Candidate) {
        const db = this.readAll();
        if (!db.races[candidate.raceId]) throw new NotFoundError("Race", candidate.raceId);
        db.candidates[candidate.id] = candidate;
        this.writeAll(db);
    }

    async listCandidates(raceId: string) {
        return Object.values(this.readAll().candidates).filter((c) => c.raceId === raceId);
    }

    async searchCandidates(query: string) {
        const q = query.trim().toLowerCase();
        if (!q) return [];
        return Object.values(this.readAll().candidates).filter((c) => c.name.toLowerCase().includes(q));
    }

    async saveResults(raceId: string, municipality: string, entries: VoteEntry[], userId: string) {
        const db = this.readAll();
        const race = db.races[raceId];
        if (!race) throw new NotFoundError("Race", raceId);
        const candidates = Object.values(db.candidates).filter((c) => c.raceId === raceId);
        checkEntries(race, candidates, db.compositions[raceId] ?? null, municipality, entries);

        let updated = 0;
        for (const e of entries) {
            const existing = db.results.find(
                (r) => r.raceId === raceId && r.candidateId === e.candidateId && r.municipality === municipality
            );
            if (existing) {
                if (existing.votes === e.votes) continue;
                db.audit.push(auditEntry(userId, raceId, municipality, e.candidateId, existing.votes, e.votes));
                existing.votes = e.votes;
            } else {
                db.results.push({ raceId, candidateId: e.candidateId, municipality, votes: e.votes });
                db.audit.push(auditEntry(userId, raceId, municipality, e.candidateId, null, e.votes));
            }
            updated++;
        }
        this.writeAll(db);
        return updated;
    }

    async listResults(raceId: string) {
        return this.readAll().results.filter((r) => r.raceId === raceId);
    }

    async listAudit(raceId: string) {
        return this.readAll().audit.filter((a) => a.raceId === raceId);
    }

    async saveBallotsCast(electionId: string, entries: BallotsEntry[]) {
        const db = this.readAll();
        if (!db.elections[electionId]) throw new NotFoundError("Election", electionId);
        checkBallots(electionId, entries);
        let updated = 0;
        for (const e of entries) {
            const existing = db.voterRegistration.find((v) => v.electionId === electionId && v.municipality === e.municipality);
            if (existing) {
                if (existing.ballotsCast === e.ballotsCast) continue;
                existing.ballotsCast = e.ballotsCast;
            } else {
                db.voterRegistration.push({ electionId, municipality: e.municipality, ballotsCast: e.ballotsCast });
            }
            updated++;
        }
        this.writeAll(db);
        return updated;
    }

    async listBallotsCast(electionId: string) {
        return this.readAll().voterRegistration.filter((v) => v.electionId === electionId);
    }

    async setComposition(raceId: string, municipalities: string[]) {
        const db = this.readAll();
        if (!db.races[raceId]) throw new NotFoundError("Race", raceId);
        db.compositions[raceId] = [...new Set(municipalities)];
        this.writeAll(db);
    }

    async getComposition(raceId: string) {
        const towns = this.readAll().compositions[raceId];
        return towns ? { raceId, municipalities: towns } : null;
    }

    async deleteRace(raceId: string, opts: { confirm?: string }) {
        if (opts.confirm !== raceId) throw new ConfirmationRequiredError(`race ${raceId}`);
        const db = this.readAll();
        const race = db.races[raceId];
        if (!race) throw new NotFoundError("Race", raceId);

        const towns = db.compositions[raceId];
        const backup = writeRaceBackup(this.backupDir, {
            race,
            candidates: Object.values(db.candidates).filter((c) => c.raceId === raceId),
            results: db.results.filter((r) => r.raceId === raceId),
            composition: towns ? { raceId, municipalities: towns } : null,
            audit: db.audit.filter((a) => a.raceId === raceId),
        });

        delete db.races[raceId];
        delete db.compositions[raceId];
        for (const c of Object.values(db.candidates)) {
            if (c.raceId === raceId) delete db.candidates[c.id];
        }
        db.results = db.results.filter((r) => r.raceId !== raceId);
        db.audit = db.audit.filter((a) => a.raceId !== raceId);
        this.writeAll(db);
        return backup;
    }
}

/* ---------- Supabase store (server-side) ---------- */

const optionalText = z
    .string()
    .nullable()
    .optional()
    .transform((v) => v ?? undefined);

const ElectionRowSchema = z
    .object({
        id: z.string(),
        year: z.coerce.number().int(),
        election_type: z.enum(["general", "primary"]),
        party: optionalText,
        created_at: z.coerce.number(),
    })
    .transform((r): Election => ({ id: r.id, year: r.year, type: r.election_type, party: r.party, createdAt: r.created_at }));

const RaceRowSchema = z
    .object({
        id: z.string(),
        election_id: z.string(),
        office: z.string(),
        district: z.string(),
        county: optionalText,
        seats: z.coerce.number().int().min(1),
        created_at: z.coerce.number(),
    })
    .transform(
        (r): Race => ({
            id: r.id,
            electionId: r.election_id,
            office: r.office,
            district: r.district,
            county: r.county,
            seats: r.seats,
            createdAt: r.created_at,
        })
    );

const CandidateRowSchema = z
    .object({ id: z.string(), race_id: z.string(), name: z.string(), party: z.string() })
    .transform((r): Candidate => ({ id: r.id, raceId: r.race_id, name: r.name, party: r.party }));

const ResultRowDbSchema = z
    .object({ race_id: z.string(), candidate_id: z.string(), municipality: z.string(), votes: z.coerce.number().int().min(0) })
    .transform((r): ResultRow => ({ raceId: r.race_id, candidateId: r.candidate_id, municipality: r.municipality, votes: r.votes }));

const RegistrationRowSchema = z
    .object({ election_id: z.string(), municipality: z.string(), ballots_cast: z.coerce.number().int().min(0) })
    .transform(
        (r): VoterRegistration => ({ electionId: r.election_id, municipality: r.municipality, ballotsCast: r.ballots_cast })
    );

const CompositionRowSchema = z.object({ race_id: z.string(), municipality: z.string() });

const AuditRowSchema = z
    .object({
        id: z.string(),
        user_id: z.string(),
        race_id: z.string(),
        municipality: z.string(),
        candidate_id: z.string(),
        action: z.enum(["create", "update"]),
        old_values: VotesValueSchema.nullable(),
        new_values: VotesValueSchema,
        created_at: z.coerce.number(),
    })
    .transform(
        (r): ResultAudit => ({
            id: r.id,
            userId: r.user_id,
            raceId: r.race_id,
            municipality: r.municipality,
            candidateId: r.candidate_id,
            action: r.action,
            oldValues: r.old_values,
            newValues: r.new_values,
            createdAt: r.created_at,
        })
    );

function auditRow(a: ResultAudit) {
    return {
        id: a.id,
        user_id: a.userId,
        race_id: a.raceId,
        municipality: a.municipality,
        candidate_id: a.candidateId,
        action: a.action,
        old_values: a.oldValues,
        new_values: a.newValues,
        created_at: a.createdAt,
    };
}

export class SupabaseStore implements ResultStore {
    constructor(private readonly supabase: SupabaseClient, private readonly backupDir: string) {}

    async saveElection(election: Election) {
        const row = {
            id: election.id,
            year: election.year,
            election_type: election.type,
            party: election.party ?? null,
            created_at: election.createdAt,
        };
        const { error } = await this.supabase.from("elections").upsert(row);
        if (error) throw error;
    }

    async getElection(id: string) {
        const { data, error } = await this.supabase.from("elections").select("*").eq("id", id).maybeSingle();
        if (error) throw error;
        return data ? ElectionRowSchema.parse(data) : null;
    }

    async listElections() {
        const { data, error } = await this.supabase
            .from("elections")
            .select("*")
            .order("year", { ascending: false })
            .order("created_at", { ascending: true });
        if (error) throw error;
        return z.array(ElectionRowSchema).parse(data ?? []);
    }

    async saveRace(race: Race) {
        const row = {
            id: race.id,
            election_id: race.electionId,
            office: race.office,
            district: race.district,
            county: race.county ?? null,
            seats: race.seats,
            created_at: race.createdAt,
        };
        const { error } = await this.supabase.from("races").upsert(row);
        if (error) throw error;
    }

    async getRace(id: string) {
        const { data, error } = await this.supabase.from("races").select("*").eq("id", id).maybeSingle();
        if (error) throw error;
        return data ? RaceRowSchema.parse(data) : null;
    }

    async listRaces(electionId: string) {
        const { data, error } = await this.supabase.from("races").select("*").eq("election_id", electionId);
        if (error) throw error;
        return z.array(RaceRowSchema).parse(data ?? []);
    }

    async saveCandidate(candidate: Candidate) {
        const row = { id: candidate.id, race_id: candidate.raceId, name: candidate.name, party: candidate.party };
        const { error } = await this.supabase.from("candidates").upsert(row);
        if (error) throw error;
    }

    async listCandidates(raceId: string) {
        const { data, error } = await this.supabase.from("candidates").select("*").eq("race_id", raceId);
        if (error) throw error;
        return z.array(CandidateRowSchema).parse(data ?? []);
    }

    async searchCandidates(query: string) {
        const q = query.trim();
        if (!q) return [];
        // % and _ are wildcards to ilike
        const pattern = `%${q.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
        const { data, error } = await this.supabase.from("candidates").select("*").ilike("name", pattern);
        if (error) throw error;
        return z.array(CandidateRowSchema).parse(data ?? []);
    }

    async saveResults(raceId: string, municipality: string, entries: VoteEntry[], userId: string) {
        const race = await this.getRace(raceId);
        if (!race) throw new NotFoundError("Race", raceId);
        const [candidates, composition] = await Promise.all([this.listCandidates(raceId), this.getComposition(raceId)]);
        checkEntries(race, candidates, composition?.municipalities ?? null, municipality, entries);

        const { data, error } = await this.supabase
            .from("results")
            .select("*")
            .eq("race_id", raceId)
            .eq("municipality", municipality);
        if (error) throw error;
        const existing = new Map(z.array(ResultRowDbSchema).parse(data ?? []).map((r) => [r.candidateId, r.votes]));

        const changed = entries.filter((e) => existing.get(e.candidateId) !== e.votes);
        if (!changed.length) return 0;

        const rows = changed.map((e) => ({ race_id: raceId, candidate_id: e.candidateId, municipality, votes: e.votes }));
        const audit = changed.map((e) =>
            auditRow(auditEntry(userId, raceId, municipality, e.candidateId, existing.get(e.candidateId) ?? null, e.votes))
        );
        // save_results (supabase/schema.sql) upserts the rows and inserts their audit entries in one transaction
        const { error: saveError } = await this.supabase.rpc("save_results", { result_rows: rows, audit_rows: audit });
        if (saveError) throw saveError;
        return changed.length;
    }

    async listResults(raceId: string) {
        const { data, error } = await this.supabase.from("results").select("*").eq("race_id", raceId);
        if (error) throw error;
        return z.array(ResultRowDbSchema).parse(data ?? []);
    }

    async listAudit(raceId: string) {
        const { data, error } = await this.supabase
            .from("result_audit")
            .select("*")
            .eq("race_id", raceId)
            .order("created_at", { ascending: true });
        if (error) throw error;
        return z.array(AuditRowSchema).parse(data ?? []);
    }

    async saveBallotsCast(electionId: string, entries: BallotsEntry[]) {
        checkBallots(electionId, entries);
        const current = new Map((await this.listBallotsCast(electionId)).map((v) => [v.municipality, v.ballotsCast]));
        const changed = entries.filter((e) => current.get(e.municipality) !== e.ballotsCast);
        if (!changed.length) return 0;
        const rows = changed.map((e) => ({ election_id: electionId, municipality: e.municipality, ballots_cast: e.ballotsCast }));
        const { error } = await this.supabase.from("voter_registration").upsert(rows, { onConflict: "election_id,municipality" });
        if (error) throw error;
        return changed.length;
    }

    async listBallotsCast(electionId: string) {
        const { data, error } = await this.supabase.from("voter_registration").select("*").eq("election_id", electionId);
        if (error) throw error;
        return z.array(RegistrationRowSchema).parse(data ?? []);
    }

    async setComposition(raceId: string, municipalities: string[]) {
        const { error: deleteError } = await this.supabase.from("district_composition").delete().eq("race_id", raceId);
        if (deleteError) throw deleteError;
        const rows = [...new Set(municipalities)].map((municipality) => ({ race_id: raceId, municipality }));
        if (!rows.length) return;
        const { error } = await this.supabase.from("district_composition").insert(rows);
        if (error) throw error;
    }

    async getComposition(raceId: string) {
        const { data, error } = await this.supabase.from("district_composition").select("*").eq("race_id", raceId);
        if (error) throw error;
        const rows = z.array(CompositionRowSchema).parse(data ?? []);
        return rows.length ? { raceId, municipalities: rows.map((r) => r.municipality) } : null;
    }

    async deleteRace(raceId: string, opts: { confirm?: string }) {
        if (opts.confirm !== raceId) throw new ConfirmationRequiredError(`race ${raceId}`);
        const race = await this.getRace(raceId);
        if (!race) throw new NotFoundError("Race", raceId);

        const [candidates, results, composition, audit] = await Promise.all([
            this.listCandidates(raceId),
            this.listResults(raceId),
            this.getComposition(raceId),
            this.listAudit(raceId),
        ]);
        const backup = writeRaceBackup(this.backupDir, { race, candidates, results, composition, audit });

        // children first; the tables reference races(id)
        for (const table of ["results", "result_audit", "district_composition", "candidates"]) {
            const { error } = await this.supabase.from(table).delete().eq("race_id", raceId);
            if (error) throw error;
        }
        const { error } = await this.supabase.from("races").delete().eq("id", raceId);
        if (error) throw error;
        return backup;
    }
}

export function createStore(config: BotConfig): ResultStore {
    if (config.supabase) {
        const supabase = createClient(config.supabase.url, config.supabase.serviceKey, {
            auth: { persistSession: false },
            global: { headers: { "x-client-info": "election-results-bot" } },
        });
        return new SupabaseStore(supabase, config.backupDir);
    }
    return new FileStore(config.dbPath, config.backupDir);
}
