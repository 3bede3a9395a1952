import fs from "fs";
import os from "os";
import path from "path";
import { createClient } from "@supabase/supabase-js";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { Candidate, Election, Race } from "../types";
import { FileStore, SupabaseStore } from "./db";
import { ConfirmationRequiredError, InvalidResultError, NotFoundError } from "./errors";

const election: Election = { id: "e1", year: 2024, type: "general", createdAt: 1 };
const race: Race = { id: "r1", electionId: "e1", office: "State Representative", district: "3", county: "Cheshire", seats: 2, createdAt: 2 };
const alice: Candidate = { id: "c1", raceId: "r1", name: "Alice", party: "Republican" };
const bob: Candidate = { id: "c2", raceId: "r1", name: "Bob", party: "Democratic" };

describe("FileStore", () => {
    let dir: string;
    let store: FileStore;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "results-store-"));
        store = new FileStore(path.join(dir, "data", "db.json"), path.join(dir, "backups"));
        await store.saveElection(election);
        await store.saveRace(race);
        await store.saveCandidate(alice);
        await store.saveCandidate(bob);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("creates the data file and reads entities back", async () => {
        expect(fs.existsSync(path.join(dir, "data", "db.json"))).toBe(true);
        expect(await store.getElection("e1")).toEqual(election);
        expect(await store.getRace("r1")).toEqual(race);
        expect(await store.listRaces("e1")).toEqual([race]);
        expect(await store.listCandidates("r1")).toEqual([alice, bob]);
        expect(await store.getRace("missing")).toBeNull();
    });

    it("lists elections newest year first", async () => {
        await store.saveElection({ id: "e0", year: 2022, type: "general", createdAt: 0 });
        await store.saveElection({ id: "e2", year: 2024, type: "primary", party: "Democratic", createdAt: 5 });
        expect((await store.listElections()).map((e) => e.id)).toEqual(["e1", "e2", "e0"]);
    });

    it("refuses races for unknown elections and candidates for unknown races", async () => {
        await expect(store.saveRace({ ...race, id: "r2", electionId: "nope" })).rejects.toBeInstanceOf(NotFoundError);
        await expect(store.saveCandidate({ ...alice, id: "c9", raceId: "nope" })).rejects.toBeInstanceOf(NotFoundError);
    });

    it("creates, updates and skips unchanged results, auditing each change", async () => {
        expect(await store.saveResults("r1", "Keene", [{ candidateId: "c1", votes: 10 }, { candidateId: "c2", votes: 7 }], "u1")).toBe(2);
        expect(await store.saveResults("r1", "Keene", [{ candidateId: "c1", votes: 12 }, { candidateId: "c2", votes: 7 }], "u2")).toBe(1);

        expect(await store.listResults("r1")).toEqual([
            { raceId: "r1", candidateId: "c1", municipality: "Keene", votes: 12 },
            { raceId: "r1", candidateId: "c2", municipality: "Keene", votes: 7 },
        ]);

        const audit = await store.listAudit("r1");
        expect(audit.map((a) => [a.userId, a.candidateId, a.action, a.oldValues, a.newValues])).toEqual([
            ["u1", "c1", "create", null, { votes: 10 }],
            ["u1", "c2", "create", null, { votes: 7 }],
            ["u2", "c1", "update", { votes: 10 }, { votes: 12 }],
        ]);
    });

    it("rejects results outside the district or for unknown candidates", async () => {
        await store.setComposition("r1", ["Keene", "Marlow", "Keene"]);
        expect(await store.getComposition("r1")).toEqual({ raceId: "r1", municipalities: ["Keene", "Marlow"] });

        await expect(store.saveResults("r1", "Nashua", [{ candidateId: "c1", votes: 1 }], "u1")).rejects.toBeInstanceOf(
            InvalidResultError
        );
        await expect(store.saveResults("r1", "Keene", [{ candidateId: "c9", votes: 1 }], "u1")).rejects.toBeInstanceOf(
            NotFoundError
        );
        await expect(store.saveResults("r1", "Keene", [{ candidateId: "c1", votes: -2 }], "u1")).rejects.toBeInstanceOf(
            InvalidResultError
        );
        expect(await store.listResults("r1")).toEqual([]);
    });

    it("upserts ballots cast per town", async () => {
        expect(await store.saveBallotsCast("e1", [{ municipality: "Keene", ballotsCast: 900 }, { municipality: "Marlow", ballotsCast: 300 }])).toBe(2);
        expect(await store.saveBallotsCast("e1", [{ municipality: "Keene", ballotsCast: 900 }])).toBe(0);
        expect(await store.saveBallotsCast("e1", [{ municipality: "Keene", ballotsCast: 950 }])).toBe(1);
        expect(await store.listBallotsCast("e1")).toEqual([
            { electionId: "e1", municipality: "Keene", ballotsCast: 950 },
            { electionId: "e1", municipality: "Marlow", ballotsCast: 300 },
        ]);
        await expect(store.saveBallotsCast("nope", [])).rejects.toBeInstanceOf(NotFoundError);
    });

    it("only deletes a race when the confirmation repeats its id, and backs it up first", async () => {
        await store.setComposition("r1", ["Keene"]);
        await store.saveResults("r1", "Keene", [{ candidateId: "c1", votes: 5 }], "u1");

        await expect(store.deleteRace("r1", {})).rejects.toBeInstanceOf(ConfirmationRequiredError);
        await expect(store.deleteRace("r1", { confirm: "r2" })).rejects.toBeInstanceOf(ConfirmationRequiredError);
        expect(await store.getRace("r1")).toEqual(race);

        const backup = await store.deleteRace("r1", { confirm: "r1" });
        expect(path.dirname(backup)).toBe(path.join(dir, "backups"));
        const saved = JSON.parse(fs.readFileSync(backup, "utf8"));
        expect(saved.race).toEqual(race);
        expect(saved.results).toEqual([{ raceId: "r1", candidateId: "c1", municipality: "Keene", votes: 5 }]);

        expect(await store.getRace("r1")).toBeNull();
        expect(await store.listCandidates("r1")).toEqual([]);
        expect(await store.listResults("r1")).toEqual([]);
        expect(await store.getComposition("r1")).toBeNull();
        expect(await store.listAudit("r1")).toEqual([]);
        expect(await store.getElection("e1")).toEqual(election);
    });
});

interface RestCall {
    method: string;
    path: string;
    search: URLSearchParams;
    body: unknown;
}

/** A Supabase client whose REST calls are answered in process from `tables`. */
function fakeSupabase(tables: Record<string, unknown[]>, rpcError?: { message: string; code: string }) {
    const calls: RestCall[] = [];
    const json = (status: number, payload: unknown) =>
        new Response(JSON.stringify(payload), { status, headers: { "Content-Type": "application/json" } });

    async function fetchImpl(input: string | URL | Request, init?: RequestInit) {
        const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
        const method = init?.method ?? "GET";
        const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
        calls.push({ method, path: url.pathname, search: url.searchParams, body });

        if (url.pathname.startsWith("/rest/v1/rpc/")) {
            return rpcError ? json(400, { ...rpcError, details: null, hint: null }) : new Response(null, { status: 204 });
        }
        if (method === "GET") return json(200, tables[url.pathname.replace("/rest/v1/", "")] ?? []);
        return json(400, { message: `unexpected ${method} ${url.pathname}`, code: "PGRST000", details: null, hint: null });
    }

    const client = createClient("http://localhost:54321", "test-secret", {
        auth: { persistSession: false, autoRefreshToken: false },
        global: { fetch: fetchImpl },
    });
    return { client, calls, writes: () => calls.filter((c) => c.method !== "GET") };
}

describe("SupabaseStore", () => {
    const tables = {
        races: [{ id: "r1", election_id: "e1", office: "State Representative", district: "3", county: null, seats: 2, created_at: 2 }],
        candidates: [
            { id: "c1", race_id: "r1", name: "Alice", party: "Republican" },
            { id: "c2", race_id: "r1", name: "Bob", party: "Democratic" },
        ],
        results: [{ race_id: "r1", candidate_id: "c1", municipality: "Keene", votes: 10 }],
        district_composition: [],
    };

    it("saves changed results and their audit entries in one call", async () => {
        const fake = fakeSupabase(tables);
        const store = new SupabaseStore(fake.client, "unused-backups");

        const changed = await store.saveResults("r1", "Keene", [{ candidateId: "c1", votes: 10 }, { candidateId: "c2", votes: 7 }], "u1");

        expect(changed).toBe(1);
        const writes = fake.writes();
        expect(writes.map((c) => `${c.method} ${c.path}`)).toEqual(["POST /rest/v1/rpc/save_results"]);
        expect(writes[0].body).toMatchObject({
            result_rows: [{ race_id: "r1", candidate_id: "c2", municipality: "Keene", votes: 7 }],
            audit_rows: [
                { user_id: "u1", race_id: "r1", candidate_id: "c2", action: "create", old_values: null, new_values: { votes: 7 } },
            ],
        });
    });

    it("changes no results when the audited save fails", async () => {
        const fake = fakeSupabase(tables, { message: "insert into result_audit failed", code: "23503" });
        const store = new SupabaseStore(fake.client, "unused-backups");

        await expect(store.saveResults("r1", "Keene", [{ candidateId: "c2", votes: 7 }], "u1")).rejects.toMatchObject({
            message: "insert into result_audit failed",
        });
        expect(fake.writes().map((c) => c.path)).toEqual(["/rest/v1/rpc/save_results"]);
    });

    it("searches candidate names with wildcards escaped", async () => {
        const fake = fakeSupabase(tables);
        const store = new SupabaseStore(fake.client, "unused-backups");

        expect(await store.searchCandidates(" 50%_ ")).toEqual([
            { id: "c1", raceId: "r1", name: "Alice", party: "Republican" },
            { id: "c2", raceId: "r1", name: "Bob", party: "Democratic" },
        ]);
        expect(fake.calls[0].path).toBe("/rest/v1/candidates");
        expect(fake.calls[0].search.get("name")).toBe("ilike.%50\\%\\_%");
        expect(await store.searchCandidates("  ")).toEqual([]);
        expect(fake.calls).toHaveLength(1);
    });
});
