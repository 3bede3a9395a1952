import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { FileStore } from "./db";
import { IncompleteDataError, NotFoundError } from "./errors";
import { candidateHistory, loadElectionTallies, loadRaceTally, loadRaceTurnout, successfulTallies } from "./results";

describe("result service", () => {
    let dir: string;
    let store: FileStore;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "results-service-"));
        store = new FileStore(path.join(dir, "db.json"), path.join(dir, "backups"));

        await store.saveElection({ id: "e1", year: 2024, type: "general", createdAt: 0 });
        await store.saveRace({ id: "rep", electionId: "e1", office: "State Representative", district: "1", seats: 2, createdAt: 0 });
        await store.saveRace({ id: "sen", electionId: "e1", office: "State Senator", district: "9", seats: 1, createdAt: 0 });
        await store.setComposition("rep", ["Keene", "Marlow"]);

        await store.saveCandidate({ id: "a", raceId: "rep", name: "A", party: "Republican" });
        await store.saveCandidate({ id: "b", raceId: "rep", name: "B", party: "Democratic" });
        await store.saveCandidate({ id: "c", raceId: "rep", name: "C", party: "Republican" });
        await store.saveCandidate({ id: "s1", raceId: "sen", name: "S1", party: "Republican" });
        await store.saveCandidate({ id: "s2", raceId: "sen", name: "S2", party: "Democratic" });

        await store.saveResults("rep", "Keene", [
            { candidateId: "a", votes: 300 },
            { candidateId: "b", votes: 250 },
            { candidateId: "c", votes: 240 },
        ], "u1");
        await store.saveResults("rep", "Marlow", [
            { candidateId: "a", votes: 200 },
            { candidateId: "b", votes: 150 },
            { candidateId: "c", votes: 150 },
        ], "u1");
        // the senate race has only one candidate entered so far
        await store.saveResults("sen", "Keene", [{ candidateId: "s1", votes: 40 }], "u1");
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("aggregates a race from the store against its district", async () => {
        const tally = await loadRaceTally(store, "rep");
        expect(tally.status).toBe("complete");
        expect(tally.outcomes.map((o) => [o.candidate.name, o.total, o.status, o.margin])).toEqual([
            ["A", 500, "winner", 110],
            ["B", 400, "winner", 10],
            ["C", 390, "loser", -10],
        ]);
    });

    it("throws for unknown races and incomplete entry", async () => {
        await expect(loadRaceTally(store, "nope")).rejects.toBeInstanceOf(NotFoundError);
        await expect(loadRaceTally(store, "sen")).rejects.toBeInstanceOf(IncompleteDataError);
        const tally = await loadRaceTally(store, "sen", { assumeMissingAreZero: true });
        expect(tally.outcomes.map((o) => o.status)).toEqual(["winner", "loser"]);
    });

    it("aggregates every race of an election independently", async () => {
        const outcomes = await loadElectionTallies(store, "e1");
        expect(outcomes.map((o) => [o.raceId, o.ok])).toEqual([
            ["rep", true],
            ["sen", false],
        ]);
        expect(successfulTallies(outcomes).map((t) => t.race.id)).toEqual(["rep"]);
        await expect(loadElectionTallies(store, "nope")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("computes turnout over the district's towns", async () => {
        await store.saveBallotsCast("e1", [
            { municipality: "Keene", ballotsCast: 600 },
            { municipality: "Marlow", ballotsCast: 400 },
        ]);
        const tally = await loadRaceTally(store, "rep");
        // two-seat race, so votes can outnumber ballots
        expect(await loadRaceTurnout(store, tally)).toEqual({
            votesCast: 1290,
            ballotsCast: 1000,
            turnout: 1.29,
            turnoutPct: 129,
        });
    });

    it("falls back to reporting towns when no district was declared", async () => {
        await store.saveBallotsCast("e1", [
            { municipality: "Keene", ballotsCast: 80 },
            { municipality: "Marlow", ballotsCast: 999 },
        ]);
        const tally = await loadRaceTally(store, "sen", { assumeMissingAreZero: true });
        expect(await loadRaceTurnout(store, tally)).toEqual({ votesCast: 40, ballotsCast: 80, turnout: 0.5, turnoutPct: 50 });
    });

    it("follows a candidate across general elections, newest first", async () => {
        await store.saveRace({ id: "rep5", electionId: "e1", office: "State Representative", district: "5", seats: 1, createdAt: 0 });
        await store.saveCandidate({ id: "h24", raceId: "rep5", name: "Alice Hart", party: "Republican" });
        await store.saveCandidate({ id: "d24", raceId: "rep5", name: "Dan", party: "Democratic" });
        await store.saveResults("rep5", "Keene", [{ candidateId: "h24", votes: 120 }, { candidateId: "d24", votes: 130 }], "u1");

        await store.saveElection({ id: "e22", year: 2022, type: "general", createdAt: 0 });
        await store.saveRace({ id: "old", electionId: "e22", office: "State Senator", district: "9", seats: 1, createdAt: 0 });
        await store.saveCandidate({ id: "h22", raceId: "old", name: "Alice Hart", party: "Republican" });
        await store.saveCandidate({ id: "b22", raceId: "old", name: "Bob", party: "Democratic" });
        await store.saveCandidate({ id: "w22", raceId: "old", name: "Write-Ins", party: "" });
        await store.saveResults("old", "Keene", [
            { candidateId: "h22", votes: 300 },
            { candidateId: "b22", votes: 200 },
            { candidateId: "w22", votes: 5 },
        ], "u1");

        // primaries are left out
        await store.saveElection({ id: "p24", year: 2024, type: "primary", party: "Republican", createdAt: 0 });
        await store.saveRace({ id: "pri", electionId: "p24", office: "Governor", district: "1", seats: 1, createdAt: 0 });
        await store.saveCandidate({ id: "hp", raceId: "pri", name: "Alice Hart", party: "Republican" });
        await store.saveResults("pri", "Keene", [{ candidateId: "hp", votes: 50 }], "u1");

        // incomplete entry is counted as skipped
        await store.saveElection({ id: "e20", year: 2020, type: "general", createdAt: 0 });
        await store.saveRace({ id: "inc", electionId: "e20", office: "State Senator", district: "9", seats: 1, createdAt: 0 });
        await store.saveCandidate({ id: "h20", raceId: "inc", name: "Alice Hart", party: "Republican" });
        await store.saveCandidate({ id: "z20", raceId: "inc", name: "Zed", party: "Democratic" });
        await store.saveResults("inc", "Keene", [{ candidateId: "h20", votes: 10 }], "u1");

        const history = await candidateHistory(store, "hart");
        expect(history.records.map((r) => [r.election.year, r.race.office, r.candidate.name, r.total, r.rank, r.status, r.margin])).toEqual([
            [2024, "State Representative", "Alice Hart", 120, 2, "loser", -10],
            [2022, "State Senator", "Alice Hart", 300, 1, "winner", 100],
        ]);
        expect(history.skipped).toBe(1);

        expect(await candidateHistory(store, "write")).toEqual({ records: [], skipped: 0 });
    });
});
