import { z } from "zod";
import type { Candidate } from "../types";
import { EntryFormatError } from "./errors";

const EntrySchema = z.object({
    name: z.string().min(1, "candidate name is empty"),
    votes: z
        .string()
        .refine((v) => !v.startsWith("-"), "votes cannot be negative")
        .refine((v) => /^\d+$/.test(v), "votes must be a whole number of plain digits")
        .transform(Number),
});

export type ResultEntry = z.output<typeof EntrySchema>;

/**
 * Parse "Alice Smith=120, Bob Jones=98" into validated entries.
 * Pairs may also be separated by semicolons or newlines.
 */
export function parseResultEntries(raw: string): ResultEntry[] {
    const pairs = raw.split(/[,;\n]/).map((p) => p.trim()).filter(Boolean);
    if (!pairs.length) throw new EntryFormatError("No results given. Use `Name=votes, Name=votes`.");

    const entries: ResultEntry[] = [];
    const seen = new Set<string>();
    for (const pair of pairs) {
        const eq = pair.lastIndexOf("=");
        if (eq < 0) throw new EntryFormatError(`Expected \`name=votes\`, got \`${pair}\`.`);
        const name = pair.slice(0, eq).trim();
        const count = pair.slice(eq + 1).trim();
        const parsed = EntrySchema.safeParse({ name, votes: count });
        if (!parsed.success) {
            throw new EntryFormatError(`\`${pair}\`: ${parsed.error.issues[0]?.message ?? "invalid entry"}`);
        }
        const key = parsed.data.name.toLowerCase();
        if (seen.has(key)) throw new EntryFormatError(`${parsed.data.name} is listed more than once.`);
        seen.add(key);
        entries.push(parsed.data);
    }
    return entries;
}

/** Match entries to the race's candidates by name, ignoring case. */
export function matchEntries(entries: ResultEntry[], candidates: Candidate[]): { candidateId: string; votes: number }[] {
    const byName = new Map(candidates.map((c) => [c.name.toLowerCase(), c]));
    return entries.map((e) => {
        const c = byName.get(e.name.toLowerCase());
        if (!c) throw new EntryFormatError(`${e.name} is not a candidate in this race.`);
        return { candidateId: c.id, votes: e.votes };
    });
}
