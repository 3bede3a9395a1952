import path from "path";
import { z } from "zod";
import { DEFAULT_EXCLUDED_NAMES } from "./utils/aggregation";

const optional = z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined));

// unset and empty variables both fall back to the default
const count = (fallback: number) =>
    z.preprocess((v) => (v === "" ? undefined : v), z.coerce.number().int().min(0).default(fallback));

const EnvSchema = z.object({
    DISCORD_TOKEN: optional,
    CLIENT_ID: optional,
    SUPABASE_URL: optional,
    SUPABASE_SERVICE_KEY: optional,
    DB_PATH: optional,
    BACKUP_DIR: optional,
    PORT: count(3000).refine((p) => p <= 65535, "port must be at most 65535"),
    SHUTDOWN_GRACE_MS: count(10000),
    EXCLUDED_CANDIDATE_NAMES: optional,
});

export interface BotConfig {
    discordToken?: string;
    clientId?: string;
    supabase?: { url: string; serviceKey: string };
    dbPath: string;
    backupDir: string;
    port: number;
    shutdownGraceMs: number;
    excludedCandidateNames: string[];
}

/**
 * Build the bot's configuration from an environment map (normally
 * `process.env` after dotenv has run). Supabase is only used when both its
 * URL and service key are present; otherwise results live in a JSON file.
 */
export function loadConfig(env: NodeJS.ProcessEnv): BotConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;
    const dbPath = e.DB_PATH ?? path.join(__dirname, "../data/election-results.json");
    return {
        discordToken: e.DISCORD_TOKEN,
        clientId: e.CLIENT_ID,
        supabase: e.SUPABASE_URL && e.SUPABASE_SERVICE_KEY ? { url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_KEY } : undefined,
        dbPath,
        backupDir: e.BACKUP_DIR ?? path.join(path.dirname(dbPath), "backups"),
        port: e.PORT,
        shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
        excludedCandidateNames: e.EXCLUDED_CANDIDATE_NAMES
            ? e.EXCLUDED_CANDIDATE_NAMES.split(",").map((s) => s.trim()).filter(Boolean)
            : DEFAULT_EXCLUDED_NAMES,
    };
}
