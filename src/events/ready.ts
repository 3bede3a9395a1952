import type { Client } from "discord.js";
import type { BotConfig } from "../config";

export function onReady(client: Client<true>, config: BotConfig) {
    console.log(`Logged in as ${client.user.tag}`);
    console.log(config.supabase ? "Storing results in Supabase" : `Storing results in ${config.dbPath}`);
}
