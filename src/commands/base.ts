import type { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import type { BotConfig } from "../config";
import type { ResultStore } from "../utils/db";

/** What every handler gets besides the interaction: the store and the bot's configuration. */
export interface BotContext {
    store: ResultStore;
    config: BotConfig;
}

export interface Command {
    data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
    execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<unknown>;
}

export function splitList(raw: string | null) {
    if (!raw) return [];
    return raw
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
}
