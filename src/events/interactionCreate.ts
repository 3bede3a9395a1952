import type { Collection, Interaction } from "discord.js";
import type { BotContext, Command } from "../commands";
import { REFRESH_PREFIX, resultsMessage } from "../commands/results";
import { isUserFacingError } from "../utils/errors";

/** The parts of a command or button interaction an error reply needs. */
export interface ErrorReplyTarget {
    deferred: boolean;
    replied: boolean;
    isButton(): boolean;
    reply(options: { content: string; ephemeral: boolean }): Promise<unknown>;
    editReply(options: { content: string; embeds: []; components: [] }): Promise<unknown>;
    followUp(options: { content: string; ephemeral: boolean }): Promise<unknown>;
}

/**
 * Tell the user what went wrong. A deferred slash command has its pending
 * reply replaced; a button keeps the message it sits under and gets a
 * private follow-up instead.
 */
export async function replyWithError(interaction: ErrorReplyTarget, err: unknown) {
    let content = "There was an error executing that command.";
    if (isUserFacingError(err)) content = err.message;
    else console.error(err);
    try {
        if (interaction.deferred && !interaction.replied && !interaction.isButton()) {
            await interaction.editReply({ content, embeds: [], components: [] });
        } else if (interaction.deferred || interaction.replied) await interaction.followUp({ content, ephemeral: true });
        else await interaction.reply({ content, ephemeral: true });
    } catch (replyErr) {
        console.error("Failed to send error reply:", replyErr);
    }
}

export async function handleInteraction(interaction: Interaction, commands: Collection<string, Command>, ctx: BotContext) {
    // Slash command handling
    if (interaction.isChatInputCommand()) {
        const command = commands.get(interaction.commandName);
        if (!command) {
            await interaction.reply({ content: "Command not found.", ephemeral: true });
            return;
        }
        try {
            await command.execute(interaction, ctx);
        } catch (err) {
            await replyWithError(interaction, err);
        }
        return;
    }

    // refresh button under /results: refresh_results:{raceId}:{0|1}
    if (interaction.isButton() && interaction.customId.startsWith(REFRESH_PREFIX)) {
        const [raceId, assume] = interaction.customId.slice(REFRESH_PREFIX.length).split(":");
        try {
            await interaction.deferUpdate();
            await interaction.editReply(await resultsMessage(ctx, raceId, assume === "1"));
        } catch (err) {
            await replyWithError(interaction, err);
        }
    }
}
