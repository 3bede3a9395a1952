import { SlashCommandBuilder, ActionRowBuilder, ButtonBuilder, ButtonStyle } from "discord.js";
import { loadRaceTally, loadRaceTurnout } from "../utils/results";
import { resultEmbed } from "../utils/embeds";
import type { BotContext, Command } from "./base";

export const REFRESH_PREFIX = "refresh_results:";

/** Embed and refresh button for a race; used by /results and the button handler. */
export async function resultsMessage(ctx: BotContext, raceId: string, assumeMissingAreZero: boolean) {
    const tally = await loadRaceTally(ctx.store, raceId, {
        assumeMissingAreZero,
        excludedNames: ctx.config.excludedCandidateNames,
    });
    const turnout = await loadRaceTurnout(ctx.store, tally);
    const refresh = new ButtonBuilder()
        // refresh_results:{raceId}:{1 when missing rows count as zero}
        .setCustomId(`${REFRESH_PREFIX}${raceId}:${assumeMissingAreZero ? 1 : 0}`)
        .setLabel("Refresh")
        .setStyle(ButtonStyle.Secondary)
        .setEmoji("🔄");
    const row = new ActionRowBuilder<ButtonBuilder>().addComponents(refresh);
    return { embeds: [resultEmbed(tally, turnout)], components: [row] };
}

export default {
    data: new SlashCommandBuilder()
        .setName("results")
        .setDescription("Show a race's winners, margins and turnout")
        .addStringOption((o) => o.setName("race").setDescription("Race ID").setRequired(true))
        .addBooleanOption((o) =>
            o.setName("assume-complete").setDescription("Count candidates without entered results as zero votes")
        ),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: false });
        const raceId = interaction.options.getString("race", true);
        const assumeComplete = interaction.options.getBoolean("assume-complete") ?? false;
        return interaction.editReply(await resultsMessage(ctx, raceId, assumeComplete));
    },
} satisfies Command;
