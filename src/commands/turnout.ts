import { SlashCommandBuilder } from "discord.js";
import { loadRaceTally, loadRaceTurnout } from "../utils/results";
import { turnoutText } from "../utils/embeds";
import { raceLabel } from "../utils/aggregation";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("turnout")
        .setDescription("Votes cast in a race against ballots cast in its towns")
        .addStringOption((o) => o.setName("race").setDescription("Race ID").setRequired(true)),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: false });
        const raceId = interaction.options.getString("race", true);
        const tally = await loadRaceTally(ctx.store, raceId, { excludedNames: ctx.config.excludedCandidateNames });
        const turnout = await loadRaceTurnout(ctx.store, tally);
        return interaction.editReply({
            content: `**${tally.race.office}, ${raceLabel(tally.race)}**: ${turnoutText(turnout)}`,
        });
    },
} satisfies Command;
