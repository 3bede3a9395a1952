import { SlashCommandBuilder } from "discord.js";
import { candidateHistoryEmbed } from "../utils/embeds";
import { candidateHistory } from "../utils/results";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("candidate")
        .setDescription("A candidate's general-election history")
        .addStringOption((o) =>
            o.setName("name").setDescription("Full or partial name").setRequired(true).setMinLength(2).setMaxLength(100)
        ),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: false });
        const query = interaction.options.getString("name", true);
        const history = await candidateHistory(ctx.store, query, { excludedNames: ctx.config.excludedCandidateNames });
        return interaction.editReply({ embeds: [candidateHistoryEmbed(query, history)] });
    },
} satisfies Command;
