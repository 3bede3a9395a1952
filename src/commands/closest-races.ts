import { SlashCommandBuilder } from "discord.js";
import { closestRaces } from "../utils/aggregation";
import { closestRacesEmbed } from "../utils/embeds";
import { loadElectionTallies, successfulTallies } from "../utils/results";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("closest-races")
        .setDescription("Races with the smallest two-party margins")
        .addStringOption((o) => o.setName("election").setDescription("Election ID").setRequired(true))
        .addIntegerOption((o) => o.setName("limit").setDescription("How many (default 10)").setMinValue(1).setMaxValue(25)),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: false });
        const electionId = interaction.options.getString("election", true);
        const election = await ctx.store.getElection(electionId);
        if (!election) return interaction.editReply({ content: "Election not found." });
        const limit = interaction.options.getInteger("limit") ?? 10;

        const outcomes = await loadElectionTallies(ctx.store, electionId, { excludedNames: ctx.config.excludedCandidateNames });
        const races = closestRaces(successfulTallies(outcomes), limit);
        return interaction.editReply({ embeds: [closestRacesEmbed(election, races)] });
    },
} satisfies Command;
