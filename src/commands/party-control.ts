import { SlashCommandBuilder } from "discord.js";
import { partyControl } from "../utils/aggregation";
import { partyControlEmbed } from "../utils/embeds";
import { loadElectionTallies, successfulTallies } from "../utils/results";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("party-control")
        .setDescription("Seats won by party for each office in an election")
        .addStringOption((o) => o.setName("election").setDescription("Election ID").setRequired(true)),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: false });
        const electionId = interaction.options.getString("election", true);
        const election = await ctx.store.getElection(electionId);
        if (!election) return interaction.editReply({ content: "Election not found." });

        const outcomes = await loadElectionTallies(ctx.store, electionId, { excludedNames: ctx.config.excludedCandidateNames });
        for (const o of outcomes) {
            if (!o.ok) console.warn(`Skipping race ${o.raceId}: ${o.error.message}`);
        }
        const tallies = successfulTallies(outcomes);
        const embed = partyControlEmbed(election, partyControl(tallies), outcomes.length - tallies.length);
        return interaction.editReply({ embeds: [embed] });
    },
} satisfies Command;
