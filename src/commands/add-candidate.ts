import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";
import type { Candidate } from "../types";
import { newId } from "../utils/id";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("add-candidate")
        .setDescription("Add a candidate to a race")
        .addStringOption((o) => o.setName("race").setDescription("Race ID").setRequired(true))
        .addStringOption((o) => o.setName("name").setDescription("Candidate name").setRequired(true))
        .addStringOption((o) => o.setName("party").setDescription("Party, e.g. Republican").setRequired(true))
        .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: true });
        const raceId = interaction.options.getString("race", true);
        const race = await ctx.store.getRace(raceId);
        if (!race) return interaction.editReply({ content: "Race not found." });

        const name = interaction.options.getString("name", true).trim();
        const existing = await ctx.store.listCandidates(raceId);
        if (existing.some((c) => c.name.toLowerCase() === name.toLowerCase())) {
            return interaction.editReply({ content: `${name} is already on the ballot for this race.` });
        }

        const candidate: Candidate = { id: newId(), raceId, name, party: interaction.options.getString("party", true).trim() };
        await ctx.store.saveCandidate(candidate);
        return interaction.editReply({ content: `Added ${candidate.name} (${candidate.party}) with ID ${candidate.id}` });
    },
} satisfies Command;
