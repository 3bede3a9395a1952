import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";
import type { Election, ElectionType } from "../types";
import { newId } from "../utils/id";
import { electionLabel } from "../utils/embeds";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("create-election")
        .setDescription("Create an election that races belong to")
        .addIntegerOption((o) => o.setName("year").setDescription("Election year").setRequired(true).setMinValue(1788))
        .addStringOption((o) =>
            o
                .setName("type")
                .setDescription("General or primary")
                .setRequired(true)
                .addChoices({ name: "general", value: "general" }, { name: "primary", value: "primary" })
        )
        .addStringOption((o) => o.setName("party").setDescription("Party holding the primary"))
        .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: true });
        const year = interaction.options.getInteger("year", true);
        const type: ElectionType = interaction.options.getString("type", true) === "primary" ? "primary" : "general";
        const party = interaction.options.getString("party")?.trim() || undefined;
        if (type === "primary" && !party) return interaction.editReply({ content: "A primary needs a party." });

        const election: Election = { id: newId(), year, type, party: type === "primary" ? party : undefined, createdAt: Date.now() };
        await ctx.store.saveElection(election);
        return interaction.editReply({ content: `Created ${electionLabel(election)} with ID ${election.id}` });
    },
} satisfies Command;
