import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";
import type { Race } from "../types";
import { newId } from "../utils/id";
import { raceLabel } from "../utils/aggregation";
import { splitList } from "./base";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("create-race")
        .setDescription("Create a race in an election")
        .addStringOption((o) => o.setName("election").setDescription("Election ID").setRequired(true))
        .addStringOption((o) => o.setName("office").setDescription("Office, e.g. State Representative").setRequired(true))
        .addStringOption((o) => o.setName("district").setDescription("District identifier").setRequired(true))
        .addIntegerOption((o) => o.setName("seats").setDescription("Seats filled (default 1)").setMinValue(1))
        .addStringOption((o) => o.setName("county").setDescription("County"))
        .addStringOption((o) => o.setName("towns").setDescription("Comma-separated towns making up the district"))
        .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: true });
        const electionId = interaction.options.getString("election", true);
        const election = await ctx.store.getElection(electionId);
        if (!election) return interaction.editReply({ content: "Election not found." });

        const race: Race = {
            id: newId(),
            electionId,
            office: interaction.options.getString("office", true).trim(),
            district: interaction.options.getString("district", true).trim(),
            county: interaction.options.getString("county")?.trim() || undefined,
            seats: interaction.options.getInteger("seats") ?? 1,
            createdAt: Date.now(),
        };
        await ctx.store.saveRace(race);

        const towns = splitList(interaction.options.getString("towns"));
        if (towns.length) await ctx.store.setComposition(race.id, towns);

        const district = towns.length ? ` covering ${towns.length} town(s)` : "";
        return interaction.editReply({
            content: `Created ${race.office}, ${raceLabel(race)} (${race.seats} seat(s))${district} with ID ${race.id}`,
        });
    },
} satisfies Command;
