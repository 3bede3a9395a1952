import { SlashCommandBuilder } from "discord.js";
import { biggestShifts } from "../utils/aggregation";
import { biggestShiftsEmbed } from "../utils/embeds";
import { loadElectionTallies, successfulTallies } from "../utils/results";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("biggest-shifts")
        .setDescription("Races whose two-party margin moved most between two general elections")
        .addStringOption((o) => o.setName("earlier").setDescription("Earlier election ID").setRequired(true))
        .addStringOption((o) => o.setName("later").setDescription("Later election ID").setRequired(true))
        .addIntegerOption((o) => o.setName("limit").setDescription("How many (default 10)").setMinValue(1).setMaxValue(25)),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: false });
        const [earlier, later] = await Promise.all([
            ctx.store.getElection(interaction.options.getString("earlier", true)),
            ctx.store.getElection(interaction.options.getString("later", true)),
        ]);
        if (!earlier || !later) return interaction.editReply({ content: "Election not found." });
        if (earlier.type !== "general" || later.type !== "general") {
            return interaction.editReply({ content: "Shifts compare general elections only." });
        }
        const limit = interaction.options.getInteger("limit") ?? 10;

        const opts = { excludedNames: ctx.config.excludedCandidateNames };
        const [before, after] = await Promise.all([
            loadElectionTallies(ctx.store, earlier.id, opts),
            loadElectionTallies(ctx.store, later.id, opts),
        ]);
        const shifts = biggestShifts(successfulTallies(before), successfulTallies(after), limit);
        return interaction.editReply({ embeds: [biggestShiftsEmbed(earlier, later, shifts)] });
    },
} satisfies Command;
