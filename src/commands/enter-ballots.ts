import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("enter-ballots")
        .setDescription("Enter the number of ballots cast in a town, used for turnout")
        .addStringOption((o) => o.setName("election").setDescription("Election ID").setRequired(true))
        .addStringOption((o) => o.setName("town").setDescription("Municipality").setRequired(true))
        .addIntegerOption((o) => o.setName("ballots").setDescription("Ballots cast").setRequired(true).setMinValue(0))
        .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: true });
        const electionId = interaction.options.getString("election", true);
        const town = interaction.options.getString("town", true).trim();
        const ballotsCast = interaction.options.getInteger("ballots", true);
        const updated = await ctx.store.saveBallotsCast(electionId, [{ municipality: town, ballotsCast }]);
        return interaction.editReply({
            content: updated ? `Recorded ${ballotsCast} ballots cast in ${town}.` : `${town} already has ${ballotsCast} ballots cast.`,
        });
    },
} satisfies Command;
