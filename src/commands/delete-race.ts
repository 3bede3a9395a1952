import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";
import type { Command } from "./base";

export default {
    data: new SlashCommandBuilder()
        .setName("delete-race")
        .setDescription("Delete a race and all of its results (admin only)")
        .addStringOption((o) => o.setName("race").setDescription("Race ID").setRequired(true))
        .addStringOption((o) => o.setName("confirm").setDescription("Type the race ID again to confirm").setRequired(true))
        .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: true });
        const raceId = interaction.options.getString("race", true);
        const confirm = interaction.options.getString("confirm", true).trim();
        const backup = await ctx.store.deleteRace(raceId, { confirm });
        console.log(`Race ${raceId} deleted by ${interaction.user.id}; backup written to ${backup}`);
        return interaction.editReply({ content: `Race ${raceId} deleted. A backup was saved first.` });
    },
} satisfies Command;
