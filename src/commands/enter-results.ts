import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";
import { matchEntries, parseResultEntries } from "../utils/entry";
import type { Command } from "./base";

/**
 * /enter-results <race> <town> <results>
 * Results are `Name=votes` pairs. Re-entering a town replaces its counts;
 * every changed row is written to the audit log under the caller's user id.
 */
export default {
    data: new SlashCommandBuilder()
        .setName("enter-results")
        .setDescription("Enter or correct one town's vote counts for a race")
        .addStringOption((o) => o.setName("race").setDescription("Race ID").setRequired(true))
        .addStringOption((o) => o.setName("town").setDescription("Municipality").setRequired(true))
        .addStringOption((o) =>
            o.setName("results").setDescription("Comma-separated Name=votes, e.g. Alice Smith=120, Bob Jones=98").setRequired(true)
        )
        .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
    async execute(interaction, ctx) {
        await interaction.deferReply({ ephemeral: true });
        const raceId = interaction.options.getString("race", true);
        const town = interaction.options.getString("town", true).trim();
        const race = await ctx.store.getRace(raceId);
        if (!race) return interaction.editReply({ content: "Race not found." });

        const candidates = await ctx.store.listCandidates(raceId);
        const entries = matchEntries(parseResultEntries(interaction.options.getString("results", true)), candidates);
        const updated = await ctx.store.saveResults(raceId, town, entries, interaction.user.id);

        console.log(`Results for race ${raceId} in ${town}: ${updated} row(s) changed by ${interaction.user.id}`);
        return interaction.editReply({
            content: updated ? `Saved ${updated} change(s) for ${town}.` : `No changes for ${town}; the counts already match.`,
        });
    },
} satisfies Command;
