import { Client, Collection, Events, GatewayIntentBits, REST, Routes } from "discord.js";
import dotenv from "dotenv";
import { loadConfig } from "./config";
import { commands } from "./commands";
import type { BotContext, Command } from "./commands";
import { handleInteraction } from "./events/interactionCreate";
import { onReady } from "./events/ready";
import { createHealthServer } from "./health";
import { createStore } from "./utils/db";
dotenv.config();

const config = loadConfig(process.env);
const TOKEN = config.discordToken;

if (!TOKEN) {
    console.error("DISCORD_TOKEN is required in .env");
    process.exit(1);
}

const ctx: BotContext = { store: createStore(config), config };
const client = new Client({ intents: [GatewayIntentBits.Guilds] });

const registry = new Collection<string, Command>();
for (const command of commands) registry.set(command.data.name, command);

client.once(Events.ClientReady, (c) => onReady(c, config));
client.on(Events.InteractionCreate, (interaction) => {
    handleInteraction(interaction, registry, ctx).catch((err) => console.error("Interaction handling failed:", err));
});

client
    .login(TOKEN)
    .then(async () => {
        // register commands only if CLIENT_ID is set; otherwise warn but continue
        if (!config.clientId) {
            console.warn("CLIENT_ID not set, skipping global command registration.");
            return;
        }
        const rest = new REST({ version: "10" }).setToken(TOKEN);
        try {
            console.log("Registering application commands...");
            await rest.put(Routes.applicationCommands(config.clientId), { body: commands.map((c) => c.data.toJSON()) });
            console.log("Commands registered.");
        } catch (err) {
            console.error("Failed to register commands:", err);
        }
    })
    .catch((err) => {
        console.error("Login failed:", err);
        process.exit(1);
    });

let shuttingDown = false;

const server = createHealthServer({
    ready: () => client.isReady(),
    shuttingDown: () => shuttingDown,
    botUser: () => client.user?.tag ?? null,
});

server.listen(config.port, () => {
    console.log(`HTTP health server listening on port ${config.port}`);
});

// graceful shutdown: stop accepting new requests, wait for inflight tasks, then destroy client
const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("Shutting down...");

    server.close(() => {
        console.log("HTTP server closed");
    });

    console.log(`Waiting ${config.shutdownGraceMs}ms for in-flight work to finish...`);
    await new Promise((resolve) => setTimeout(resolve, config.shutdownGraceMs));

    try {
        await client.destroy();
        console.log("Discord client destroyed");
    } catch (e) {
        console.error("Error destroying Discord client:", e);
    }

    setTimeout(() => process.exit(0), 1000);
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

// log unhandled errors so host logs show cause
process.on("uncaughtException", (err) => {
    console.error("uncaughtException:", err);
});
process.on("unhandledRejection", (reason) => {
    console.error("unhandledRejection:", reason);
});
