import { afterEach, describe, it, expect } from "vitest";
import { createHealthServer } from "./health";

describe("health server", () => {
    let close: (() => Promise<void>) | undefined;

    afterEach(async () => {
        await close?.();
        close = undefined;
    });

    async function start(ready: boolean, shuttingDown = false) {
        const server = createHealthServer({ ready: () => ready, shuttingDown: () => shuttingDown, botUser: () => "bot#0001" });
        await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
        close = () => new Promise<void>((resolve) => server.close(() => resolve()));
        const address = server.address();
        if (!address || typeof address === "string") throw new Error("health server is not listening on a TCP port");
        return `http://127.0.0.1:${address.port}`;
    }

    it("reports ready once the bot is logged in", async () => {
        const base = await start(true);
        const res = await fetch(`${base}/healthz`);
        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ status: "ok", botUser: "bot#0001" });
    });

    it("is not ready before login or while shutting down", async () => {
        expect((await fetch(`${await start(false)}/healthz`)).status).toBe(503);
        await close?.();
        const base = await start(true, true);
        expect((await fetch(`${base}/healthz`)).status).toBe(503);
        expect(await (await fetch(`${base}/health`)).text()).toBe("Shutting down\n");
    });

    it("answers liveness on / and 404 elsewhere", async () => {
        const base = await start(false);
        expect(await (await fetch(`${base}/`)).text()).toBe("OK\n");
        expect((await fetch(`${base}/metrics`)).status).toBe(404);
    });
});
