import http from "http";

export interface HealthState {
    ready(): boolean;
    shuttingDown(): boolean;
    botUser(): string | null;
}

/**
 * Small HTTP health + readiness server so hosts that expect a bound port succeed.
 * /healthz answers 200 only once the bot is logged in and not shutting down.
 */
export function createHealthServer(state: HealthState) {
    return http.createServer((req, res) => {
        if (req.url === "/healthz") {
            const ready = state.ready() && !state.shuttingDown();
            res.writeHead(ready ? 200 : 503, { "Content-Type": "application/json" });
            res.end(
                JSON.stringify({
                    status: ready ? "ok" : "starting",
                    uptime: process.uptime(),
                    ts: new Date().toISOString(),
                    botUser: state.botUser(),
                }) + "\n"
            );
            return;
        }

        // root / basic liveness endpoint
        if (req.url === "/" || req.url === "/health") {
            res.writeHead(200, { "Content-Type": "text/plain" });
            res.end(state.shuttingDown() ? "Shutting down\n" : "OK\n");
            return;
        }

        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found\n");
    });
}
