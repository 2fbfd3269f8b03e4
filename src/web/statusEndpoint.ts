/**
 * Raid Scheduler — src/web/statusEndpoint.ts
 * WHAT: Tiny HTTP server exposing GET /health for container health checks.
 * WHY: "Is the bot connected?" without shelling into the host.
 *
 * ENDPOINT: GET /health → { ok, uptimeSec, wsPing, guilds, queues, schedulers }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import http from "node:http";
import { logger } from "../lib/logger.js";
import { getSchedulerHealth, type SchedulerHealth } from "../lib/schedulerHealth.js";

/** What the endpoint reads; the discord.js Client plus the queue manager in production. */
export interface HealthSource {
  isReady(): boolean;
  wsPing(): number;
  guildCount(): number;
  queueCount(): number;
}

export interface HealthResponse {
  ok: boolean;
  uptimeSec: number;
  wsPing: number;
  guilds: number;
  queues: number;
  schedulers: SchedulerHealth[];
}

export function buildHealthResponse(source: HealthSource, startedAt: number, now: number = Date.now()): HealthResponse {
  return {
    ok: source.isReady(),
    uptimeSec: Math.floor((now - startedAt) / 1000),
    wsPing: source.wsPing(),
    guilds: source.guildCount(),
    queues: source.queueCount(),
    schedulers: getSchedulerHealth(),
  };
}

export function createStatusServer(source: HealthSource, startedAt: number = Date.now()): http.Server {
  return http.createServer((req, res) => {
    res.setHeader("Cache-Control", "no-cache, max-age=0");

    if (req.method !== "GET") {
      res.writeHead(405, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Method not allowed" }));
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname === "/health") {
      const body = buildHealthResponse(source, startedAt);
      // 503 while the gateway session is down
      res.writeHead(body.ok ? 200 : 503, { "Content-Type": "application/json" });
      res.end(JSON.stringify(body));
      return;
    }

    res.writeHead(404, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "Not found" }));
  });
}

export function startStatusServer(source: HealthSource, port: number): http.Server {
  const server = createStatusServer(source);
  server.listen(port, () => {
    logger.info({ port }, "[status] health endpoint listening");
  });
  server.on("error", (err) => {
    logger.error({ err, port }, "[status] health server error");
  });
  return server;
}
