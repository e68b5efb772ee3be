import type { FastifyPluginAsync } from "fastify";

export type HealthRouteOptions = {
  db: { query(text: string): Promise<unknown> };
  redis: { ping(): Promise<string> };
};

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, opts) => {
  app.get("/health/live", async () => ({ ok: true }));

  app.get("/health/ready", async () => {
    await opts.db.query("SELECT 1");
    const pong = await opts.redis.ping();
    if (pong !== "PONG") throw new Error("redis not ready");

    return { ok: true };
  });
};
