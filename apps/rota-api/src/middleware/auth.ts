import type { FastifyInstance } from "fastify";

export function registerAuth(app: FastifyInstance, serviceToken: string) {
  app.addHook("preHandler", (req, reply, done) => {
    // Allow health/metrics without auth
    const url = req.routeOptions.url ?? "";
    if (url.startsWith("/health") || url === "/metrics") return done();

    const hdr = req.headers["authorization"] || "";
    const token = hdr.startsWith("Bearer ") ? hdr.slice(7) : "";
    if (token !== serviceToken) {
      reply.code(401).send({ error: "unauthorized" });
      return;
    }
    done();
  });
}
