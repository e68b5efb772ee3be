import { randomUUID } from "node:crypto";
import type { FastifyInstance } from "fastify";

declare module "fastify" {
  interface FastifyRequest {
    requestId: string;
  }
}

export function registerRequestId(app: FastifyInstance) {
  app.decorateRequest("requestId", "");
  app.addHook("onRequest", (req, reply, done) => {
    const hdr = req.headers["x-request-id"];
    req.requestId = (typeof hdr === "string" && hdr) || randomUUID();
    reply.header("x-request-id", req.requestId);
    done();
  });
}
