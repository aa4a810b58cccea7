import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { promises } from "fs";
import { findUp } from "../config/configFile";
import { requestContext, type ControllerOptions } from "./context";
import { withMode } from "../views/links";

const { readFile } = promises;

let stylesCssContent: Buffer | null = null;

export default async function indexController(
  fastify: FastifyInstance,
  options: ControllerOptions,
) {
  // Cache static files at startup; found from both src/ and dist/src/
  if (!stylesCssContent) {
    const stylesPath = findUp("static/styles.css", __dirname);
    if (stylesPath) {
      stylesCssContent = await readFile(stylesPath);
    } else {
      fastify.log.warn("static/styles.css not found; serving pages unstyled");
      stylesCssContent = Buffer.alloc(0);
    }
  }

  // GET /
  fastify.get("/", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode } = requestContext(request, options.stores);
    return reply.redirect(withMode("/orders/new", mode), 302);
  });

  // GET /styles.css
  fastify.get(
    "/styles.css",
    async function (_request: FastifyRequest, reply: FastifyReply) {
      return reply
        .header("Content-Type", "text/css; charset=utf-8")
        .send(stylesCssContent);
    },
  );

  // GET /health
  fastify.get("/health", async function () {
    return { status: "ok" };
  });
}
