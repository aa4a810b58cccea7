import type { FastifyInstance } from "fastify";
import indexController from "./controller/indexController";
import ordersController from "./controller/ordersController";
import dashboardController from "./controller/dashboardController";
import importController from "./controller/importController";
import type { ControllerOptions } from "./controller/context";

export default async function router(fastify: FastifyInstance, options: ControllerOptions) {
  fastify.register(ordersController, { prefix: "/orders", ...options });
  fastify.register(dashboardController, { prefix: "/dashboard", ...options });
  fastify.register(importController, { prefix: "/import", ...options });
  fastify.register(indexController, options);
}
