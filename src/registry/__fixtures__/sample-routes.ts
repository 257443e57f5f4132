import { Router } from "../../http/router.js";
import { sendJson } from "../../http/respond.js";

export const sampleRoutes = new Router().get("/ping", ({ res }) => sendJson(res, 200, { pong: true }));

export function createSampleRoutes(): Router {
  return new Router().get("/hello", ({ res }) => sendJson(res, 200, { hello: "factory" }));
}

export async function createAsyncRoutes(): Promise<Router> {
  return new Router().get("/hello", ({ res }) => sendJson(res, 200, { hello: "async" }));
}

export const notARouter = { hello: "world" };

export function throwingFactory(): Router {
  throw new Error("factory exploded");
}
