import { Hono } from "hono";
import type { HealthResponse } from "@/types/api";

const route = new Hono();

route.get("/health", (c) => {
  const response: HealthResponse = { status: "ok" };
  return c.json(response);
});

export default route;
