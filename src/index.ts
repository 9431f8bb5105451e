import { serve } from "@hono/node-server";
import app from "./app.ts";
import { env } from "./config/env.ts";

serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    console.log(`Pharmacy risk engine listening on port ${info.port}`);
  }
);
