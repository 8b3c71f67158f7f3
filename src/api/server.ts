import { Hono } from "hono";
import { accountsRoute } from "./routes/accounts";
import { positionsRoute } from "./routes/positions";
import { liquidationsRoute } from "./routes/liquidations";
import { pricesRoute } from "./routes/prices";
import { healthRoute } from "./routes/health";
import { faucetRoute } from "./routes/faucet";
import { eventsRoute } from "./routes/events";
import { errorRespond, jsonRespond } from "./utils/respond";

// Hono app composition. Routes remain thin; all logic lives in services.
export function createApp() {
  const app = new Hono();
  app.route("/accounts", accountsRoute);
  app.route("/positions", positionsRoute);
  app.route("/liquidations", liquidationsRoute);
  app.route("/prices", pricesRoute);
  app.route("/health", healthRoute);
  app.route("/faucet", faucetRoute);
  app.route("/events", eventsRoute);
  app.get("/", (c) => c.redirect("/health"));
  app.onError((err, c) => errorRespond(c, err));
  app.notFound((c) => jsonRespond(c, { error: "Not found" }, 404));
  return app;
}
