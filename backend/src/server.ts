import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { startMetricsFlush } from "./metrics.js";

const config = loadConfig();
const app = createApp({ config });

startMetricsFlush();

process.on("unhandledRejection", (reason) => {
  console.error("[UNHANDLED_REJECTION]", reason);
});

process.on("uncaughtException", (err) => {
  console.error("[UNCAUGHT_EXCEPTION]", err);
  process.exit(1);
});

app.listen(config.port, () => {
  console.log(
    `Label pipeline listening on http://localhost:${config.port} (price lookup: ${config.priceLookupMode})`,
  );
});
