import "dotenv/config";
import { createApp } from "./app";
import { loadSeedData } from "./data/seed";
import { getConfig } from "./lib/config";
import { BookingCoordinator } from "./services/appointments/booking";
import { createSchedulingContext } from "./services/appointments/context";
import { createInMemoryStores } from "./services/appointments/memoryStores";

async function main(): Promise<void> {
  const config = getConfig();
  const seed = config.seedDemoData ? await loadSeedData() : undefined;
  const scheduling = createSchedulingContext(createInMemoryStores(seed), config);
  const booking = new BookingCoordinator(scheduling);
  const app = createApp({ scheduling, booking, corsOrigins: config.corsOrigins });

  app.listen(config.port, "0.0.0.0", () => {
    console.log(`[backend] listening on port ${config.port} timezone=${config.timezone}`);
  });
}

main().catch((error) => {
  console.error("[backend] startup failed", error);
  process.exit(1);
});
