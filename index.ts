import "dotenv/config";
import { createApp } from "./app";
import { TripPlanner } from "./planner";
import { loadEnvironment } from "./utils/configuration";
import { getErrorMessage } from "./utils/errors";

async function startServer() {
  try {
    const env = loadEnvironment();
    const planner = await TripPlanner.create(env);
    const app = createApp(planner);

    app.listen(env.PORT, () => {
      console.log(`[API] Trip planner listening on port ${env.PORT}`);
    });
  } catch (error) {
    console.error(`[API] Failed to initialize Trip Planner: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

void startServer();
