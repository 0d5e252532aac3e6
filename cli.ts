import "dotenv/config";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { TripPlanner } from "./planner";
import { loadEnvironment } from "./utils/configuration";
import { PromptCancelledError, runPlannerCli, type Prompter } from "./utils/cliFlow";
import { getErrorMessage } from "./utils/errors";

async function main() {
  const rl = readline.createInterface({ input, output });
  const cancel = new AbortController();
  rl.on("SIGINT", () => cancel.abort());

  const io: Prompter = {
    async ask(question) {
      try {
        return await rl.question(question, { signal: cancel.signal });
      } catch (error) {
        if (cancel.signal.aborted) {
          throw new PromptCancelledError();
        }
        throw error;
      }
    },
    print(line) {
      console.log(line);
    },
  };

  try {
    const planner = await TripPlanner.create(loadEnvironment());
    await runPlannerCli(planner, io);
  } catch (error) {
    console.error(`\nTrip planning error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    rl.close();
  }
}

void main();
