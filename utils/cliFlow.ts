import { PREFERENCE_LABELS } from "./prompts";
import { PREFERENCE_CHOICES } from "../schemas/tripRequest";
import { getErrorMessage, TripPlannerError } from "./errors";
import { isPreferenceChoice, isValidDateInput, validateDateRange } from "./validation";
import type { PlanGenerator } from "../app";

/** Line-based terminal I/O, so the flow can be driven without a TTY. */
export interface Prompter {
  ask(question: string): Promise<string>;
  print(line: string): void;
}

/** Thrown by a Prompter when the user hits Ctrl+C. */
export class PromptCancelledError extends Error {
  constructor() {
    super("User cancelled operation");
    this.name = "PromptCancelledError";
  }
}

/**
 * Asks until the answer is non-empty and passes `validator`, giving up after
 * `maxAttempts` rejected answers.
 */
export async function askWithValidation(
  io: Prompter,
  question: string,
  validator?: (value: string) => boolean,
  maxAttempts = 3
): Promise<string> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let answer: string;
    try {
      answer = (await io.ask(question)).trim();
    } catch (error) {
      if (error instanceof PromptCancelledError) {
        io.print("\nOperation cancelled by user.");
        throw new TripPlannerError("User cancelled operation");
      }
      throw error;
    }

    if (!answer) {
      io.print("Input cannot be empty. Please try again.");
      continue;
    }
    if (validator && !validator(answer)) {
      if (attempt < maxAttempts) {
        io.print("Invalid input. Please try again.");
        continue;
      }
      throw new TripPlannerError("Maximum attempts exceeded for input validation");
    }
    return answer;
  }
  throw new TripPlannerError("Failed to get valid user input");
}

async function askPreference(io: Prompter): Promise<string> {
  for (;;) {
    io.print("\nWhat is your travel style?");
    for (const choice of PREFERENCE_CHOICES) {
      io.print(`  ${choice}: ${PREFERENCE_LABELS[choice]}`);
    }
    const choice = (await io.ask("Enter your choice (1, 2, or 3): ")).trim();
    if (isPreferenceChoice(choice)) {
      return choice;
    }
    io.print("Invalid choice. Please enter 1, 2, or 3.");
  }
}

/**
 * Interactive planning session: collects the trip details, runs the planner
 * and prints the itineraries. Errors are printed, not thrown.
 */
export async function runPlannerCli(planner: PlanGenerator, io: Prompter): Promise<void> {
  try {
    io.print("\n--- Welcome to the AI Trip Planner ---");

    const region = await askWithValidation(
      io,
      "Enter a region or state (e.g., Goa, Garhwal): "
    );
    const startDate = await askWithValidation(
      io,
      "Enter the start date (YYYY-MM-DD): ",
      (value) => isValidDateInput(value)
    );
    const endDate = await askWithValidation(
      io,
      "Enter the end date (YYYY-MM-DD): ",
      (value) => isValidDateInput(value)
    );

    const { durationDays } = validateDateRange(startDate, endDate);
    io.print(`\nTrip duration: ${durationDays} days`);

    const choice = await askPreference(io);

    io.print("\n...AI is thinking... This may take a moment...\n");
    const result = await planner.generatePlan(region, startDate, endDate, choice);

    io.print(
      "--- Here are your suggested itineraries, tailored to your preference and weather conditions ---\n"
    );
    io.print(result);
  } catch (error) {
    if (error instanceof TripPlannerError) {
      io.print(`\nTrip planning error: ${error.message}`);
    } else if (error instanceof PromptCancelledError) {
      io.print("\nOperation cancelled by user.");
    } else {
      console.error("[CLI] Unexpected error in runPlannerCli:", error);
      io.print(`\nAn unexpected error occurred: ${getErrorMessage(error)}`);
      io.print("Please check your configuration and try again.");
    }
  }
}
