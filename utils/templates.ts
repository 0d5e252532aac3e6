import { PREFERENCE_CHOICES, type PreferenceChoice } from "../schemas/tripRequest";

export const PREFERENCE_OPTIONS: Record<PreferenceChoice, string> = {
  "1": "Popular &amp; Famous Places",
  "2": "Hidden Gems &amp; Off-the-beaten-path",
  "3": "A Mix of Both",
};

export interface PlanPageValues {
  region: string;
  startDate: string;
  endDate: string;
  preference: string;
}

export interface PlanPageOptions {
  values: PlanPageValues;
  itinerary?: string;
  error?: string;
}

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

function renderPreferenceOptions(selected: string): string {
  return PREFERENCE_CHOICES.map(
    (choice) =>
      `<option value="${choice}"${choice === selected ? " selected" : ""}>${PREFERENCE_OPTIONS[choice]}</option>`
  ).join("\n          ");
}

/**
 * The trip form, optionally followed by an error or a generated itinerary.
 */
export function renderPlanPage({ values, itinerary, error }: PlanPageOptions): string {
  const result = error
    ? `<p class="error">An error occurred during planning: ${escapeHtml(error)}</p>`
    : itinerary
      ? `<h2>Your Custom Itinerary for ${escapeHtml(values.region)}</h2>
    <pre class="itinerary">${escapeHtml(itinerary)}</pre>
    <p class="success">Your travel plan has been generated! Happy travels!</p>`
      : "";

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>AI Trip Planner</title>
    <style>
      body { font-family: sans-serif; max-width: 48rem; margin: 2rem auto; }
      label { display: block; margin-top: 1rem; }
      .error { color: #b00020; }
      .success { color: #1b5e20; }
      .itinerary { white-space: pre-wrap; }
    </style>
  </head>
  <body>
    <h1>AI Trip Planner</h1>
    <p>Plan your next adventure with a detailed, weather-aware itinerary!</p>
    <form method="post" action="/plan">
      <label>Destination (e.g., Goa, India or Northern Italy):
        <input name="region" value="${escapeHtml(values.region)}" required />
      </label>
      <label>Start Date:
        <input type="date" name="startDate" value="${escapeHtml(values.startDate)}" required />
      </label>
      <label>End Date:
        <input type="date" name="endDate" value="${escapeHtml(values.endDate)}" required />
      </label>
      <label>Travel Style:
        <select name="preference">
          ${renderPreferenceOptions(values.preference)}
        </select>
      </label>
      <button type="submit">Plan My Trip</button>
    </form>
    ${result}
  </body>
</html>
`;
}
