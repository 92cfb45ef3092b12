import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { ScoreResponseSchema, submissionSample } from "@evalbridge/shared";
import { readBaseUrl } from "./args";

loadDotenv({ path: resolve(__dirname, "../../../../.env"), override: false });

async function main() {
  const baseUrl = readBaseUrl(process.argv.slice(2));
  const response = await fetch(`${baseUrl}/evaluate`, {
    method: "POST",
    headers: { Accept: "application/json", "Content-Type": "application/json" },
    body: JSON.stringify(submissionSample),
  });

  const text = await response.text();
  console.log("=== /evaluate ===");
  console.log("Status Code:", response.status);

  if (!response.ok) {
    throw new Error(`Evaluate request failed with ${response.status}: ${text || response.statusText}`);
  }

  const result = ScoreResponseSchema.parse(JSON.parse(text));
  console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
