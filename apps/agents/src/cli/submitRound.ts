import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { PagesmithApiClient } from "../client/pagesmithApiClient";
import { parseSubmitArgs } from "./submitArgs";

loadDotenv({ path: resolve(__dirname, "../../../../.env") });

function readRequiredEnv(name: string) {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} is required.`);
  }
  return value;
}

async function main() {
  const args = parseSubmitArgs(process.argv.slice(2));
  const client = new PagesmithApiClient({
    baseUrl: process.env.PAGESMITH_API_URL ?? "http://localhost:3001",
    token: readRequiredEnv("PAGESMITH_API_TOKEN"),
  });

  const response =
    args.retry && args.projectId
      ? await client.retryRound(args.projectId, args.instruction, args.wait)
      : await client.submitRound(
          {
            project_id: args.projectId,
            instruction: args.instruction ?? "",
            checks: args.checks,
            ...(args.evaluationUrl ? { evaluation: { url: args.evaluationUrl } } : {}),
          },
          args.wait
        );

  console.log(JSON.stringify(response, null, 2));
  if ("result" in response && response.result.status === "failed") {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
