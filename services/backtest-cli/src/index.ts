import { config as loadEnv } from "dotenv";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { createLogger } from "@quantlens/logger";

import { runCli } from "./cli.js";
import { loadCliEnv } from "./env.js";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

const main = async (): Promise<number> => {
  const env = loadCliEnv();
  const logger = createLogger("services/backtest-cli", { level: env.LOG_LEVEL });
  return runCli(process.argv.slice(2), { env, logger });
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    createLogger("services/backtest-cli").error("CLI initialization failed", { error });
    process.exitCode = 1;
  });
