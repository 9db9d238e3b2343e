import dotenv from "dotenv";
import path from "path";
import { logInfo, logWarn } from "./utils/logger";

const env = process.env.NODE_ENV || "development";
const dotenvFile = env === "production" ? ".env.production" : ".env";
const dotenvPath = path.resolve(process.cwd(), dotenvFile);
const result = dotenv.config({ path: dotenvPath });

if (result.error) {
  logWarn(`No ${dotenvFile} loaded from ${dotenvPath}; relying on the process environment`);
} else {
  logInfo(`Loaded ${dotenvFile} from: ${dotenvPath}`, { NODE_ENV: env });
}
