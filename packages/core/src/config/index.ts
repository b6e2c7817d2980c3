export { findDotenvFile, type LoadDotenvOptions, loadDotenv } from "./dotenv.js";
export { type EnvSource, type GetEnvOptions, getEnv, hasEnv, parseEnv, readEnv } from "./env.js";
export {
  defaultLoggingConfig,
  getLoggingConfig,
  type LoggingConfig,
  testLoggingConfig,
} from "./logging.config.js";
