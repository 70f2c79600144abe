export {
  type EnvConfig,
  EnvSchema,
  getEnvConfig,
  resetEnvConfigCache,
} from "./env.schema";
