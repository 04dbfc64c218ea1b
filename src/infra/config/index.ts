export {
  EnvSchema,
  parseEnv,
  createConfig,
  DEFAULT_INDICADORES_BASE_URL,
  DEFAULT_DENUE_BASE_URL,
  type Env,
  type AppConfig,
} from './env.js';
