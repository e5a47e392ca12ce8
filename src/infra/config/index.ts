export { EnvSchema, DEFAULT_PORT, parseEnv, createConfig, type Env, type AppConfig } from './env.js';
