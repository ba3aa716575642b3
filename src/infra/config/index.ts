export { EnvSchema, parseEnv, createConfig, type Env, type AppConfig, type JwtClaimName } from './env.js';
